import express from 'express';
import { z } from 'zod';
import type { TrackerService } from '../tracker/trackerService';
import { respondWithError, respondWithInvalidBody } from './httpErrors';

const submitSchema = z.object({
    text: z.string()
});

export const createSetupRouter = (service: TrackerService): express.Router => {
    const router = express.Router();

    router.post('/users/:userId/setup/start', async (req, res) => {
        try {
            res.json(await service.startSetup(req.params.userId));
        } catch (err) {
            respondWithError(res, err);
        }
    });

    router.post('/users/:userId/setup/submit', async (req, res) => {
        const parsed = submitSchema.safeParse(req.body);
        if (!parsed.success) {
            return respondWithInvalidBody(res, parsed.error);
        }

        try {
            const step = await service.submitSetupValue(req.params.userId, parsed.data.text);
            if (step.state === 'Complete') {
                const { state: _state, ...completion } = step;
                return res.json({ status: 'complete', ...completion });
            }
            res.json({ status: 'awaiting', ...step });
        } catch (err) {
            respondWithError(res, err);
        }
    });

    router.post('/users/:userId/setup/cancel', async (req, res) => {
        try {
            res.json({ cancelled: await service.cancelSetup(req.params.userId) });
        } catch (err) {
            respondWithError(res, err);
        }
    });

    router.get('/users/:userId/setup', async (req, res) => {
        try {
            res.json(await service.getSetupState(req.params.userId));
        } catch (err) {
            respondWithError(res, err);
        }
    });

    router.get('/users/:userId/profile', (req, res) => {
        try {
            res.json(service.getProfile(req.params.userId));
        } catch (err) {
            respondWithError(res, err);
        }
    });

    return router;
};
