import express from 'express';
import { z } from 'zod';
import type { TrackerService } from '../tracker/trackerService';
import { parsePositiveInteger } from '../utils/requestParsing';
import { respondWithError, respondWithInvalidBody } from './httpErrors';

const DEFAULT_HISTORY_LIMIT = 30;

const waterSchema = z.object({
    amount_ml: z.number()
});

const foodSchema = z.object({
    description: z.string(),
    grams: z.number().optional()
});

const workoutSchema = z.object({
    activity_type: z.string(),
    minutes: z.number()
});

export const createLogsRouter = (service: TrackerService): express.Router => {
    const router = express.Router();

    router.post('/users/:userId/logs/water', async (req, res) => {
        const parsed = waterSchema.safeParse(req.body);
        if (!parsed.success) {
            return respondWithInvalidBody(res, parsed.error);
        }

        try {
            const waterMl = await service.logWater(req.params.userId, parsed.data.amount_ml);
            res.json({ water_ml: waterMl });
        } catch (err) {
            respondWithError(res, err);
        }
    });

    router.post('/users/:userId/logs/food', async (req, res) => {
        const parsed = foodSchema.safeParse(req.body);
        if (!parsed.success) {
            return respondWithInvalidBody(res, parsed.error);
        }

        try {
            const { description, grams } = parsed.data;
            res.json(await service.logFood(req.params.userId, description, grams));
        } catch (err) {
            respondWithError(res, err);
        }
    });

    router.post('/users/:userId/logs/workout', async (req, res) => {
        const parsed = workoutSchema.safeParse(req.body);
        if (!parsed.success) {
            return respondWithInvalidBody(res, parsed.error);
        }

        try {
            const { entry, extra_water_ml } = await service.logWorkout(
                req.params.userId,
                parsed.data.activity_type,
                parsed.data.minutes
            );
            res.json({ ...entry, extra_water_ml });
        } catch (err) {
            respondWithError(res, err);
        }
    });

    router.get('/users/:userId/logs', (req, res) => {
        const limit = req.query.limit === undefined ? DEFAULT_HISTORY_LIMIT : parsePositiveInteger(req.query.limit);
        if (limit === null) {
            return res.status(400).json({ message: 'limit must be a positive integer', kind: 'validation' });
        }

        res.json({ dates: service.listLogDates(req.params.userId, limit) });
    });

    router.get('/users/:userId/logs/:date', (req, res) => {
        try {
            res.json(service.getDailyLog(req.params.userId, req.params.date));
        } catch (err) {
            respondWithError(res, err);
        }
    });

    return router;
};
