import express from 'express';
import type { TrackerService } from '../tracker/trackerService';
import { respondWithError } from './httpErrors';

export const createProgressRouter = (service: TrackerService): express.Router => {
    const router = express.Router();

    router.get('/users/:userId/progress', async (req, res) => {
        try {
            res.json(await service.getProgress(req.params.userId));
        } catch (err) {
            respondWithError(res, err);
        }
    });

    return router;
};
