import cors, { type CorsOptions } from 'cors';
import express from 'express';
import { createLogsRouter } from './routes/logs';
import { createProgressRouter } from './routes/progress';
import { createSetupRouter } from './routes/setup';
import type { TrackerService } from './tracker/trackerService';

export type AppOptions = {
  service: TrackerService;
  corsOrigins: string[];
};

/**
 * Build the HTTP command surface around an existing tracker. Kept separate from `index.ts` so
 * tests can mount it without reading the environment or opening the default port.
 */
export const createApp = ({ service, corsOrigins }: AppOptions): express.Express => {
  const app = express();

  app.disable('x-powered-by');

  const corsOptions: CorsOptions = {
    origin(origin, callback) {
      if (!origin || corsOrigins.includes(origin)) {
        callback(null, true);
        return;
      }

      callback(new Error('Not allowed by CORS'));
    }
  };

  app.use(cors(corsOptions));
  app.use(express.json({ limit: '100kb' }));

  const apiRouter = express.Router();
  app.use('/api', apiRouter);

  apiRouter.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });
  apiRouter.use(createSetupRouter(service));
  apiRouter.use(createLogsRouter(service));
  apiRouter.use(createProgressRouter(service));

  app.get('/', (_req, res) => {
    res.send('Hydration & Calorie Tracker API');
  });

  return app;
};
