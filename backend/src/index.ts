import { createApp } from './app';
import { resolveTrackerConfig } from './config';
import { createFoodLookup } from './services/foodData';
import { createWeatherLookup } from './services/weather';
import { TrackerService } from './tracker/trackerService';

/**
 * Wire the lookups and tracker state together and start the HTTP server.
 * State lives in memory for the lifetime of the process.
 */
const bootstrap = async (): Promise<void> => {
  const config = resolveTrackerConfig();

  const service = new TrackerService({
    food: createFoodLookup(config),
    weather: createWeatherLookup(config),
    timeZone: config.timeZone
  });

  const app = createApp({ service, corsOrigins: config.corsOrigins });

  await new Promise<void>((resolve) => {
    app.listen(config.port, () => {
      console.log(`Server running on port ${config.port} (daily logs keyed by ${config.timeZone})`);
      resolve();
    });
  });
};

void bootstrap().catch((err) => {
  console.error('Failed to start server:', err);
  process.exit(1);
});
