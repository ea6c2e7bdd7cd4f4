import type { TrackerConfig } from '../../config';
import type { WeatherLookup } from '../../tracker/lookups';
import OpenWeatherProvider from './openWeatherProvider';

/**
 * Returns `null` when no API key is configured; water targets then never include the heat bonus.
 */
export const createWeatherLookup = (
    config: Pick<TrackerConfig, 'openWeatherApiKey' | 'weatherTimeoutMs'>
): WeatherLookup | null => {
    if (!config.openWeatherApiKey) {
        console.warn('OPENWEATHER_API_KEY is not set. Water targets will not include the heat bonus.');
        return null;
    }

    return new OpenWeatherProvider({ apiKey: config.openWeatherApiKey, timeoutMs: config.weatherTimeoutMs });
};
