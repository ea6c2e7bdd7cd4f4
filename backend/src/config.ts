import dotenv from 'dotenv';
import { isValidIanaTimeZone } from './utils/date';

dotenv.config();

const DEFAULT_ALLOWED_ORIGINS = 'http://localhost:5173';

export type TrackerConfig = {
  port: number;
  corsOrigins: string[];
  timeZone: string;
  openWeatherApiKey: string | null;
  weatherTimeoutMs: number;
  foodTimeoutMs: number;
  foodLanguageCode: string | undefined;
};

/**
 * Parse a comma-delimited list of origins. Defaults to allowing the local dev client origin.
 */
const parseAllowedOrigins = (value: string | undefined): string[] =>
  (value ?? DEFAULT_ALLOWED_ORIGINS)
    .split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);

const parseTimeoutMs = (value: string | undefined, fallback: number): number => {
  const parsed = value ? parseInt(value, 10) : Number.NaN;
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
};

const resolveTimeZone = (value: string | undefined): string => {
  const trimmed = value?.trim();
  if (!trimmed) return 'UTC';
  if (isValidIanaTimeZone(trimmed)) return trimmed;

  console.warn(`TRACKER_TIME_ZONE="${trimmed}" is not a valid IANA time zone. Falling back to UTC.`);
  return 'UTC';
};

export function resolveTrackerConfig(env: NodeJS.ProcessEnv = process.env): TrackerConfig {
  const port = parseInt(env.PORT || '4000', 10);
  return {
    port: Number.isFinite(port) ? port : 4000,
    corsOrigins: parseAllowedOrigins(env.CORS_ORIGINS),
    timeZone: resolveTimeZone(env.TRACKER_TIME_ZONE),
    openWeatherApiKey: env.OPENWEATHER_API_KEY?.trim() || null,
    weatherTimeoutMs: parseTimeoutMs(env.WEATHER_TIMEOUT_MS, 10000),
    foodTimeoutMs: parseTimeoutMs(env.OFF_TIMEOUT_MS, 8000),
    foodLanguageCode: env.FOOD_LANGUAGE_CODE?.trim().toLowerCase() || undefined
  };
}
