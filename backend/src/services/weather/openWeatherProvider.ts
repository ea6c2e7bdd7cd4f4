import { z } from 'zod';
import type { WeatherLookup } from '../../tracker/lookups';

const currentWeatherSchema = z.object({
    main: z.object({
        temp: z.number()
    })
});

export type OpenWeatherOptions = {
    apiKey: string;
    baseUrl?: string;
    timeoutMs?: number;
};

/**
 * Current temperature from OpenWeatherMap. Every failure rejects; callers decide the fallback.
 */
class OpenWeatherProvider implements WeatherLookup {
    private apiKey: string;
    private baseUrl: string;
    private requestTimeoutMs: number;

    constructor(options: OpenWeatherOptions) {
        this.apiKey = options.apiKey;
        this.baseUrl = options.baseUrl ?? 'https://api.openweathermap.org';
        this.requestTimeoutMs = options.timeoutMs ?? 10000;
    }

    async getTemperatureC(city: string): Promise<number> {
        const params = new URLSearchParams({ q: city, appid: this.apiKey, units: 'metric' });
        const response = await this.fetchWithTimeout(`${this.baseUrl}/data/2.5/weather?${params.toString()}`);
        if (!response.ok) {
            throw new Error(`OpenWeather request failed with status ${response.status}`);
        }

        const parsed = currentWeatherSchema.safeParse(await response.json());
        if (!parsed.success) {
            throw new Error('OpenWeather response did not include main.temp');
        }
        return parsed.data.main.temp;
    }

    private async fetchWithTimeout(url: string): Promise<Response> {
        if (!this.requestTimeoutMs) {
            return fetch(url);
        }

        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), this.requestTimeoutMs);
        try {
            return await fetch(url, { signal: controller.signal });
        } catch (error) {
            if (error instanceof Error && error.name === 'AbortError') {
                throw new Error(`OpenWeather request timed out after ${this.requestTimeoutMs}ms`);
            }
            throw error;
        } finally {
            clearTimeout(timeoutId);
        }
    }
}

export default OpenWeatherProvider;
