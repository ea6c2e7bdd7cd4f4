/**
 * Contracts for the two external lookups the tracker depends on. Both may be slow or fail;
 * the tracker decides how each failure is surfaced.
 */

export interface WeatherLookup {
    /** Current air temperature in °C. Rejects on any failure (unknown city, timeout, network). */
    getTemperatureC(city: string): Promise<number>;
}

export type FoodMatch = {
    name: string;
    kcal_per_100g: number;
};

export interface FoodLookup {
    /** Best match for a free-text description, or `null` when nothing usable was found. */
    findFood(description: string): Promise<FoodMatch | null>;
}
