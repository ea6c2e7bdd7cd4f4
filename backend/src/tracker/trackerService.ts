import { calculateNorms } from '../utils/norms';
import { isLocalDateString, isValidIanaTimeZone } from '../utils/date';
import { round } from '../utils/numbers';
import { parseNonEmptyText } from '../utils/requestParsing';
import { CalendarDay, systemClock, type Clock } from './clock';
import { DailyLogStore, emptyLog } from './dailyLogStore';
import { InvalidAmountError, LookupUnavailableError, NoProfileError, ValidationError } from './errors';
import type { FoodLookup, FoodMatch, WeatherLookup } from './lookups';
import { ProfileStore } from './profileStore';
import { ProgressEngine } from './progress';
import { SetupSessionMachine, type AwaitingStep, type CompleteStep } from './setupSession';
import type { DailyLog, FoodEntry, NormResult, Profile, ProgressReport, UserId, WorkoutEntry } from './types';
import { UserSerialQueue } from './userSerialQueue';
import { estimateCaloriesBurned, extraWaterForWorkoutMl, normalizeActivityType } from './workouts';

export const DEFAULT_FOOD_PORTION_GRAMS = 100;

export type TrackerServiceOptions = {
    food: FoodLookup;
    /** `null` when no weather source is configured; temperature is then always unknown. */
    weather: WeatherLookup | null;
    clock?: Clock;
    timeZone?: string;
};

export type SetupCompletion = CompleteStep & {
    norms: NormResult;
    temperature_c: number | null;
};

export type WorkoutResult = {
    entry: WorkoutEntry;
    extra_water_ml: number;
};

const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/**
 * Entry point for every tracker command. Owns all per-user state and serializes each user's
 * operations, so a user's session and daily log never see interleaved updates.
 */
export class TrackerService {
    readonly profiles = new ProfileStore();
    readonly logs: DailyLogStore;
    private readonly setup: SetupSessionMachine;
    private readonly progress: ProgressEngine;
    private readonly queue = new UserSerialQueue();
    private readonly food: FoodLookup;
    private readonly weather: WeatherLookup | null;

    constructor(options: TrackerServiceOptions) {
        const timeZone = options.timeZone ?? 'UTC';
        if (!isValidIanaTimeZone(timeZone)) {
            throw new Error(`Invalid time zone: ${timeZone}`);
        }

        this.food = options.food;
        this.weather = options.weather;
        this.logs = new DailyLogStore(new CalendarDay(options.clock ?? systemClock, timeZone));
        this.setup = new SetupSessionMachine(this.profiles);
        this.progress = new ProgressEngine(this.profiles, this.logs);
    }

    startSetup(userId: UserId): Promise<AwaitingStep> {
        return this.queue.run(userId, () => this.setup.start(userId));
    }

    /**
     * Feed one reply into the user's setup session. When the last field is accepted the profile is
     * stored and its targets are returned, using the current temperature in the user's city.
     */
    submitSetupValue(userId: UserId, text: string): Promise<AwaitingStep | SetupCompletion> {
        return this.queue.run(userId, async () => {
            const step = this.setup.submit(userId, text);
            if (step.state !== 'Complete') {
                return step;
            }

            const temperatureC = await this.resolveTemperature(step.profile.city);
            return { ...step, norms: calculateNorms(step.profile, temperatureC), temperature_c: temperatureC };
        });
    }

    cancelSetup(userId: UserId): Promise<boolean> {
        return this.queue.run(userId, () => this.setup.cancel(userId));
    }

    getSetupState(userId: UserId): Promise<AwaitingStep> {
        return this.queue.run(userId, () => this.setup.current(userId));
    }

    getProfile(userId: UserId): Profile {
        const profile = this.profiles.get(userId);
        if (!profile) {
            throw new NoProfileError();
        }
        return profile;
    }

    logWater(userId: UserId, ml: number): Promise<number> {
        return this.queue.run(userId, () => this.logs.addWater(userId, ml));
    }

    /**
     * Resolve a food description to calories and record it. Unlike weather, a failed or empty
     * lookup is not replaced by an estimate: the call fails and nothing is recorded.
     */
    logFood(userId: UserId, description: string, grams: number = DEFAULT_FOOD_PORTION_GRAMS): Promise<FoodEntry> {
        return this.queue.run(userId, async () => {
            const query = parseNonEmptyText(description);
            if (!query) {
                throw new ValidationError('Describe the food to log.', 'description');
            }
            if (!Number.isFinite(grams) || grams <= 0) {
                throw new InvalidAmountError('Portion size (g) must be a number greater than 0.');
            }

            const match = await this.lookupFood(query);
            return this.logs.addFood(userId, {
                description: query,
                product_name: match.name,
                grams,
                calories: round((match.kcal_per_100g * grams) / 100, 1)
            });
        });
    }

    /**
     * Record a workout. Unknown activity types are logged with the default burn rate.
     */
    logWorkout(userId: UserId, activityType: string, minutes: number): Promise<WorkoutResult> {
        return this.queue.run(userId, () => {
            const type = parseNonEmptyText(activityType);
            if (!type) {
                throw new ValidationError('Name the workout type, e.g. "run".', 'activity_type');
            }

            const weightKg = this.profiles.get(userId)?.weight_kg;
            const entry = this.logs.addWorkout(userId, {
                activity_type: normalizeActivityType(type),
                duration_minutes: minutes,
                calories_burned: estimateCaloriesBurned(type, minutes, weightKg)
            });
            return { entry, extra_water_ml: extraWaterForWorkoutMl(minutes) };
        });
    }

    /**
     * Today's progress, fetching the current temperature for the profile's city.
     */
    getProgress(userId: UserId): Promise<ProgressReport> {
        return this.queue.run(userId, async () => {
            const profile = this.getProfile(userId);
            const temperatureC = await this.resolveTemperature(profile.city);
            return this.progress.report(userId, temperatureC);
        });
    }

    /**
     * Today's progress for an already known temperature (`null` when unknown).
     */
    report(userId: UserId, temperatureC: number | null): ProgressReport {
        return this.progress.report(userId, temperatureC);
    }

    getDailyLog(userId: UserId, date: string): DailyLog {
        if (!isLocalDateString(date)) {
            throw new ValidationError('Dates must use the YYYY-MM-DD format.', 'date');
        }
        return this.logs.get(userId, date) ?? emptyLog(date);
    }

    listLogDates(userId: UserId, limit?: number): string[] {
        return this.logs.listDates(userId, limit);
    }

    private async resolveTemperature(city: string): Promise<number | null> {
        if (!this.weather) {
            return null;
        }

        try {
            const temperatureC = await this.weather.getTemperatureC(city);
            return Number.isFinite(temperatureC) ? temperatureC : null;
        } catch (error) {
            console.warn(`Weather lookup failed for ${city}; continuing without temperature: ${describeError(error)}`);
            return null;
        }
    }

    private async lookupFood(description: string): Promise<FoodMatch> {
        let match: FoodMatch | null;
        try {
            match = await this.food.findFood(description);
        } catch (error) {
            console.warn(`Food lookup failed for "${description}": ${describeError(error)}`);
            throw new LookupUnavailableError();
        }

        if (!match || !Number.isFinite(match.kcal_per_100g) || match.kcal_per_100g < 0) {
            throw new LookupUnavailableError();
        }
        return match;
    }
}
