import type { CalendarDay } from './clock';
import { round } from '../utils/numbers';
import { InvalidAmountError } from './errors';
import type { DailyLog, FoodEntry, UserId, WorkoutEntry } from './types';

export type NewFoodEntry = Omit<FoodEntry, 'logged_at'>;
export type NewWorkoutEntry = Omit<WorkoutEntry, 'logged_at'>;

export const emptyLog = (date: string): DailyLog => ({
    date,
    water_ml: 0,
    food_entries: [],
    workout_entries: []
});

const copyLog = (log: DailyLog): DailyLog => ({
    ...log,
    food_entries: log.food_entries.map((entry) => ({ ...entry })),
    workout_entries: log.workout_entries.map((entry) => ({ ...entry }))
});

const assertPositive = (value: number, label: string): void => {
    if (!Number.isFinite(value) || value <= 0) {
        throw new InvalidAmountError(`${label} must be a number greater than 0.`);
    }
};

/**
 * Per-user, per-day accumulator of water, food and workouts.
 *
 * Writes always land on the current calendar day, so once the day rolls over the previous
 * day's log can only be read. Logs are created on first write and never evicted.
 */
export class DailyLogStore {
    private readonly logs = new Map<UserId, Map<string, DailyLog>>();

    constructor(private readonly day: CalendarDay) {}

    today(): string {
        return this.day.today();
    }

    /**
     * Read a day's log. Returns `null` when nothing was logged that day.
     */
    get(userId: UserId, date: string): DailyLog | null {
        const log = this.logs.get(userId)?.get(date);
        return log ? copyLog(log) : null;
    }

    addWater(userId: UserId, ml: number): number {
        assertPositive(ml, 'Water amount (ml)');
        const log = this.todayLogFor(userId);
        log.water_ml = round(log.water_ml + ml, 1);
        return log.water_ml;
    }

    addFood(userId: UserId, entry: NewFoodEntry): FoodEntry {
        assertPositive(entry.grams, 'Portion size (g)');
        if (!Number.isFinite(entry.calories) || entry.calories < 0) {
            throw new InvalidAmountError('Calories must be a number, 0 or more.');
        }
        const stored: FoodEntry = { ...entry, logged_at: this.day.now().toISOString() };
        this.todayLogFor(userId).food_entries.push(stored);
        return { ...stored };
    }

    addWorkout(userId: UserId, entry: NewWorkoutEntry): WorkoutEntry {
        assertPositive(entry.duration_minutes, 'Workout duration (minutes)');
        const stored: WorkoutEntry = { ...entry, logged_at: this.day.now().toISOString() };
        this.todayLogFor(userId).workout_entries.push(stored);
        return { ...stored };
    }

    /**
     * Dates with at least one entry, most recent first.
     */
    listDates(userId: UserId, limit = 30): string[] {
        const byDate = this.logs.get(userId);
        if (!byDate) {
            return [];
        }
        return [...byDate.keys()].sort((a, b) => b.localeCompare(a)).slice(0, limit);
    }

    private todayLogFor(userId: UserId): DailyLog {
        let byDate = this.logs.get(userId);
        if (!byDate) {
            byDate = new Map();
            this.logs.set(userId, byDate);
        }

        const date = this.day.today();
        let log = byDate.get(date);
        if (!log) {
            log = emptyLog(date);
            byDate.set(date, log);
        }
        return log;
    }
}
