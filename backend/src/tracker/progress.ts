import { calculateNorms } from '../utils/norms';
import { round, sumToTenths } from '../utils/numbers';
import { emptyLog, type DailyLogStore } from './dailyLogStore';
import { NoProfileError } from './errors';
import type { ProfileStore } from './profileStore';
import type { DailyLog, Profile, ProgressReport, UserId } from './types';

export const buildProgressReport = (opts: {
    profile: Profile;
    log: DailyLog;
    temperatureC: number | null;
}): ProgressReport => {
    const { profile, log, temperatureC } = opts;
    const norms = calculateNorms(profile, temperatureC);
    const caloriesConsumed = sumToTenths(log.food_entries.map((entry) => entry.calories));
    const caloriesBurned = sumToTenths(log.workout_entries.map((entry) => entry.calories_burned));

    // Remaining values go negative once a target is exceeded; they are reported as-is.
    return {
        date: log.date,
        temperature_c: temperatureC,
        water_consumed_ml: log.water_ml,
        water_target_ml: norms.water_target_ml,
        water_remaining_ml: norms.water_target_ml - log.water_ml,
        calories_consumed: caloriesConsumed,
        calories_burned: caloriesBurned,
        calorie_target_kcal: norms.calorie_target_kcal,
        net_calories_remaining: round(norms.calorie_target_kcal - caloriesConsumed + caloriesBurned, 1)
    };
};

/**
 * Read-only view over profiles and today's log. Reports are computed fresh on every call.
 */
export class ProgressEngine {
    constructor(
        private readonly profiles: ProfileStore,
        private readonly logs: DailyLogStore
    ) {}

    report(userId: UserId, temperatureC: number | null): ProgressReport {
        const profile = this.profiles.get(userId);
        if (!profile) {
            throw new NoProfileError();
        }

        const date = this.logs.today();
        const log = this.logs.get(userId, date) ?? emptyLog(date);
        return buildProgressReport({ profile, log, temperatureC });
    }
}
