import { round } from '../utils/numbers';

/**
 * Approximate kcal burned per minute for a 70 kg person.
 */
const KCAL_PER_MINUTE_BY_ACTIVITY = new Map<string, number>([
    ['run', 10],
    ['running', 10],
    ['jog', 8],
    ['walk', 4],
    ['walking', 4],
    ['bike', 8],
    ['cycling', 8],
    ['swim', 9],
    ['gym', 6],
    ['hiit', 12],
    ['yoga', 3]
]);

/** Rate for activity types missing from the table; logging never fails on an unknown type. */
export const DEFAULT_KCAL_PER_MINUTE = 5;
export const REFERENCE_WEIGHT_KG = 70;

export const WORKOUT_WATER_BLOCK_MINUTES = 30;
export const WORKOUT_WATER_PER_BLOCK_ML = 200;

export const normalizeActivityType = (activityType: string): string => activityType.trim().toLowerCase();

export const kcalPerMinuteFor = (activityType: string): number =>
    KCAL_PER_MINUTE_BY_ACTIVITY.get(normalizeActivityType(activityType)) ?? DEFAULT_KCAL_PER_MINUTE;

export const estimateCaloriesBurned = (
    activityType: string,
    minutes: number,
    weightKg: number = REFERENCE_WEIGHT_KG
): number => round(minutes * kcalPerMinuteFor(activityType) * (weightKg / REFERENCE_WEIGHT_KG), 1);

/**
 * Extra water suggested after a workout. Advisory only; it does not change the daily target.
 */
export const extraWaterForWorkoutMl = (minutes: number): number =>
    WORKOUT_WATER_PER_BLOCK_ML * Math.floor(minutes / WORKOUT_WATER_BLOCK_MINUTES);
