import { describe, expect, it } from 'vitest';
import { DEFAULT_KCAL_PER_MINUTE, estimateCaloriesBurned, extraWaterForWorkoutMl, kcalPerMinuteFor } from './workouts';

describe('workout estimates', () => {
    it('looks up rates case-insensitively', () => {
        expect(kcalPerMinuteFor('HIIT')).toBe(12);
        expect(kcalPerMinuteFor(' Walking ')).toBe(4);
    });

    it('falls back to the default rate for unknown activities', () => {
        expect(kcalPerMinuteFor('climbing')).toBe(DEFAULT_KCAL_PER_MINUTE);
        expect(estimateCaloriesBurned('climbing', 20)).toBe(100);
    });

    it('scales the estimate by body weight against 70 kg', () => {
        expect(estimateCaloriesBurned('run', 30)).toBe(300);
        expect(estimateCaloriesBurned('run', 30, 80)).toBe(342.9);
        expect(estimateCaloriesBurned('yoga', 45, 35)).toBe(67.5);
    });

    it('suggests 200 ml of water per full half hour', () => {
        expect(extraWaterForWorkoutMl(29)).toBe(0);
        expect(extraWaterForWorkoutMl(45)).toBe(200);
        expect(extraWaterForWorkoutMl(60)).toBe(400);
    });
});
