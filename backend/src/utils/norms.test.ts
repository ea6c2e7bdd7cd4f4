import { describe, expect, it } from 'vitest';
import type { Profile } from '../tracker/types';
import { ASSUMED_BMR_CONSTANT_SET, calculateBmr, calculateCalorieTargetKcal, calculateNorms, calculateWaterTargetMl } from './norms';

const baseProfile: Profile = {
    weight_kg: 80,
    height_cm: 184,
    age_years: 26,
    activity_minutes_per_day: 45,
    city: 'Moscow',
    calorie_goal_override: 0
};

describe('calculateWaterTargetMl', () => {
    it('adds one activity block and no heat bonus when the temperature is unknown', () => {
        expect(calculateWaterTargetMl(baseProfile, null)).toBe(2900);
    });

    it('only adds the heat bonus above 25°C', () => {
        expect(calculateWaterTargetMl(baseProfile, 25)).toBe(2900);
        expect(calculateWaterTargetMl(baseProfile, 25.1)).toBe(3400);
    });

    it('counts complete 30-minute blocks only', () => {
        expect(calculateWaterTargetMl({ ...baseProfile, activity_minutes_per_day: 29 }, null)).toBe(2400);
        expect(calculateWaterTargetMl({ ...baseProfile, activity_minutes_per_day: 59 }, null)).toBe(2900);
        expect(calculateWaterTargetMl({ ...baseProfile, activity_minutes_per_day: 60 }, null)).toBe(3400);
    });

    it('rounds fractional weights to whole millilitres', () => {
        expect(calculateWaterTargetMl({ weight_kg: 70.3, activity_minutes_per_day: 0 }, null)).toBe(2109);
    });
});

describe('calculateBmr', () => {
    it('applies the offset of the chosen constant set', () => {
        expect(calculateBmr('UNSPECIFIED', 80, 184, 26)).toBe(1820);
        expect(calculateBmr('MALE', 80, 184, 26)).toBe(1825);
        expect(calculateBmr('FEMALE', 80, 184, 26)).toBe(1659);
    });

    it('leaves the sex offset out of the calorie target', () => {
        expect(ASSUMED_BMR_CONSTANT_SET).toBe('UNSPECIFIED');
    });
});

describe('calculateCalorieTargetKcal', () => {
    it('adds the active-day bonus to the BMR when no override is set', () => {
        expect(calculateCalorieTargetKcal(baseProfile)).toBe(2220);
    });

    it('skips the bonus below 30 minutes of activity', () => {
        expect(calculateCalorieTargetKcal({ ...baseProfile, activity_minutes_per_day: 29 })).toBe(1820);
        expect(calculateCalorieTargetKcal({ ...baseProfile, activity_minutes_per_day: 30 })).toBe(2220);
    });

    it('treats an absent override like zero', () => {
        const { calorie_goal_override: _override, ...withoutOverride } = baseProfile;
        expect(calculateCalorieTargetKcal(withoutOverride)).toBe(2220);
    });

    it('returns a positive override as-is', () => {
        expect(calculateCalorieTargetKcal({ ...baseProfile, calorie_goal_override: 1800 })).toBe(1800);
    });

    it('never goes below zero', () => {
        expect(
            calculateCalorieTargetKcal({ ...baseProfile, weight_kg: 1, height_cm: 1, age_years: 100, activity_minutes_per_day: 0 })
        ).toBe(0);
    });
});

describe('calculateNorms', () => {
    it('returns the same targets for the same inputs', () => {
        const first = calculateNorms(baseProfile, 30);
        const second = calculateNorms(baseProfile, 30);
        expect(first).toEqual({ water_target_ml: 3400, calorie_target_kcal: 2220 });
        expect(second).toEqual(first);
    });
});
