import type { NormResult, Profile } from '../tracker/types';

export type Sex = 'MALE' | 'FEMALE';

export const WATER_ML_PER_KG = 30;
export const ACTIVITY_BLOCK_MINUTES = 30;
export const ACTIVITY_WATER_BONUS_ML = 500;
export const HEAT_THRESHOLD_C = 25;
export const HEAT_WATER_BONUS_ML = 500;

export const ACTIVE_DAY_MINUTES = 30;
export const ACTIVE_DAY_CALORIE_BONUS_KCAL = 400;

export type BmrConstantSet = Sex | 'UNSPECIFIED';

const BMR_SEX_OFFSET_KCAL: Record<BmrConstantSet, number> = {
    MALE: 5,
    FEMALE: -161,
    UNSPECIFIED: 0
};

/**
 * Profiles do not collect sex, so targets use Mifflin-St Jeor without a sex offset. Known
 * simplification: 5 kcal/day below the male formula and 161 kcal/day above the female one.
 */
export const ASSUMED_BMR_CONSTANT_SET: BmrConstantSet = 'UNSPECIFIED';

export const calculateBmr = (
    constantSet: BmrConstantSet,
    weightKg: number,
    heightCm: number,
    ageYears: number
): number => {
    const base = 10 * weightKg + 6.25 * heightCm - 5 * ageYears;
    return Math.round((base + BMR_SEX_OFFSET_KCAL[constantSet]) * 10) / 10;
};

/**
 * Daily water target in ml: 30 ml/kg, +500 ml per full 30 minutes of daily activity,
 * +500 ml when it is hotter than 25°C. An unknown temperature adds nothing.
 */
export const calculateWaterTargetMl = (
    profile: Pick<Profile, 'weight_kg' | 'activity_minutes_per_day'>,
    temperatureC: number | null
): number => {
    const base = profile.weight_kg * WATER_ML_PER_KG;
    const activityBonus =
        ACTIVITY_WATER_BONUS_ML * Math.floor(profile.activity_minutes_per_day / ACTIVITY_BLOCK_MINUTES);
    const heatBonus = temperatureC !== null && temperatureC > HEAT_THRESHOLD_C ? HEAT_WATER_BONUS_ML : 0;
    return Math.round(base + activityBonus + heatBonus);
};

export const calculateCalorieTargetKcal = (profile: Profile): number => {
    if (profile.calorie_goal_override !== undefined && profile.calorie_goal_override > 0) {
        return profile.calorie_goal_override;
    }

    const bmr = calculateBmr(ASSUMED_BMR_CONSTANT_SET, profile.weight_kg, profile.height_cm, profile.age_years);
    const activityBonus = profile.activity_minutes_per_day >= ACTIVE_DAY_MINUTES ? ACTIVE_DAY_CALORIE_BONUS_KCAL : 0;
    return Math.max(Math.round(bmr + activityBonus), 0);
};

export const calculateNorms = (profile: Profile, temperatureC: number | null): NormResult => ({
    water_target_ml: calculateWaterTargetMl(profile, temperatureC),
    calorie_target_kcal: calculateCalorieTargetKcal(profile)
});
