import { z } from 'zod';

export type UserId = string;

/**
 * A completed profile. Drafts collected during setup are only promoted to this shape once every
 * field has been validated, so a partially filled profile is never stored.
 */
export const profileSchema = z.object({
    weight_kg: z.number().finite().positive(),
    height_cm: z.number().finite().positive(),
    age_years: z.number().int().positive(),
    activity_minutes_per_day: z.number().int().nonnegative(),
    city: z.string().trim().min(1),
    // 0 or absent means "derive the calorie target from the profile".
    calorie_goal_override: z.number().finite().nonnegative().optional()
});

export type Profile = z.infer<typeof profileSchema>;

export type SetupFieldName = keyof Profile;

export type ProfileDraft = Partial<Record<SetupFieldName, number | string>>;

export type AwaitingState =
    | 'AwaitingWeight'
    | 'AwaitingHeight'
    | 'AwaitingAge'
    | 'AwaitingActivity'
    | 'AwaitingCity'
    | 'AwaitingCalorieGoal';

export type NormResult = {
    water_target_ml: number;
    calorie_target_kcal: number;
};

export type FoodEntry = {
    description: string;
    product_name: string;
    grams: number;
    calories: number;
    logged_at: string;
};

export type WorkoutEntry = {
    activity_type: string;
    duration_minutes: number;
    calories_burned: number;
    logged_at: string;
};

export type DailyLog = {
    date: string;
    water_ml: number;
    food_entries: FoodEntry[];
    workout_entries: WorkoutEntry[];
};

export type ProgressReport = {
    date: string;
    temperature_c: number | null;
    water_consumed_ml: number;
    water_target_ml: number;
    water_remaining_ml: number;
    calories_consumed: number;
    calories_burned: number;
    calorie_target_kcal: number;
    net_calories_remaining: number;
};
