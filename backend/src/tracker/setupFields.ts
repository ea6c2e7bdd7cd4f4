import {
    parseNonEmptyText,
    parseNonNegativeInteger,
    parseNonNegativeNumber,
    parsePositiveInteger,
    parsePositiveNumber
} from '../utils/requestParsing';
import type { AwaitingState, SetupFieldName } from './types';

export type SetupFieldDescriptor = {
    field: SetupFieldName;
    state: AwaitingState;
    prompt: string;
    /** Shown when the reply cannot be parsed; the same field is asked again. */
    invalidMessage: string;
    parse: (raw: string) => number | string | null;
};

/**
 * Profile setup asks for these fields one per message, in this order. Adding or reordering a
 * field only touches this table.
 */
export const SETUP_FIELDS: readonly SetupFieldDescriptor[] = [
    {
        field: 'weight_kg',
        state: 'AwaitingWeight',
        prompt: 'Enter your weight (kg):',
        invalidMessage: 'Weight must be a number greater than 0. Enter your weight again.',
        parse: parsePositiveNumber
    },
    {
        field: 'height_cm',
        state: 'AwaitingHeight',
        prompt: 'Enter your height (cm):',
        invalidMessage: 'Height must be a number greater than 0. Enter your height again.',
        parse: parsePositiveNumber
    },
    {
        field: 'age_years',
        state: 'AwaitingAge',
        prompt: 'Enter your age (years):',
        invalidMessage: 'Age must be a whole number greater than 0. Enter your age again.',
        parse: parsePositiveInteger
    },
    {
        field: 'activity_minutes_per_day',
        state: 'AwaitingActivity',
        prompt: 'How many minutes of activity do you get per day?',
        invalidMessage: 'Activity must be a whole number of minutes, 0 or more. Enter your activity again.',
        parse: parseNonNegativeInteger
    },
    {
        field: 'city',
        state: 'AwaitingCity',
        prompt: 'Which city are you in?',
        invalidMessage: 'Enter the name of your city as text.',
        parse: parseNonEmptyText
    },
    {
        field: 'calorie_goal_override',
        state: 'AwaitingCalorieGoal',
        prompt: 'To set a calorie goal manually, send a number. Otherwise send 0 to calculate it automatically.',
        invalidMessage: 'The calorie goal must be a number, 0 or more. Enter your goal again.',
        parse: parseNonNegativeNumber
    }
];
