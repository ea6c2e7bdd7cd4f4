import { parseNumber, round } from '../../utils/numbers';

const KJ_PER_KCAL = 4.184;

/**
 * Normalize text into comparable tokens for ranking and filtering.
 */
export const normalizeText = (value?: string): string => {
    if (!value) {
        return '';
    }
    return value
        .toLowerCase()
        .normalize('NFKD')
        .replace(/[\u0300-\u036f]/g, '')
        .replace(/[^\p{L}\p{N}]+/gu, ' ')
        .trim();
};

export const queryTokens = (query: string): string[] => normalizeText(query).split(' ').filter(Boolean);

/**
 * Energy per 100 g in kcal, preferring the kcal field and converting from kJ otherwise.
 */
export const extractCaloriesPer100g = (nutriments: Record<string, unknown>): number | undefined => {
    const kcal = parseNumber(nutriments['energy-kcal_100g']);
    if (kcal !== undefined) {
        return kcal;
    }

    const kj = parseNumber(nutriments['energy_100g']);
    return kj !== undefined ? round(kj / KJ_PER_KCAL, 1) : undefined;
};
