export const round = (value: number, precision = 2): number => {
    const multiplier = Math.pow(10, precision);
    return Math.round(value * multiplier) / multiplier;
};

export const parseNumber = (value: unknown): number | undefined => {
    if (typeof value === 'number' && Number.isFinite(value)) {
        return value;
    }
    if (typeof value === 'string') {
        const parsed = parseFloat(value);
        if (Number.isFinite(parsed)) {
            return parsed;
        }
    }
    return undefined;
};

/**
 * Sum a list of numbers, rounding to 0.1 so repeated decimal additions do not leak float noise
 * (e.g. 0.1 + 0.2) into reports.
 */
export const sumToTenths = (values: number[]): number => round(values.reduce((total, value) => total + value, 0), 1);
