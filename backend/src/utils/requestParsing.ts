const DECIMAL_TEXT_PATTERN = /^[+-]?\d+(?:[.,]\d+)?$/;

/**
 * Parse free-form chat text into a finite number.
 *
 * Users type decimals with either separator ("72.5" or "72,5"), so a comma is read as a
 * decimal point. Only plain decimal notation is accepted: "0x50", "1e3" and "Infinity" are not
 * numbers here. Returns `null` for blank or non-numeric input.
 */
export function parseDecimalText(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== 'string') {
    return null;
  }

  const trimmed = value.trim();
  if (!DECIMAL_TEXT_PATTERN.test(trimmed)) {
    return null;
  }

  const numeric = Number(trimmed.replace(',', '.'));
  return Number.isFinite(numeric) ? numeric : null;
}

/**
 * Parse a value into a positive number (> 0), allowing decimals.
 */
export function parsePositiveNumber(value: unknown): number | null {
  const numeric = parseDecimalText(value);
  if (numeric === null || numeric <= 0) {
    return null;
  }
  return numeric;
}

/**
 * Parse a value into a non-negative number (>= 0), allowing decimals.
 */
export function parseNonNegativeNumber(value: unknown): number | null {
  const numeric = parseDecimalText(value);
  if (numeric === null || numeric < 0) {
    return null;
  }
  return numeric;
}

/**
 * Parse a value into a positive integer (>= 1). Fractional input is rejected rather than truncated.
 */
export function parsePositiveInteger(value: unknown): number | null {
  const numeric = parseDecimalText(value);
  if (numeric === null || !Number.isInteger(numeric) || numeric <= 0) {
    return null;
  }
  return numeric;
}

/**
 * Parse a value into a non-negative integer (>= 0). Fractional input is rejected rather than truncated.
 */
export function parseNonNegativeInteger(value: unknown): number | null {
  const numeric = parseDecimalText(value);
  if (numeric === null || !Number.isInteger(numeric) || numeric < 0) {
    return null;
  }
  return numeric;
}

/**
 * Trim a free-text value, treating blank input as "not provided".
 */
export function parseNonEmptyText(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  return trimmed ? trimmed : null;
}
