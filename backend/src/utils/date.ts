const LOCAL_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Format a Date into a calendar date string ("YYYY-MM-DD") for the supplied IANA time zone.
 *
 * Daily logs are keyed by this string so "today" follows the configured zone rather than
 * the host's local clock.
 */
export function formatDateToLocalDateString(date: Date, timeZone: string): string {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit'
  }).formatToParts(date);

  const year = parts.find((part) => part.type === 'year')?.value;
  const month = parts.find((part) => part.type === 'month')?.value;
  const day = parts.find((part) => part.type === 'day')?.value;

  if (!year || !month || !day) {
    throw new Error('Unable to format local date');
  }

  return `${year}-${month}-${day}`;
}

/**
 * Validate an IANA time zone identifier (e.g. "Europe/Moscow").
 *
 * Node's Intl implementation throws a RangeError when an unknown timeZone is provided,
 * so we can use that as a lightweight runtime validator.
 */
export function isValidIanaTimeZone(value: unknown): value is string {
  if (typeof value !== 'string') return false;
  const trimmed = value.trim();
  if (!trimmed) return false;

  try {
    new Intl.DateTimeFormat('en-US', { timeZone: trimmed }).format(new Date());
    return true;
  } catch {
    return false;
  }
}

/**
 * Check that a value is a real calendar date in "YYYY-MM-DD" form (rejects "2024-02-30").
 */
export function isLocalDateString(value: unknown): value is string {
  if (typeof value !== 'string' || !LOCAL_DATE_PATTERN.test(value)) {
    return false;
  }

  const parsed = new Date(`${value}T00:00:00Z`);
  return Number.isFinite(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}
