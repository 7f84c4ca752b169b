import { format, isValid, parseISO } from 'date-fns';

export const DATE_FORMAT = 'yyyy-MM-dd';

export function formatDate(date: Date): string {
  return format(date, DATE_FORMAT);
}

/**
 * Parse an ISO-8601 date or date-time and return it as `yyyy-MM-dd`,
 * or null when the input is not a valid date.
 */
export function toCanonicalDate(value: string): string | null {
  const parsed = parseISO(value);
  return isValid(parsed) ? formatDate(parsed) : null;
}

export function today(): string {
  return formatDate(new Date());
}
