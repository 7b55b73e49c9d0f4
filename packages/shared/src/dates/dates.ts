import { format, isValid, parseISO } from 'date-fns';

export const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export const ISO_DATE_FORMAT = 'yyyy-MM-dd';

/**
 * Local midnight of a `YYYY-MM-DD` date, or undefined when the value is not
 * one (wrong shape, or a day the month does not have).
 */
export function parseCalendarDate(value: string): Date | undefined {
  if (!ISO_DATE_PATTERN.test(value)) {
    return undefined;
  }
  const parsed = parseISO(value);
  return isValid(parsed) && format(parsed, ISO_DATE_FORMAT) === value ? parsed : undefined;
}

export function isCalendarDate(value: string): boolean {
  return parseCalendarDate(value) !== undefined;
}

export function formatCalendarDate(date: Date): string {
  return format(date, ISO_DATE_FORMAT);
}
