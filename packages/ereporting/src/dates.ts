import { addMonths, endOfMonth, getDate, setDate, startOfMonth } from 'date-fns';
import type { ISODate } from '@einvoice-fr/contracts';
import { formatCalendarDate, parseCalendarDate } from '@einvoice-fr/shared';
import { EReportingError } from './errors.js';

function parseDate(date: ISODate): Date {
  const parsed = parseCalendarDate(date);
  if (parsed === undefined) {
    throw new EReportingError(`Invalid date: ${date}`, 'EREPORTING_INVALID_DATE', { date });
  }
  return parsed;
}

/**
 * Next of the 10th, the 20th and the month end strictly after the date.
 *
 * @example nextDecadeEnd('2026-09-20') // => '2026-09-30'
 */
export function nextDecadeEnd(date: ISODate): ISODate {
  const parsed = parseDate(date);
  const day = getDate(parsed);
  const monthEnd = endOfMonth(parsed);
  if (day < 10) return formatCalendarDate(setDate(parsed, 10));
  if (day < 20) return formatCalendarDate(setDate(parsed, 20));
  if (day < getDate(monthEnd)) return formatCalendarDate(monthEnd);

  return formatCalendarDate(setDate(addMonths(startOfMonth(parsed), 1), 10));
}

/**
 * @example endOfFollowingMonth('2026-12-15') // => '2027-01-31'
 */
export function endOfFollowingMonth(date: ISODate): ISODate {
  return formatCalendarDate(endOfMonth(addMonths(startOfMonth(parseDate(date)), 1)));
}
