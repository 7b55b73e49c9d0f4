import type { ISODate } from '@einvoice-fr/contracts';
import { round } from '@einvoice-fr/shared';

/**
 * UN/CEFACT date format 102 (YYYYMMDD)
 */
export function toFormat102(date: ISODate): string {
  return date.replace(/-/g, '');
}

/**
 * Rates are written with two decimals: "20.00", "5.50"
 */
export function formatRate(rate: string): string {
  return round(rate, 2);
}
