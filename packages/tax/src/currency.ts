/**
 * ISO 4217 minor units for currencies that do not use two decimals.
 */
const MINOR_UNITS: Readonly<Record<string, number>> = {
  BHD: 3,
  CLP: 0,
  ISK: 0,
  JOD: 3,
  JPY: 0,
  KRW: 0,
  KWD: 3,
  OMR: 3,
  TND: 3,
  VND: 0,
  XAF: 0,
  XOF: 0,
  XPF: 0,
};

export const DEFAULT_MINOR_UNITS = 2;

/**
 * Number of decimals amounts are rounded to in the given currency.
 *
 * @example minorUnitsFor('EUR') // => 2
 * @example minorUnitsFor('JPY') // => 0
 */
export function minorUnitsFor(currency: string): number {
  return MINOR_UNITS[currency.toUpperCase()] ?? DEFAULT_MINOR_UNITS;
}
