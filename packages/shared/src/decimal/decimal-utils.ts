/**
 * Decimal arithmetic utilities for monetary calculations.
 *
 * All amounts, quantities and rates are carried as strings (DecimalAmount)
 * and computed on bigint fixed-point values, never on binary floats.
 * Addition, subtraction and multiplication are exact unless a number of
 * decimal places is requested; rounding is always explicit.
 */

import type { DecimalAmount } from '@einvoice-fr/contracts';
import { EInvoiceError } from '../errors/errors.js';

/**
 * Rounding modes for decimal operations.
 *
 * - ROUND_HALF_UP (Commercial rounding): ties go away from zero. Required by
 *   EN16931 for VAT amounts.
 * - ROUND_HALF_EVEN (Banker's rounding): ties go to the even neighbour.
 * - ROUND_DOWN (Truncate): Always round towards zero.
 * - ROUND_UP: Always round away from zero.
 * - ROUND_CEILING: Always round towards positive infinity.
 * - ROUND_FLOOR: Always round towards negative infinity.
 */
export type RoundingMode =
  | 'ROUND_HALF_UP'
  | 'ROUND_HALF_EVEN'
  | 'ROUND_DOWN'
  | 'ROUND_UP'
  | 'ROUND_CEILING'
  | 'ROUND_FLOOR';

export const DEFAULT_ROUNDING_MODE: RoundingMode = 'ROUND_HALF_UP';

/**
 * Default decimal places for monetary amounts.
 */
export const DEFAULT_DECIMAL_PLACES = 2;

/**
 * Extra precision kept by `divide` before the final rounding.
 */
export const MAX_DECIMAL_PLACES = 8;

const DECIMAL_PATTERN = /^[+-]?\d+(\.\d+)?$/;

/**
 * Internal representation: value = units / 10^scale
 */
interface DecimalValue {
  units: bigint;
  scale: number;
}

export class DecimalFormatError extends EInvoiceError {
  constructor(value: string) {
    super(`Invalid decimal amount: '${value}'`, 'INVALID_DECIMAL', { value });
    this.name = 'DecimalFormatError';
  }
}

function pow10(exponent: number): bigint {
  return 10n ** BigInt(exponent);
}

function parseDecimal(str: string): DecimalValue {
  const trimmed = str.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) {
    throw new DecimalFormatError(str);
  }

  const negative = trimmed.startsWith('-');
  const unsigned = trimmed.replace(/^[+-]/, '');
  const [intPart = '0', fracPart = ''] = unsigned.split('.');
  const magnitude = BigInt(intPart + fracPart);

  return { units: negative ? -magnitude : magnitude, scale: fracPart.length };
}

function formatDecimal({ units, scale }: DecimalValue): string {
  const negative = units < 0n;
  let digits = (negative ? -units : units).toString();

  while (digits.length <= scale) {
    digits = '0' + digits;
  }

  const insertPoint = digits.length - scale;
  const body = scale > 0 ? `${digits.slice(0, insertPoint)}.${digits.slice(insertPoint)}` : digits;

  return negative ? `-${body}` : body;
}

function rescale(dec: DecimalValue, scale: number): bigint {
  return dec.units * pow10(scale - dec.scale);
}

/**
 * Round the magnitude, then restore the sign.
 */
function applyRounding(units: bigint, divisor: bigint, mode: RoundingMode): bigint {
  const negative = units < 0n;
  const magnitude = negative ? -units : units;
  const quotient = magnitude / divisor;
  const remainder = magnitude % divisor;

  if (remainder === 0n) {
    return negative ? -quotient : quotient;
  }

  const rounded = roundsAway(mode, negative, remainder * 2n, divisor, quotient) ? quotient + 1n : quotient;
  return negative ? -rounded : rounded;
}

function roundsAway(mode: RoundingMode, negative: boolean, twice: bigint, divisor: bigint, quotient: bigint): boolean {
  switch (mode) {
    case 'ROUND_DOWN':
      return false;
    case 'ROUND_UP':
      return true;
    case 'ROUND_CEILING':
      return !negative;
    case 'ROUND_FLOOR':
      return negative;
    case 'ROUND_HALF_UP':
      return twice >= divisor;
    case 'ROUND_HALF_EVEN':
      return twice > divisor || (twice === divisor && quotient % 2n === 1n);
  }
}

function roundValue(dec: DecimalValue, places: number, mode: RoundingMode): DecimalValue {
  if (dec.scale <= places) {
    return { units: rescale(dec, places), scale: places };
  }
  return { units: applyRounding(dec.units, pow10(dec.scale - places), mode), scale: places };
}

/**
 * Configuration for decimal operations.
 */
export interface DecimalConfig {
  /**
   * Rounding mode to use
   * @default 'ROUND_HALF_UP'
   */
  roundingMode?: RoundingMode;

  /**
   * Number of decimal places for results. When omitted, add/subtract/multiply
   * keep the exact scale and divide uses 2.
   */
  decimalPlaces?: number;
}

function finish(dec: DecimalValue, config: DecimalConfig): DecimalAmount {
  if (config.decimalPlaces === undefined) {
    return formatDecimal(dec);
  }
  return formatDecimal(roundValue(dec, config.decimalPlaces, config.roundingMode ?? DEFAULT_ROUNDING_MODE));
}

/**
 * Add two decimal amounts.
 */
export function add(a: DecimalAmount, b: DecimalAmount, config: DecimalConfig = {}): DecimalAmount {
  const decA = parseDecimal(a);
  const decB = parseDecimal(b);
  const scale = Math.max(decA.scale, decB.scale);
  return finish({ units: rescale(decA, scale) + rescale(decB, scale), scale }, config);
}

/**
 * Subtract two decimal amounts.
 */
export function subtract(a: DecimalAmount, b: DecimalAmount, config: DecimalConfig = {}): DecimalAmount {
  const decA = parseDecimal(a);
  const decB = parseDecimal(b);
  const scale = Math.max(decA.scale, decB.scale);
  return finish({ units: rescale(decA, scale) - rescale(decB, scale), scale }, config);
}

/**
 * Multiply two decimal amounts.
 */
export function multiply(a: DecimalAmount, b: DecimalAmount, config: DecimalConfig = {}): DecimalAmount {
  const decA = parseDecimal(a);
  const decB = parseDecimal(b);
  return finish({ units: decA.units * decB.units, scale: decA.scale + decB.scale }, config);
}

/**
 * Divide two decimal amounts.
 */
export function divide(a: DecimalAmount, b: DecimalAmount, config: DecimalConfig = {}): DecimalAmount {
  const decA = parseDecimal(a);
  const decB = parseDecimal(b);

  if (decB.units === 0n) {
    throw new EInvoiceError('Division by zero', 'DIVISION_BY_ZERO', { dividend: a });
  }

  const places = config.decimalPlaces ?? DEFAULT_DECIMAL_PLACES;
  const workingScale = places + MAX_DECIMAL_PLACES;

  // (units_a / 10^sa) / (units_b / 10^sb), expressed at workingScale
  const shift = workingScale - decA.scale + decB.scale;
  const numerator = shift >= 0 ? decA.units * pow10(shift) : decA.units;
  const denominator = shift >= 0 ? decB.units : decB.units * pow10(-shift);
  const quotient = numerator / denominator;

  return formatDecimal(
    roundValue({ units: quotient, scale: workingScale }, places, config.roundingMode ?? DEFAULT_ROUNDING_MODE),
  );
}

/**
 * Compare two decimal amounts.
 * Returns: -1 if a < b, 0 if a == b, 1 if a > b
 */
export function compare(a: DecimalAmount, b: DecimalAmount): -1 | 0 | 1 {
  const decA = parseDecimal(a);
  const decB = parseDecimal(b);
  const scale = Math.max(decA.scale, decB.scale);
  const valA = rescale(decA, scale);
  const valB = rescale(decB, scale);

  if (valA < valB) return -1;
  if (valA > valB) return 1;
  return 0;
}

/**
 * Check if two decimal amounts are equal, whatever their scale.
 */
export function equals(a: DecimalAmount, b: DecimalAmount): boolean {
  return compare(a, b) === 0;
}

export function isZero(a: DecimalAmount): boolean {
  return parseDecimal(a).units === 0n;
}

export function isNegative(a: DecimalAmount): boolean {
  return parseDecimal(a).units < 0n;
}

export function isPositive(a: DecimalAmount): boolean {
  return parseDecimal(a).units > 0n;
}

export function abs(a: DecimalAmount): DecimalAmount {
  const dec = parseDecimal(a);
  return formatDecimal({ units: dec.units < 0n ? -dec.units : dec.units, scale: dec.scale });
}

export function negate(a: DecimalAmount): DecimalAmount {
  const dec = parseDecimal(a);
  return formatDecimal({ units: -dec.units, scale: dec.scale });
}

/**
 * Round a decimal amount to exactly `places` decimals (padding when shorter).
 */
export function round(
  a: DecimalAmount,
  places: number = DEFAULT_DECIMAL_PLACES,
  mode: RoundingMode = DEFAULT_ROUNDING_MODE,
): DecimalAmount {
  return formatDecimal(roundValue(parseDecimal(a), places, mode));
}

/**
 * Sum an array of decimal amounts. Exact unless `decimalPlaces` is set;
 * rounding then happens once, on the total.
 */
export function sum(amounts: readonly DecimalAmount[], config: DecimalConfig = {}): DecimalAmount {
  const total = amounts.reduce((acc, amount) => add(acc, amount), '0');
  return finish(parseDecimal(total), config);
}

/**
 * amount × percent / 100, rounded once.
 *
 * @example percentage('200.00', '5.5') // => '11.00'
 */
export function percentage(amount: DecimalAmount, percent: DecimalAmount, config: DecimalConfig = {}): DecimalAmount {
  const product = parseDecimal(multiply(amount, percent));
  const exact = { units: product.units, scale: product.scale + 2 };
  return formatDecimal(
    roundValue(exact, config.decimalPlaces ?? DEFAULT_DECIMAL_PLACES, config.roundingMode ?? DEFAULT_ROUNDING_MODE),
  );
}

/**
 * Canonical form: no sign on zero, no leading "+" or superfluous leading
 * zeros. The scale is kept.
 *
 * @example normalizeDecimal('+007.50') // => '7.50'
 */
export function normalizeDecimal(value: string): DecimalAmount {
  return formatDecimal(parseDecimal(value));
}

/**
 * Validate that a string is a valid decimal amount.
 */
export function isValidDecimalAmount(value: string): boolean {
  return DECIMAL_PATTERN.test(value.trim());
}

/**
 * Create a decimal amount from a number. Uses the shortest representation
 * of the number unless `decimalPlaces` is given.
 */
export function fromNumber(value: number, decimalPlaces?: number): DecimalAmount {
  const text = decimalPlaces === undefined ? String(value) : value.toFixed(decimalPlaces);
  if (!Number.isFinite(value) || !DECIMAL_PATTERN.test(text)) {
    throw new DecimalFormatError(String(value));
  }
  return normalizeDecimal(text);
}
