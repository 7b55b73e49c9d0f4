import { describe, it, expect } from 'vitest';
import {
  add,
  subtract,
  multiply,
  divide,
  sum,
  percentage,
  round,
  abs,
  negate,
  compare,
  equals,
  isZero,
  isNegative,
  isPositive,
  normalizeDecimal,
  isValidDecimalAmount,
  fromNumber,
  DecimalFormatError,
} from './decimal-utils.js';

describe('decimal arithmetic', () => {
  it('should add exactly', () => {
    expect(add('0.1', '0.2')).toBe('0.3');
    expect(add('1.005', '2', { decimalPlaces: 2 })).toBe('3.01');
  });

  it('should subtract into negatives', () => {
    expect(subtract('10', '12.50')).toBe('-2.50');
  });

  it('should multiply keeping the combined scale', () => {
    expect(multiply('100', '2.00')).toBe('200.00');
    expect(multiply('3', '1.333', { decimalPlaces: 2 })).toBe('4.00');
    expect(multiply('-2', '1.5')).toBe('-3.0');
  });

  it('should divide with rounding', () => {
    expect(divide('10', '3')).toBe('3.33');
    expect(divide('2', '3')).toBe('0.67');
    expect(divide('-2', '3')).toBe('-0.67');
    expect(() => divide('1', '0.00')).toThrow('Division by zero');
  });

  it('should sum exactly and round once when asked', () => {
    expect(sum(['0.1', '0.2', '0.3'])).toBe('0.6');
    expect(sum([])).toBe('0');
    expect(sum(['1.005', '1.005'], { decimalPlaces: 2 })).toBe('2.01');
  });

  it('should compute percentages', () => {
    expect(percentage('200.00', '5.5')).toBe('11.00');
    expect(percentage('150.00', '20.0')).toBe('30.00');
    expect(percentage('10.05', '5.5')).toBe('0.55');
  });
});

describe('round', () => {
  it('should round half away from zero by default', () => {
    expect(round('2.345')).toBe('2.35');
    expect(round('-2.345')).toBe('-2.35');
    expect(round('2.344')).toBe('2.34');
  });

  it('should pad to the requested places', () => {
    expect(round('5')).toBe('5.00');
    expect(round('5', 0)).toBe('5');
  });

  it('should not produce negative zero', () => {
    expect(round('-0.004')).toBe('0.00');
  });

  it('should honour the other modes', () => {
    expect(round('2.345', 2, 'ROUND_HALF_EVEN')).toBe('2.34');
    expect(round('2.355', 2, 'ROUND_HALF_EVEN')).toBe('2.36');
    expect(round('-1.001', 2, 'ROUND_FLOOR')).toBe('-1.01');
    expect(round('-1.009', 2, 'ROUND_CEILING')).toBe('-1.00');
    expect(round('1.001', 2, 'ROUND_UP')).toBe('1.01');
    expect(round('1.009', 2, 'ROUND_DOWN')).toBe('1.00');
  });
});

describe('comparisons', () => {
  it('should compare across scales', () => {
    expect(compare('2.50', '2.5')).toBe(0);
    expect(compare('-1', '0')).toBe(-1);
    expect(compare('10', '9.99')).toBe(1);
    expect(equals('100', '100.00')).toBe(true);
  });

  it('should classify sign', () => {
    expect(isZero('0.00')).toBe(true);
    expect(isNegative('-0.00')).toBe(false);
    expect(isNegative('-0.01')).toBe(true);
    expect(isPositive('0.01')).toBe(true);
  });

  it('should take absolute values and negate', () => {
    expect(abs('-3.10')).toBe('3.10');
    expect(negate('3.10')).toBe('-3.10');
    expect(negate('0')).toBe('0');
  });
});

describe('parsing and conversion', () => {
  it('should normalise textual decimals', () => {
    expect(normalizeDecimal('+007.50')).toBe('7.50');
    expect(normalizeDecimal('-0.0')).toBe('0.0');
  });

  it('should validate decimal syntax', () => {
    expect(isValidDecimalAmount(' 12.5 ')).toBe(true);
    expect(isValidDecimalAmount('1e5')).toBe(false);
    expect(isValidDecimalAmount('12.')).toBe(false);
    expect(isValidDecimalAmount('.5')).toBe(false);
  });

  it('should reject malformed input', () => {
    expect(() => add('abc', '1')).toThrow(DecimalFormatError);
    expect(() => add('abc', '1')).toThrow("Invalid decimal amount: 'abc'");
  });

  it('should convert numbers', () => {
    expect(fromNumber(5.5)).toBe('5.5');
    expect(fromNumber(20)).toBe('20');
    expect(fromNumber(0.1 + 0.2, 2)).toBe('0.30');
    expect(() => fromNumber(Number.NaN)).toThrow(DecimalFormatError);
    expect(() => fromNumber(1e21)).toThrow(DecimalFormatError);
  });
});
