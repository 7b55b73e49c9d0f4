import { describe, it, expect } from 'vitest';
import {
  normalizeIdentifier,
  isValidSiren,
  isValidSiret,
  sirenFromSiret,
  isEuMemberState,
  validateVatNumberFormat,
} from './identifiers.js';

describe('normalizeIdentifier', () => {
  it('should uppercase and strip separators', () => {
    expect(normalizeIdentifier('fr 32 123.456-789')).toBe('FR32123456789');
    expect(normalizeIdentifier('  123_456_789 ')).toBe('123456789');
  });
});

describe('SIREN / SIRET', () => {
  it('should accept exactly 9 digits as SIREN', () => {
    expect(isValidSiren('123456789')).toBe(true);
    expect(isValidSiren('12345')).toBe(false);
    expect(isValidSiren('12345678A')).toBe(false);
    expect(isValidSiren('1234567890')).toBe(false);
  });

  it('should accept exactly 14 digits as SIRET', () => {
    expect(isValidSiret('12345678900012')).toBe(true);
    expect(isValidSiret('123456789')).toBe(false);
  });

  it('should extract the SIREN from a SIRET', () => {
    expect(sirenFromSiret('12345678900012')).toBe('123456789');
    expect(sirenFromSiret('1234')).toBeUndefined();
  });
});

describe('isEuMemberState', () => {
  it('should recognise member states case-insensitively', () => {
    expect(isEuMemberState('DE')).toBe(true);
    expect(isEuMemberState('fr')).toBe(true);
    expect(isEuMemberState('US')).toBe(false);
    expect(isEuMemberState('GB')).toBe(false);
  });
});

describe('validateVatNumberFormat', () => {
  it('should accept a French VAT number', () => {
    expect(validateVatNumberFormat('FR32123456789')).toEqual({
      valid: true,
      normalized: 'FR32123456789',
      prefix: 'FR',
    });
  });

  it('should reject a French VAT number without the SIREN part', () => {
    const result = validateVatNumberFormat('FR1234');
    expect(result.valid).toBe(false);
    expect(result.reason).toBe('Invalid FR VAT number format');
  });

  it('should accept the EL prefix for Greece', () => {
    expect(validateVatNumberFormat('EL123456789').valid).toBe(true);
  });

  it('should reject unknown prefixes', () => {
    const result = validateVatNumberFormat('US123456789');
    expect(result.valid).toBe(false);
    expect(result.reason).toBe('Unknown EU VAT prefix: US');
  });

  it('should reject too short input', () => {
    expect(validateVatNumberFormat('DE1')).toEqual({
      valid: false,
      normalized: 'DE1',
      reason: 'VAT number too short',
    });
  });
});
