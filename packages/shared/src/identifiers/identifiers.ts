/**
 * Offline format checks for French business identifiers and EU VAT numbers.
 * No registry lookup is performed.
 */

/** SIREN: 9 digits identifying a legal unit */
export const SIREN_PATTERN = /^\d{9}$/;

/** SIRET: SIREN followed by a 5-digit establishment number */
export const SIRET_PATTERN = /^\d{14}$/;

/** France: FR + 2-character key + SIREN */
const FRENCH_VAT_PATTERN = /^FR[A-Z0-9]{2}\d{9}$/;

/** Any other member state, syntax only */
const GENERIC_VAT_PATTERN = /^[A-Z]{2}[A-Z0-9+*]{2,13}$/;

/**
 * EU member states (ISO 3166-1 alpha-2)
 */
export const EU_MEMBER_STATES = [
  'AT', 'BE', 'BG', 'CY', 'CZ', 'DE', 'DK', 'EE', 'ES', 'FI', 'FR', 'GR', 'HR', 'HU',
  'IE', 'IT', 'LT', 'LU', 'LV', 'MT', 'NL', 'PL', 'PT', 'RO', 'SE', 'SI', 'SK',
] as const;
export type EuMemberState = (typeof EU_MEMBER_STATES)[number];

const EU_MEMBER_STATE_SET: ReadonlySet<string> = new Set(EU_MEMBER_STATES);

/**
 * Uppercases and removes whitespace and common separators.
 *
 * @example normalizeIdentifier('fr 32 123.456-789') // 'FR32123456789'
 */
export function normalizeIdentifier(value: string): string {
  return value.toUpperCase().replace(/[\s.\-_]/g, '');
}

export function isValidSiren(value: string): boolean {
  return SIREN_PATTERN.test(value);
}

export function isValidSiret(value: string): boolean {
  return SIRET_PATTERN.test(value);
}

/**
 * The SIREN embedded in a SIRET, or undefined when the SIRET is malformed.
 */
export function sirenFromSiret(siret: string): string | undefined {
  return isValidSiret(siret) ? siret.slice(0, 9) : undefined;
}

export function isEuMemberState(countryCode: string): countryCode is EuMemberState {
  return EU_MEMBER_STATE_SET.has(countryCode.toUpperCase());
}

export interface VatNumberCheck {
  readonly valid: boolean;
  readonly normalized: string;
  /** VAT prefix; Greece uses "EL" */
  readonly prefix?: string;
  readonly reason?: string;
}

/**
 * Checks the syntax of an intra-community VAT number. French numbers are
 * checked against the FR + key + SIREN layout.
 */
export function validateVatNumberFormat(vatNumber: string): VatNumberCheck {
  const normalized = normalizeIdentifier(vatNumber);

  if (normalized.length < 4) {
    return { valid: false, normalized, reason: 'VAT number too short' };
  }

  const prefix = normalized.slice(0, 2);
  const country = prefix === 'EL' ? 'GR' : prefix;

  if (!isEuMemberState(country)) {
    return { valid: false, normalized, prefix, reason: `Unknown EU VAT prefix: ${prefix}` };
  }

  const pattern = prefix === 'FR' ? FRENCH_VAT_PATTERN : GENERIC_VAT_PATTERN;
  if (!pattern.test(normalized)) {
    return { valid: false, normalized, prefix, reason: `Invalid ${prefix} VAT number format` };
  }

  return { valid: true, normalized, prefix };
}
