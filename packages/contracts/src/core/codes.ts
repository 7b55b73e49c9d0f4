/**
 * Closed code sets used across the engine (EN16931, UNTDID, UN/ECE and
 * the French lifecycle and e-reporting code lists).
 *
 * Each set is a `const` tuple so that the union type and the runtime
 * membership check come from the same source.
 */

/**
 * Document type codes (UNTDID 1001 subset)
 */
export const INVOICE_TYPE_CODES = ['380', '381', '383', '384', '386', '389'] as const;
export type InvoiceTypeCode = (typeof INVOICE_TYPE_CODES)[number];

export const INVOICE_TYPE_NAMES: Readonly<Record<InvoiceTypeCode, string>> = {
  '380': 'Commercial invoice',
  '381': 'Credit note',
  '383': 'Debit note',
  '384': 'Corrected invoice',
  '386': 'Prepayment invoice',
  '389': 'Self-billed invoice',
};

/**
 * Types that correct or cancel an earlier invoice and therefore must
 * reference it.
 */
export const CORRECTIVE_TYPE_CODES: ReadonlySet<InvoiceTypeCode> = new Set(['381', '384']);

/**
 * Operation category, a mandatory mention since the 2026 reform
 */
export const OPERATION_CATEGORIES = ['delivery', 'service', 'mixed'] as const;
export type OperationCategory = (typeof OPERATION_CATEGORIES)[number];

export const OPERATION_CATEGORY_LABELS: Readonly<Record<OperationCategory, string>> = {
  delivery: 'Livraison de biens',
  service: 'Prestation de services',
  mixed: 'Livraison de biens et prestation de services',
};

/**
 * VAT category codes (UNTDID 5305 subset)
 */
export const VAT_CATEGORIES = ['S', 'Z', 'E', 'AE', 'K', 'G', 'O', 'L', 'M'] as const;
export type VatCategory = (typeof VAT_CATEGORIES)[number];

export const VAT_CATEGORY_NAMES: Readonly<Record<VatCategory, string>> = {
  S: 'Standard rate',
  Z: 'Zero rated',
  E: 'Exempt',
  AE: 'Reverse charge',
  K: 'Intra-community supply',
  G: 'Export outside the EU',
  O: 'Not subject to VAT',
  L: 'Canary Islands general indirect tax',
  M: 'Ceuta and Melilla tax',
};

/**
 * Categories for which the seller charges no VAT
 */
export const EXEMPT_VAT_CATEGORIES: ReadonlySet<VatCategory> = new Set(['Z', 'E', 'AE', 'K', 'G', 'O']);

/**
 * Units of measure (UN/ECE Recommendation 20 subset)
 */
export const UNITS_OF_MEASURE = [
  'C62', // unit
  'HUR', // hour
  'DAY', // day
  'MON', // month
  'ANN', // year
  'KGM', // kilogram
  'MTR', // metre
  'MTK', // square metre
  'LTR', // litre
  'XPP', // piece
  'SET', // set
  'PR', // pair
] as const;
export type UnitOfMeasure = (typeof UNITS_OF_MEASURE)[number];

/**
 * Payment means (UNTDID 4461 subset)
 */
export const PAYMENT_MEANS_CODES = ['10', '20', '30', '42', '48', '49', '58', '59'] as const;
export type PaymentMeansCode = (typeof PAYMENT_MEANS_CODES)[number];

/**
 * Currencies commonly used in French invoicing. The model accepts any
 * ISO 4217 code; this list feeds configuration defaults and documentation.
 */
export const COMMON_CURRENCIES = ['EUR', 'USD', 'GBP', 'CHF'] as const;

/**
 * Type guard over a `const` code tuple.
 */
export function isCodeOf<T extends string>(codes: readonly T[], value: string): value is T {
  const known: readonly string[] = codes;
  return known.includes(value);
}
