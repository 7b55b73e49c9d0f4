/**
 * Scalar types shared by every package.
 *
 * Monetary amounts, quantities and rates are carried as decimal strings and
 * only ever manipulated through the exact arithmetic in `@einvoice-fr/shared`.
 */

/**
 * Decimal value represented as string to avoid floating-point issues.
 *
 * @example "1234.56", "-100.00", "5.5"
 */
export type DecimalAmount = string;

/**
 * ISO 4217 currency code
 * @example "EUR", "USD", "CHF"
 */
export type CurrencyCode = string;

/**
 * ISO 8601 calendar date
 * @example "2026-09-15"
 */
export type ISODate = string;

/**
 * ISO 8601 date-time in UTC
 * @example "2026-09-15T08:30:00.000Z"
 */
export type ISODateTime = string;

/**
 * ISO 3166-1 alpha-2 country code
 * @example "FR", "DE"
 */
export type CountryCode = string;
