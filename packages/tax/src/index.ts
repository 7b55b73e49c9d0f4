/**
 * @einvoice-fr/tax
 *
 * Tax engine: per-line net amounts, VAT breakdown and document totals.
 *
 * @packageDocumentation
 */

export { computeTotals, lineNetAmount, type TaxableDocument } from './totals.js';
export { minorUnitsFor, DEFAULT_MINOR_UNITS } from './currency.js';
