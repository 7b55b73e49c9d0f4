/**
 * @einvoice-fr/model
 *
 * Invoice domain model. Inputs are validated with zod, defaults applied and
 * construction-time contracts enforced; the resulting values are immutable.
 *
 * @packageDocumentation
 */

export { Invoice, createInvoice, createInvoiceLine, createParty, createAddress } from './invoice.js';
export {
  addressSchema,
  partySchema,
  invoiceLineSchema,
  subLineSchema,
  invoiceSchema,
  paymentTermsSchema,
  paymentMeansSchema,
  bankAccountSchema,
  billingPeriodSchema,
  decimalSchema,
  isoDateSchema,
  MODEL_RULES,
  type AddressInput,
  type PartyInput,
  type InvoiceLineInput,
  type InvoiceInput,
} from './schemas.js';
export { deepFreeze } from './freeze.js';
export { formatPath } from './violations.js';
