/**
 * @einvoice-fr/ereporting
 *
 * Transactions outside the e-invoicing scope (B2C, international) and
 * payment data, reported periodically through the filing platform.
 *
 * @packageDocumentation
 */

export { EReporter, type EReporterOptions } from './ereporter.js';
export {
  transactionFromInvoice,
  prepareTransaction,
  aggregateTransactions,
  createSubmission,
  type SubmissionContent,
  type SubmissionOptions,
} from './transactions.js';
export { validateTransaction, validatePayment, validateAggregated } from './validation.js';
export { TRANSMISSION_SCHEDULES, nextDeadline } from './schedule.js';
export { nextDecadeEnd, endOfFollowingMonth } from './dates.js';
export {
  transactionDataSchema,
  paymentDataSchema,
  aggregatedTransactionDataSchema,
  taxBreakdownSchema,
} from './schemas.js';
export { EReportingError, EReportingValidationError, EReportingEmptyDeclarationError } from './errors.js';
