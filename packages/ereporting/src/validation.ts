import {
  isCodeOf,
  type AggregatedTransactionData,
  type EReportingTransactionType,
  type PaymentData,
  type TransactionData,
} from '@einvoice-fr/contracts';
import { isValidDecimalAmount, isZero } from '@einvoice-fr/shared';
import { EReportingEmptyDeclarationError } from './errors.js';
import { aggregatedTransactionDataSchema, paymentDataSchema, shapeErrors, transactionDataSchema } from './schemas.js';

const INTERNATIONAL_TYPES = ['b2b_intra_eu', 'b2b_extra_eu'] as const satisfies readonly EReportingTransactionType[];

function sirenMismatch(actual: string, expected: string | undefined): string[] {
  return expected !== undefined && actual !== expected
    ? [`Seller SIREN ${actual} does not match the reporting SIREN ${expected}`]
    : [];
}

function periodOrder(start: string | undefined, end: string | undefined): string[] {
  return start !== undefined && end !== undefined && start > end ? ['Period start must not be after period end'] : [];
}

/**
 * Findings for one transaction; empty when it can be reported. With
 * `expectedSiren`, the seller must be that company.
 */
export function validateTransaction(transaction: TransactionData, expectedSiren?: string): string[] {
  const errors = shapeErrors(transactionDataSchema, transaction);
  errors.push(...sirenMismatch(transaction.sellerSiren, expectedSiren));

  if (isCodeOf(INTERNATIONAL_TYPES, transaction.transactionType)) {
    if (transaction.countryCode === undefined) {
      errors.push(`Country code is required for ${transaction.transactionType} transactions`);
    } else if (transaction.countryCode === 'FR') {
      errors.push(`Country code must not be FR for ${transaction.transactionType} transactions`);
    }
  }

  const hasPeriod = transaction.periodStart !== undefined && transaction.periodEnd !== undefined;
  if (transaction.invoiceDate === undefined && !hasPeriod) {
    errors.push('An invoice date or a full period (start and end) is required');
  }
  errors.push(...periodOrder(transaction.periodStart, transaction.periodEnd));

  if (transaction.vatRate === undefined && !transaction.vatExemption) {
    errors.push('A VAT rate or a VAT exemption is required');
  }
  return errors;
}

export function validatePayment(payment: PaymentData, expectedSiren?: string): string[] {
  return [...shapeErrors(paymentDataSchema, payment), ...sirenMismatch(payment.sellerSiren, expectedSiren)];
}

function isBlank(aggregate: AggregatedTransactionData): boolean {
  return aggregate.taxBreakdowns.every(
    (breakdown) =>
      isValidDecimalAmount(breakdown.taxableAmount) &&
      isValidDecimalAmount(breakdown.vatAmount) &&
      isZero(breakdown.taxableAmount) &&
      isZero(breakdown.vatAmount),
  );
}

/**
 * @throws EReportingEmptyDeclarationError when every breakdown is zero
 */
export function validateAggregated(aggregate: AggregatedTransactionData, expectedSiren?: string): string[] {
  if (aggregate.taxBreakdowns.length > 0 && isBlank(aggregate)) {
    throw new EReportingEmptyDeclarationError();
  }
  return [
    ...shapeErrors(aggregatedTransactionDataSchema, aggregate),
    ...sirenMismatch(aggregate.sellerSiren, expectedSiren),
    ...periodOrder(aggregate.periodStart, aggregate.periodEnd),
  ];
}
