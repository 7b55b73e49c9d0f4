import {
  EXEMPT_VAT_CATEGORIES,
  type AggregatedTransactionData,
  type CountryCode,
  type EReportingSubmission,
  type EReportingTransactionType,
  type ISODate,
  type InvoiceData,
  type OperationCategory,
  type PaymentData,
  type TaxBreakdown,
  type TransactionData,
} from '@einvoice-fr/contracts';
import { add, equals, generateUuid, sirenFromSiret, type GenerateIdOptions } from '@einvoice-fr/shared';
import { computeTotals } from '@einvoice-fr/tax';
import { EReportingEmptyDeclarationError, EReportingValidationError } from './errors.js';
import { validateTransaction } from './validation.js';

export interface SubmissionOptions extends GenerateIdOptions {
  /** Clock used for `createdAt` */
  now?: () => Date;
}

function sellerSirenOf(invoice: InvoiceData): string {
  const { siren, siret } = invoice.seller;
  return siren ?? (siret !== undefined ? sirenFromSiret(siret) : undefined) ?? '';
}

/**
 * Transaction record derived from an invoice. Amounts and identifiers are
 * copied, so the record keeps no reference to the invoice. The seller SIREN
 * is empty when the invoice carries none, which validation rejects.
 */
export function transactionFromInvoice(
  invoice: InvoiceData,
  transactionType: EReportingTransactionType,
  countryCode?: CountryCode,
  options?: GenerateIdOptions,
): TransactionData {
  const totals = computeTotals(invoice);
  const [first, ...others] = totals.taxSummaries;
  const singleRate =
    first !== undefined && others.every((summary) => equals(summary.vatRate, first.vatRate)) ? first.vatRate : undefined;
  const exempt = invoice.lines.every((line) => EXEMPT_VAT_CATEGORIES.has(line.vatCategory));

  return {
    transactionId: generateUuid(options),
    sellerSiren: sellerSirenOf(invoice),
    transactionType,
    invoiceDate: invoice.issueDate,
    invoiceNumber: invoice.number,
    ...(invoice.billingPeriod !== undefined
      ? { periodStart: invoice.billingPeriod.start, periodEnd: invoice.billingPeriod.end }
      : {}),
    operationCategory: invoice.operationCategory,
    totalExclTax: totals.netTotal,
    vatAmount: totals.taxTotal,
    ...(singleRate !== undefined ? { vatRate: singleRate } : {}),
    vatExemption: exempt,
    vatOnDebits: invoice.vatOnDebits,
    ...(countryCode !== undefined ? { countryCode } : {}),
    currency: invoice.currency,
  };
}

export type SubmissionContent =
  | { transmissionMode: 'individual'; transactionData: TransactionData }
  | { transmissionMode: 'individual'; paymentData: PaymentData }
  | { transmissionMode: 'aggregated'; aggregatedData: AggregatedTransactionData };

export function createSubmission(content: SubmissionContent, options: SubmissionOptions = {}): EReportingSubmission {
  const now = options.now ?? (() => new Date());
  return {
    submissionId: generateUuid(options),
    createdAt: now().toISOString(),
    ...content,
  };
}

/**
 * Individual submission for one transaction.
 *
 * @throws EReportingValidationError listing every finding
 */
export function prepareTransaction(transaction: TransactionData, options?: SubmissionOptions): EReportingSubmission {
  const errors = validateTransaction(transaction);
  if (errors.length > 0) {
    throw new EReportingValidationError('Invalid e-reporting transaction', errors);
  }
  return createSubmission({ transmissionMode: 'individual', transactionData: transaction }, options);
}

function sameBreakdown(breakdown: TaxBreakdown, transaction: TransactionData): boolean {
  if (breakdown.vatExemption !== transaction.vatExemption) return false;
  if (breakdown.vatRate === undefined || transaction.vatRate === undefined) {
    return breakdown.vatRate === transaction.vatRate;
  }
  return equals(breakdown.vatRate, transaction.vatRate);
}

/**
 * Period totals per VAT rate, in order of first appearance.
 *
 * @throws EReportingEmptyDeclarationError when the list is empty
 * @throws EReportingValidationError when the transactions belong to several sellers
 * or are in several currencies
 */
export function aggregateTransactions(
  transactions: readonly TransactionData[],
  periodStart: ISODate,
  periodEnd: ISODate,
): AggregatedTransactionData {
  const [first] = transactions;
  if (first === undefined) {
    throw new EReportingEmptyDeclarationError();
  }

  const sirens = [...new Set(transactions.map((transaction) => transaction.sellerSiren))];
  if (sirens.length > 1) {
    throw new EReportingValidationError('Aggregated transactions must share the same SIREN', [
      `Found several seller SIRENs: ${sirens.join(', ')}`,
    ]);
  }

  const currencies = [...new Set(transactions.map((transaction) => transaction.currency))];
  if (currencies.length > 1) {
    throw new EReportingValidationError('Aggregated transactions must share the same currency', [
      `Found several currencies: ${currencies.join(', ')}`,
    ]);
  }

  const breakdowns: TaxBreakdown[] = [];
  for (const transaction of transactions) {
    const index = breakdowns.findIndex((breakdown) => sameBreakdown(breakdown, transaction));
    const existing = breakdowns[index];
    if (existing === undefined) {
      breakdowns.push({
        ...(transaction.vatRate !== undefined ? { vatRate: transaction.vatRate } : {}),
        vatExemption: transaction.vatExemption,
        taxableAmount: transaction.totalExclTax,
        vatAmount: transaction.vatAmount,
      });
    } else {
      breakdowns[index] = {
        ...existing,
        taxableAmount: add(existing.taxableAmount, transaction.totalExclTax),
        vatAmount: add(existing.vatAmount, transaction.vatAmount),
      };
    }
  }

  const categories = new Set(transactions.map((transaction) => transaction.operationCategory));
  const operationCategory: OperationCategory = categories.size === 1 ? first.operationCategory : 'mixed';

  return {
    sellerSiren: first.sellerSiren,
    periodStart,
    periodEnd,
    operationCategory,
    taxBreakdowns: breakdowns,
    vatOnDebits: transactions.some((transaction) => transaction.vatOnDebits),
  };
}
