import type {
  AggregatedTransactionData,
  CountryCode,
  EReportingSubmission,
  EReportingTransactionType,
  ISODate,
  InvoiceData,
  PaymentData,
  TransactionData,
  TransmissionSchedule,
  VatRegime,
} from '@einvoice-fr/contracts';
import { createSafeLogger, isValidSiren, type IdGenerator, type Logger } from '@einvoice-fr/shared';
import { EReportingValidationError } from './errors.js';
import { TRANSMISSION_SCHEDULES, nextDeadline } from './schedule.js';
import {
  aggregateTransactions,
  createSubmission,
  transactionFromInvoice,
  type SubmissionContent,
  type SubmissionOptions,
} from './transactions.js';
import { validateAggregated, validatePayment, validateTransaction } from './validation.js';

export interface EReporterOptions {
  logger?: Logger;
  /** Transaction and submission ids; UUIDs by default */
  idGenerator?: IdGenerator;
  now?: () => Date;
}

/**
 * E-reporting for one seller: checks records against the seller's SIREN,
 * wraps them into submissions and computes transmission deadlines from the
 * VAT regime.
 */
export class EReporter {
  readonly sellerSiren: string;
  readonly vatRegime: VatRegime;
  private readonly logger: Logger;
  private readonly submissionOptions: SubmissionOptions;

  /**
   * @throws EReportingValidationError when the SIREN is not 9 digits
   */
  constructor(sellerSiren: string, vatRegime: VatRegime, options: EReporterOptions = {}) {
    if (!isValidSiren(sellerSiren)) {
      throw new EReportingValidationError(`Invalid seller SIREN: ${sellerSiren}`, ['SIREN must be exactly 9 digits']);
    }
    this.sellerSiren = sellerSiren;
    this.vatRegime = vatRegime;
    this.logger = options.logger ?? createSafeLogger({ prefix: 'ereporting' });
    this.submissionOptions = {
      ...(options.idGenerator !== undefined ? { idGenerator: options.idGenerator } : {}),
      ...(options.now !== undefined ? { now: options.now } : {}),
    };
  }

  transactionFromInvoice(
    invoice: InvoiceData,
    transactionType: EReportingTransactionType,
    countryCode?: CountryCode,
  ): TransactionData {
    return transactionFromInvoice(invoice, transactionType, countryCode, this.submissionOptions);
  }

  validateTransaction(transaction: TransactionData): string[] {
    return validateTransaction(transaction, this.sellerSiren);
  }

  validatePayment(payment: PaymentData): string[] {
    return validatePayment(payment, this.sellerSiren);
  }

  /**
   * @throws EReportingEmptyDeclarationError when every breakdown is zero
   */
  validateAggregated(aggregate: AggregatedTransactionData): string[] {
    return validateAggregated(aggregate, this.sellerSiren);
  }

  /**
   * @throws EReportingValidationError listing every finding
   */
  prepareTransaction(transaction: TransactionData): EReportingSubmission {
    this.assertValid('transaction', this.validateTransaction(transaction));
    return this.submit({ transmissionMode: 'individual', transactionData: transaction });
  }

  /**
   * @throws EReportingValidationError listing every finding
   * @throws EReportingEmptyDeclarationError when every breakdown is zero
   */
  prepareAggregated(aggregate: AggregatedTransactionData): EReportingSubmission {
    this.assertValid('aggregate', this.validateAggregated(aggregate));
    return this.submit({ transmissionMode: 'aggregated', aggregatedData: aggregate });
  }

  /**
   * @throws EReportingValidationError listing every finding
   */
  preparePayment(payment: PaymentData): EReportingSubmission {
    this.assertValid('payment', this.validatePayment(payment));
    return this.submit({ transmissionMode: 'individual', paymentData: payment });
  }

  aggregateTransactions(
    transactions: readonly TransactionData[],
    periodStart: ISODate,
    periodEnd: ISODate,
  ): AggregatedTransactionData {
    return aggregateTransactions(transactions, periodStart, periodEnd);
  }

  getTransmissionSchedule(): TransmissionSchedule {
    return TRANSMISSION_SCHEDULES[this.vatRegime];
  }

  /**
   * @example nextTransactionDeadline('2026-09-15') // => '2026-09-20' every 10 days
   */
  nextTransactionDeadline(date: ISODate): ISODate {
    return nextDeadline(this.getTransmissionSchedule().transactionFrequency, date);
  }

  /** Null when the regime reports no payment data */
  nextPaymentDeadline(date: ISODate): ISODate | null {
    const frequency = this.getTransmissionSchedule().paymentFrequency;
    return frequency === null ? null : nextDeadline(frequency, date);
  }

  private assertValid(kind: string, errors: string[]): void {
    if (errors.length > 0) {
      this.logger.warn('E-reporting data rejected', { kind, errors: errors.length });
      throw new EReportingValidationError(`Invalid e-reporting ${kind}`, errors);
    }
  }

  private submit(content: SubmissionContent): EReportingSubmission {
    const submission = createSubmission(content, this.submissionOptions);
    this.logger.debug('E-reporting submission prepared', {
      submissionId: submission.submissionId,
      mode: submission.transmissionMode,
    });
    return submission;
  }
}
