import type { OperationCategory } from '../core/codes.js';
import type { CountryCode, CurrencyCode, DecimalAmount, ISODate, ISODateTime } from '../core/primitives.js';

/**
 * Seller VAT regime, which drives the transmission frequency
 */
export const VAT_REGIMES = ['real_normal_monthly', 'real_normal_quarterly', 'simplified_real', 'franchise'] as const;
export type VatRegime = (typeof VAT_REGIMES)[number];

/**
 * Transactions outside the e-invoicing scope that must be e-reported
 */
export const EREPORTING_TRANSACTION_TYPES = ['b2c_domestic', 'b2b_intra_eu', 'b2b_extra_eu'] as const;
export type EReportingTransactionType = (typeof EREPORTING_TRANSACTION_TYPES)[number];

export type EReportingTransmissionMode = 'individual' | 'aggregated';

/**
 * VAT breakdown line of an aggregated declaration
 */
export interface TaxBreakdown {
  readonly vatRate?: DecimalAmount;
  readonly vatExemption: boolean;
  readonly taxableAmount: DecimalAmount;
  readonly vatAmount: DecimalAmount;
}

/**
 * A single e-reported transaction
 */
export interface TransactionData {
  readonly transactionId: string;
  readonly sellerSiren: string;
  readonly transactionType: EReportingTransactionType;
  readonly periodStart?: ISODate;
  readonly periodEnd?: ISODate;
  readonly invoiceDate?: ISODate;
  readonly invoiceNumber?: string;
  readonly operationCategory: OperationCategory;
  readonly totalExclTax: DecimalAmount;
  readonly vatAmount: DecimalAmount;

  /** Present when every line shares one rate */
  readonly vatRate?: DecimalAmount;

  readonly vatExemption: boolean;
  /** VAT due in France (reverse charge on the buyer side) */
  readonly taxDueInFrance?: DecimalAmount;
  readonly vatOnDebits: boolean;

  /** Counterparty country, required for international transactions */
  readonly countryCode?: CountryCode;

  readonly currency: CurrencyCode;
}

/**
 * Collection of an amount (services taxed on receipts)
 */
export interface PaymentData {
  readonly paymentId: string;
  readonly sellerSiren: string;
  readonly cashingDate: ISODate;
  readonly cashedAmount: DecimalAmount;
  readonly currency: CurrencyCode;
  readonly invoiceReference: string;
}

/**
 * Period totals per VAT rate (B2C daily totals)
 */
export interface AggregatedTransactionData {
  readonly sellerSiren: string;
  readonly periodStart: ISODate;
  readonly periodEnd: ISODate;
  readonly operationCategory: OperationCategory;
  readonly taxBreakdowns: readonly TaxBreakdown[];
  readonly vatOnDebits: boolean;
}

export interface EReportingSubmission {
  readonly submissionId: string;
  readonly transmissionMode: EReportingTransmissionMode;
  readonly transactionData?: TransactionData;
  readonly aggregatedData?: AggregatedTransactionData;
  readonly paymentData?: PaymentData;
  readonly createdAt: ISODateTime;
}

export type TransmissionFrequency = 'every_10_days' | 'monthly';

export interface TransmissionSchedule {
  readonly vatRegime: VatRegime;
  readonly transactionFrequency: TransmissionFrequency;

  /** Null when payment data is not reported (franchise) */
  readonly paymentFrequency: TransmissionFrequency | null;
}
