import type { InvoiceData } from '../core/invoice.js';
import type { CurrencyCode, DecimalAmount, ISODate, ISODateTime } from '../core/primitives.js';
import type { EReportingSubmission } from '../ereporting/ereporting.js';
import type { InvoiceStatus, LifecycleEvent } from '../lifecycle/lifecycle.js';

export type PdpEnvironment = 'sandbox' | 'production';

export type InvoiceDirection = 'sent' | 'received';

export interface SubmissionResponse {
  readonly invoiceId: string;
  readonly status: InvoiceStatus;
  readonly submittedAt: ISODateTime;
  readonly rawResponse?: Record<string, unknown>;
}

export interface LifecycleResponse {
  readonly invoiceId: string;
  readonly currentStatus: InvoiceStatus;
  readonly events: readonly LifecycleEvent[];
}

export interface StatusUpdateResponse {
  readonly invoiceId: string;
  readonly status: InvoiceStatus;
  readonly updatedAt: ISODateTime;
}

export interface InvoiceSearchFilters {
  readonly status?: InvoiceStatus;
  readonly dateFrom?: ISODate;
  readonly dateTo?: ISODate;
  readonly sellerSiren?: string;
  readonly buyerSiren?: string;
  readonly direction?: InvoiceDirection;

  /** @default 1 */
  readonly page?: number;

  /**
   * Between 1 and 500
   * @default 50
   */
  readonly pageSize?: number;
}

export interface InvoiceSearchResult {
  readonly invoiceId: string;
  readonly number: string;
  readonly issueDate: ISODate;
  readonly sellerName: string;
  readonly buyerName: string;
  readonly totalInclTax: DecimalAmount;
  readonly currency: CurrencyCode;
  readonly status: InvoiceStatus;
  readonly direction: InvoiceDirection;
}

export interface InvoiceSearchResponse {
  readonly results: readonly InvoiceSearchResult[];
  readonly totalCount: number;
  readonly page: number;
  readonly pageSize: number;
}

export interface EReportingSubmissionResponse {
  readonly submissionId: string;
  readonly status: 'accepted' | 'rejected' | 'pending';
  readonly submittedAt: ISODateTime;
  readonly errors?: readonly string[];
  readonly rawResponse?: Record<string, unknown>;
}

/**
 * Central directory entry (SIREN to receiving platform)
 */
export interface DirectoryEntry {
  readonly siren: string;
  readonly companyName: string;
  readonly platformId: string;
  readonly platformName: string;
  readonly electronicAddress: string;
  readonly registrationDate?: ISODate;
}

export interface StatusUpdateOptions {
  readonly reason?: string;
  readonly reasonCode?: string;
  readonly amount?: DecimalAmount;
}

/**
 * Capability set of an accredited filing platform (PDP/PA).
 *
 * Every operation may reject with one of the platform errors:
 * authentication, validation (with reasons), not found, connection.
 * Implementations perform no retry.
 */
export interface PdpConnector {
  readonly name: string;

  submit(invoice: InvoiceData, xmlBytes?: Uint8Array, pdfBytes?: Uint8Array): Promise<SubmissionResponse>;

  getStatus(invoiceId: string): Promise<InvoiceStatus>;

  getLifecycle(invoiceId: string): Promise<LifecycleResponse>;

  /** Returns the stored XML, or the PDF when no XML was submitted */
  getInvoice(invoiceId: string): Promise<Uint8Array>;

  searchInvoices(filters?: InvoiceSearchFilters): Promise<InvoiceSearchResponse>;

  updateStatus(invoiceId: string, status: InvoiceStatus, options?: StatusUpdateOptions): Promise<StatusUpdateResponse>;

  lookupDirectory(siren: string): Promise<DirectoryEntry>;

  submitEreportingTransaction(submission: EReportingSubmission): Promise<EReportingSubmissionResponse>;

  submitEreportingPayment(submission: EReportingSubmission): Promise<EReportingSubmissionResponse>;

  getEreportingStatus(submissionId: string): Promise<EReportingSubmissionResponse>;
}
