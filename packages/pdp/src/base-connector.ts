import { z } from 'zod';
import {
  INVOICE_STATUSES,
  type DirectoryEntry,
  type EReportingSubmission,
  type EReportingSubmissionResponse,
  type InvoiceData,
  type InvoiceSearchFilters,
  type InvoiceSearchResponse,
  type InvoiceStatus,
  type LifecycleResponse,
  type PdpConnector,
  type PdpEnvironment,
  type StatusUpdateOptions,
  type StatusUpdateResponse,
  type SubmissionResponse,
} from '@einvoice-fr/contracts';
import { SIREN_PATTERN, createSafeLogger, type Logger } from '@einvoice-fr/shared';
import { PdpAuthenticationError, PdpValidationError } from './errors.js';

export const DEFAULT_PAGE_SIZE = 50;
export const MAX_PAGE_SIZE = 500;

export interface PdpConnectorOptions {
  apiKey: string;
  /** @default 'sandbox' */
  environment?: PdpEnvironment;
  baseUrl?: string;
  /** Defaults to a PII-scrubbing logger prefixed with the connector name */
  logger?: Logger;
}

/** Search filters with the paging defaults applied */
export type ResolvedSearchFilters = InvoiceSearchFilters & { readonly page: number; readonly pageSize: number };

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a YYYY-MM-DD date');
const siren = z.string().regex(SIREN_PATTERN, 'SIREN must be exactly 9 digits');

const searchFiltersSchema = z.object({
  status: z.enum(INVOICE_STATUSES).optional(),
  dateFrom: isoDate.optional(),
  dateTo: isoDate.optional(),
  sellerSiren: siren.optional(),
  buyerSiren: siren.optional(),
  direction: z.enum(['sent', 'received']).optional(),
  page: z.number().int('Page must be an integer').min(1, 'Page must be at least 1').default(1),
  pageSize: z
    .number()
    .int('Page size must be an integer')
    .min(1, `Page size must be between 1 and ${MAX_PAGE_SIZE}`)
    .max(MAX_PAGE_SIZE, `Page size must be between 1 and ${MAX_PAGE_SIZE}`)
    .default(DEFAULT_PAGE_SIZE),
});

/**
 * Common ground of the filing platform connectors: credentials, target
 * environment and the checks every platform applies to search filters.
 */
export abstract class BasePdpConnector implements PdpConnector {
  abstract readonly name: string;
  readonly environment: PdpEnvironment;
  readonly baseUrl: string | undefined;
  protected readonly apiKey: string;
  protected readonly logger: Logger;

  /**
   * @throws PdpAuthenticationError when the API key is empty
   */
  protected constructor(options: PdpConnectorOptions, loggerPrefix: string) {
    if (options.apiKey.trim() === '') {
      throw new PdpAuthenticationError('An API key is required');
    }
    this.apiKey = options.apiKey;
    this.environment = options.environment ?? 'sandbox';
    this.baseUrl = options.baseUrl?.replace(/\/+$/, '');
    this.logger = options.logger ?? createSafeLogger({ prefix: loggerPrefix });
  }

  /**
   * Applies the paging defaults.
   *
   * @throws PdpValidationError listing every malformed filter
   */
  protected resolveFilters(filters: InvoiceSearchFilters = {}): ResolvedSearchFilters {
    const result = searchFiltersSchema.safeParse(filters);
    if (!result.success) {
      throw new PdpValidationError(
        'Invalid search filters',
        result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      );
    }
    if (filters.dateFrom !== undefined && filters.dateTo !== undefined && filters.dateFrom > filters.dateTo) {
      throw new PdpValidationError('Invalid search filters', ['dateFrom: Must not be after dateTo']);
    }
    return { ...filters, page: result.data.page, pageSize: result.data.pageSize };
  }

  abstract submit(invoice: InvoiceData, xmlBytes?: Uint8Array, pdfBytes?: Uint8Array): Promise<SubmissionResponse>;

  abstract getStatus(invoiceId: string): Promise<InvoiceStatus>;

  abstract getLifecycle(invoiceId: string): Promise<LifecycleResponse>;

  abstract getInvoice(invoiceId: string): Promise<Uint8Array>;

  abstract searchInvoices(filters?: InvoiceSearchFilters): Promise<InvoiceSearchResponse>;

  abstract updateStatus(
    invoiceId: string,
    status: InvoiceStatus,
    options?: StatusUpdateOptions,
  ): Promise<StatusUpdateResponse>;

  abstract lookupDirectory(siren: string): Promise<DirectoryEntry>;

  abstract submitEreportingTransaction(submission: EReportingSubmission): Promise<EReportingSubmissionResponse>;

  abstract submitEreportingPayment(submission: EReportingSubmission): Promise<EReportingSubmissionResponse>;

  abstract getEreportingStatus(submissionId: string): Promise<EReportingSubmissionResponse>;
}
