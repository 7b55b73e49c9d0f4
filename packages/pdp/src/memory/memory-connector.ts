import type {
  DirectoryEntry,
  EReportingSubmission,
  EReportingSubmissionResponse,
  ISODateTime,
  InvoiceData,
  InvoiceDirection,
  InvoiceSearchFilters,
  InvoiceSearchResponse,
  InvoiceSearchResult,
  InvoiceStatus,
  LifecycleEvent,
  LifecycleResponse,
  StatusUpdateOptions,
  StatusUpdateResponse,
  SubmissionResponse,
} from '@einvoice-fr/contracts';
import { LifecycleManager, LifecycleReasonRequiredError, LifecycleTransitionError } from '@einvoice-fr/lifecycle';
import { createSequentialIdGenerator, type IdGenerator } from '@einvoice-fr/shared';
import { computeTotals } from '@einvoice-fr/tax';
import { BasePdpConnector, type PdpConnectorOptions, type ResolvedSearchFilters } from '../base-connector.js';
import { PdpNotFoundError, PdpValidationError } from '../errors.js';

export interface MemoryPdpConnectorOptions extends Partial<PdpConnectorOptions> {
  /** Clock for submission and update timestamps */
  now?: () => Date;
}

interface StoredInvoice {
  invoiceId: string;
  invoice: InvoiceData;
  xmlBytes?: Uint8Array;
  pdfBytes?: Uint8Array;
  direction: InvoiceDirection;
  lifecycle: LifecycleManager;
  /** Deposit event; the manager only records transitions */
  depositEvent: LifecycleEvent;
}

/**
 * Filing platform kept in process memory, for development and tests.
 *
 * Invoices get sequential ids (`MEM-000001`) and start deposited. Status
 * updates go through the lifecycle graph. The directory and the inbound
 * invoices are simulated through `addDirectoryEntry` and
 * `addReceivedInvoice`. E-reporting submissions are accepted as they are.
 *
 * Limitations:
 * - Data lost when the instance is dropped
 * - No XML generation: submit the bytes you want to read back
 */
export class MemoryPdpConnector extends BasePdpConnector {
  readonly name = 'memory';
  private readonly invoices = new Map<string, StoredInvoice>();
  private readonly directory = new Map<string, DirectoryEntry>();
  private readonly ereporting = new Map<string, EReportingSubmissionResponse>();
  private readonly invoiceIds: IdGenerator = createSequentialIdGenerator('MEM');
  private readonly submissionIds: IdGenerator = createSequentialIdGenerator('ER');
  private readonly now: () => Date;

  constructor(options: MemoryPdpConnectorOptions = {}) {
    super(
      {
        ...options,
        apiKey: options.apiKey ?? 'memory',
      },
      'pdp:memory',
    );
    this.now = options.now ?? (() => new Date());
  }

  async submit(invoice: InvoiceData, xmlBytes?: Uint8Array, pdfBytes?: Uint8Array): Promise<SubmissionResponse> {
    const stored = this.store(invoice, 'sent', xmlBytes, pdfBytes);
    this.logger.info('Invoice submitted', { invoiceId: stored.invoiceId });
    return {
      invoiceId: stored.invoiceId,
      status: stored.lifecycle.status,
      submittedAt: stored.depositEvent.timestamp,
    };
  }

  async getStatus(invoiceId: string): Promise<InvoiceStatus> {
    return this.stored(invoiceId).lifecycle.status;
  }

  async getLifecycle(invoiceId: string): Promise<LifecycleResponse> {
    const stored = this.stored(invoiceId);
    return {
      invoiceId,
      currentStatus: stored.lifecycle.status,
      events: [stored.depositEvent, ...stored.lifecycle.history],
    };
  }

  async getInvoice(invoiceId: string): Promise<Uint8Array> {
    const stored = this.stored(invoiceId);
    const document = stored.xmlBytes ?? stored.pdfBytes;
    if (document === undefined) {
      throw new PdpNotFoundError(`No document stored for invoice ${invoiceId}`, { invoiceId });
    }
    return document.slice();
  }

  async searchInvoices(filters?: InvoiceSearchFilters): Promise<InvoiceSearchResponse> {
    const resolved = this.resolveFilters(filters);
    const matches = [...this.invoices.values()]
      .filter((stored) => this.matches(stored, resolved))
      .map((stored) => this.toSearchResult(stored));

    const start = (resolved.page - 1) * resolved.pageSize;
    return {
      results: matches.slice(start, start + resolved.pageSize),
      totalCount: matches.length,
      page: resolved.page,
      pageSize: resolved.pageSize,
    };
  }

  /**
   * @throws PdpNotFoundError for an unknown invoice
   * @throws PdpValidationError when the lifecycle refuses the change
   */
  async updateStatus(
    invoiceId: string,
    status: InvoiceStatus,
    options: StatusUpdateOptions = {},
  ): Promise<StatusUpdateResponse> {
    const stored = this.stored(invoiceId);
    const updatedAt = this.timestamp();

    try {
      stored.lifecycle.transition(status, {
        timestamp: updatedAt,
        ...(options.reason !== undefined ? { reason: options.reason } : {}),
        ...(options.reasonCode !== undefined ? { reasonCode: options.reasonCode } : {}),
        ...(options.amount !== undefined ? { amount: options.amount } : {}),
      });
    } catch (error) {
      if (error instanceof LifecycleTransitionError || error instanceof LifecycleReasonRequiredError) {
        throw new PdpValidationError(`Status update refused for invoice ${invoiceId}`, [error.message], {
          invoiceId,
          status,
        });
      }
      throw error;
    }

    return { invoiceId, status, updatedAt };
  }

  async lookupDirectory(siren: string): Promise<DirectoryEntry> {
    const entry = this.directory.get(siren);
    if (entry === undefined) {
      throw new PdpNotFoundError(`SIREN not found in the directory: ${siren}`, { siren });
    }
    return entry;
  }

  /**
   * @throws PdpValidationError when the submission carries no transaction or aggregate
   */
  async submitEreportingTransaction(submission: EReportingSubmission): Promise<EReportingSubmissionResponse> {
    if (submission.transactionData === undefined && submission.aggregatedData === undefined) {
      throw new PdpValidationError('Invalid e-reporting submission', [
        'A transaction or an aggregate is required',
      ]);
    }
    return this.accept(submission);
  }

  /**
   * @throws PdpValidationError when the submission carries no payment
   */
  async submitEreportingPayment(submission: EReportingSubmission): Promise<EReportingSubmissionResponse> {
    if (submission.paymentData === undefined) {
      throw new PdpValidationError('Invalid e-reporting submission', ['Payment data is required']);
    }
    return this.accept(submission);
  }

  async getEreportingStatus(submissionId: string): Promise<EReportingSubmissionResponse> {
    const response = this.ereporting.get(submissionId);
    if (response === undefined) {
      throw new PdpNotFoundError(`E-reporting submission not found: ${submissionId}`, { submissionId });
    }
    return response;
  }

  /** Registers the receiving platform of a company; replaces any previous entry */
  addDirectoryEntry(entry: DirectoryEntry): void {
    this.directory.set(entry.siren, entry);
  }

  /**
   * Simulates an invoice arriving from another platform.
   *
   * @returns the id assigned to the invoice
   */
  addReceivedInvoice(invoice: InvoiceData, xmlBytes: Uint8Array): string {
    return this.store(invoice, 'received', xmlBytes).invoiceId;
  }

  /** Number of stored invoices */
  get size(): number {
    return this.invoices.size;
  }

  private store(
    invoice: InvoiceData,
    direction: InvoiceDirection,
    xmlBytes?: Uint8Array,
    pdfBytes?: Uint8Array,
  ): StoredInvoice {
    const invoiceId = this.invoiceIds.generate();
    const stored: StoredInvoice = {
      invoiceId,
      invoice,
      ...(xmlBytes !== undefined ? { xmlBytes: xmlBytes.slice() } : {}),
      ...(pdfBytes !== undefined ? { pdfBytes: pdfBytes.slice() } : {}),
      direction,
      lifecycle: new LifecycleManager(invoice.number, '200', { logger: this.logger }),
      depositEvent: { timestamp: this.timestamp(), status: '200', producer: 'WK' },
    };
    this.invoices.set(invoiceId, stored);
    return stored;
  }

  private stored(invoiceId: string): StoredInvoice {
    const stored = this.invoices.get(invoiceId);
    if (stored === undefined) {
      throw new PdpNotFoundError(`Invoice not found: ${invoiceId}`, { invoiceId });
    }
    return stored;
  }

  private matches(stored: StoredInvoice, filters: ResolvedSearchFilters): boolean {
    const { invoice } = stored;
    if (filters.status !== undefined && stored.lifecycle.status !== filters.status) return false;
    if (filters.dateFrom !== undefined && invoice.issueDate < filters.dateFrom) return false;
    if (filters.dateTo !== undefined && invoice.issueDate > filters.dateTo) return false;
    if (filters.sellerSiren !== undefined && invoice.seller.siren !== filters.sellerSiren) return false;
    if (filters.buyerSiren !== undefined && invoice.buyer.siren !== filters.buyerSiren) return false;
    if (filters.direction !== undefined && stored.direction !== filters.direction) return false;
    return true;
  }

  private toSearchResult(stored: StoredInvoice): InvoiceSearchResult {
    const { invoice } = stored;
    return {
      invoiceId: stored.invoiceId,
      number: invoice.number,
      issueDate: invoice.issueDate,
      sellerName: invoice.seller.name,
      buyerName: invoice.buyer.name,
      totalInclTax: computeTotals(invoice).grossTotal,
      currency: invoice.currency,
      status: stored.lifecycle.status,
      direction: stored.direction,
    };
  }

  private accept(submission: EReportingSubmission): EReportingSubmissionResponse {
    const response: EReportingSubmissionResponse = {
      submissionId: this.submissionIds.generate(),
      status: 'accepted',
      submittedAt: this.timestamp(),
      rawResponse: { clientSubmissionId: submission.submissionId },
    };
    this.ereporting.set(response.submissionId, response);
    this.logger.info('E-reporting submission accepted', {
      submissionId: response.submissionId,
      mode: submission.transmissionMode,
    });
    return response;
  }

  private timestamp(): ISODateTime {
    return this.now().toISOString();
  }
}
