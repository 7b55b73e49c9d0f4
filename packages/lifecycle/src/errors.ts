import type { InvoiceStatus } from '@einvoice-fr/contracts';
import { EInvoiceError } from '@einvoice-fr/shared';

/**
 * The status graph has no edge from the current status to the target.
 */
export class LifecycleTransitionError extends EInvoiceError {
  readonly from: InvoiceStatus;
  readonly to: InvoiceStatus;
  readonly allowed: readonly InvoiceStatus[];

  constructor(from: InvoiceStatus, to: InvoiceStatus, allowed: readonly InvoiceStatus[]) {
    const possible = allowed.length > 0 ? allowed.join(', ') : 'none';
    super(`Transition not allowed: ${from} -> ${to}. Possible transitions: ${possible}`, 'LIFECYCLE_TRANSITION', {
      from,
      to,
      allowed,
    });
    this.name = 'LifecycleTransitionError';
    this.from = from;
    this.to = to;
    this.allowed = allowed;
  }
}

export class LifecycleReasonRequiredError extends EInvoiceError {
  readonly status: InvoiceStatus;

  constructor(status: InvoiceStatus, label: string) {
    super(`Status ${status} (${label}) requires a reason`, 'LIFECYCLE_REASON_REQUIRED', { status });
    this.name = 'LifecycleReasonRequiredError';
    this.status = status;
  }
}

/**
 * A CDAR document is malformed or lacks a required element.
 */
export class CdarParseError extends EInvoiceError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CDAR_PARSE_ERROR', context);
    this.name = 'CdarParseError';
  }
}
