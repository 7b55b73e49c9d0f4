import {
  INVOICE_STATUS_LABELS,
  type CdarRoleCode,
  type DecimalAmount,
  type ISODateTime,
  type InvoiceStatus,
  type LifecycleEvent,
} from '@einvoice-fr/contracts';
import { createSafeLogger, type Logger } from '@einvoice-fr/shared';
import { LifecycleReasonRequiredError, LifecycleTransitionError } from './errors.js';
import { STATUS_METADATA, allowedTransitions, isMandatoryStatus, isTerminalStatus } from './status-graph.js';

export interface TransitionOptions {
  /** Required when the target status is a refusal */
  reason?: string;
  reasonCode?: string;
  /** Defaults to the status's usual producer */
  producer?: CdarRoleCode;
  amount?: DecimalAmount;
  /** Defaults to now */
  timestamp?: ISODateTime;
  cdarMessageId?: string;
}

export interface LifecycleManagerOptions {
  logger?: Logger;
}

/**
 * Status of one invoice with its ordered history. Holds no lock: keep a
 * single instance per invoice reference.
 */
export class LifecycleManager {
  readonly invoiceReference: string;
  private current: InvoiceStatus;
  private readonly events: LifecycleEvent[] = [];
  private readonly logger: Logger;

  constructor(invoiceReference: string, initialStatus: InvoiceStatus = '200', options: LifecycleManagerOptions = {}) {
    this.invoiceReference = invoiceReference;
    this.current = initialStatus;
    this.logger = options.logger ?? createSafeLogger({ prefix: 'lifecycle' });
  }

  get status(): InvoiceStatus {
    return this.current;
  }

  /** Copy of the history, oldest first */
  get history(): readonly LifecycleEvent[] {
    return this.events.slice();
  }

  canTransition(target: InvoiceStatus): boolean {
    return allowedTransitions(this.current).includes(target);
  }

  /**
   * Records the event and moves to the target status. On failure the state
   * is left as it was.
   *
   * @throws LifecycleTransitionError when the graph has no such edge
   * @throws LifecycleReasonRequiredError when the target needs a reason
   */
  transition(target: InvoiceStatus, options: TransitionOptions = {}): LifecycleEvent {
    if (!this.canTransition(target)) {
      throw new LifecycleTransitionError(this.current, target, allowedTransitions(this.current));
    }

    const metadata = STATUS_METADATA[target];
    if (metadata.reasonRequired && !options.reason) {
      throw new LifecycleReasonRequiredError(target, INVOICE_STATUS_LABELS[target]);
    }

    const event: LifecycleEvent = {
      timestamp: options.timestamp ?? new Date().toISOString(),
      status: target,
      producer: options.producer ?? metadata.defaultProducer,
      ...(options.reason ? { reason: options.reason } : {}),
      ...(options.reasonCode !== undefined ? { reasonCode: options.reasonCode } : {}),
      ...(options.amount !== undefined ? { amount: options.amount } : {}),
      ...(options.cdarMessageId !== undefined ? { cdarMessageId: options.cdarMessageId } : {}),
    };

    const from = this.current;
    this.current = target;
    this.events.push(event);
    this.logger.debug('Lifecycle transition', { from, to: target, producer: event.producer });
    return event;
  }

  isTerminal(): boolean {
    return isTerminalStatus(this.current);
  }

  isMandatory(status: InvoiceStatus): boolean {
    return isMandatoryStatus(status);
  }

  /** History entries to report to the tax administration */
  mandatoryEvents(): LifecycleEvent[] {
    return this.events.filter((event) => isMandatoryStatus(event.status));
  }
}
