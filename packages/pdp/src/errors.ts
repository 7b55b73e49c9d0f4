import { EInvoiceError } from '@einvoice-fr/shared';

/**
 * Base class of every filing platform failure. Connectors do not retry.
 */
export class PdpError extends EInvoiceError {
  constructor(message: string, code = 'PDP_ERROR', context?: Record<string, unknown>) {
    super(message, code, context);
    this.name = 'PdpError';
  }
}

/** Invalid API key, expired token or missing rights */
export class PdpAuthenticationError extends PdpError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'PDP_AUTHENTICATION_ERROR', context);
    this.name = 'PdpAuthenticationError';
  }
}

/**
 * The platform refused the request. `errors` holds its reasons.
 */
export class PdpValidationError extends PdpError {
  readonly errors: readonly string[];

  constructor(message: string, errors: readonly string[] = [], context?: Record<string, unknown>) {
    super(message, 'PDP_VALIDATION_ERROR', context);
    this.name = 'PdpValidationError';
    this.errors = errors;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), errors: this.errors };
  }
}

/** Unknown invoice, submission or directory entry */
export class PdpNotFoundError extends PdpError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'PDP_NOT_FOUND', context);
    this.name = 'PdpNotFoundError';
  }
}

/** Timeout, DNS, TLS or any other transport failure */
export class PdpConnectionError extends PdpError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'PDP_CONNECTION_ERROR', context);
    this.name = 'PdpConnectionError';
  }
}
