/**
 * Base error class for the e-invoicing engine
 */
export class EInvoiceError extends Error {
  readonly code: string;
  readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'EInvoiceError';
    this.code = code;
    if (context !== undefined) {
      this.context = context;
    }

    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace?.(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
    };
  }
}

/**
 * One violated contract, with the path of the offending input field
 */
export interface ViolationDetail {
  code: string;
  message: string;
  path?: string;
}

/**
 * Error thrown when domain values break a construction-time contract
 */
export class ValidationError extends EInvoiceError {
  readonly diagnostics: ViolationDetail[];

  constructor(message: string, diagnostics: ViolationDetail[] = [], context?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', context);
    this.name = 'ValidationError';
    this.diagnostics = diagnostics;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), diagnostics: this.diagnostics };
  }
}

/**
 * Error thrown for configuration issues (unknown profile or flavor, bad settings)
 */
export class ConfigurationError extends EInvoiceError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', context);
    this.name = 'ConfigurationError';
  }
}
