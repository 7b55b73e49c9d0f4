import { EInvoiceError } from '@einvoice-fr/shared';

export class EReportingError extends EInvoiceError {
  constructor(message: string, code = 'EREPORTING_ERROR', context?: Record<string, unknown>) {
    super(message, code, context);
    this.name = 'EReportingError';
  }
}

/**
 * Transaction, payment or aggregate data failed validation. `errors` lists
 * every finding.
 */
export class EReportingValidationError extends EReportingError {
  readonly errors: readonly string[];

  constructor(message: string, errors: readonly string[] = []) {
    super(message, 'EREPORTING_VALIDATION_ERROR', { errors });
    this.name = 'EReportingValidationError';
    this.errors = errors;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), errors: this.errors };
  }
}

/**
 * Nothing to declare. Blank declarations are not transmitted.
 */
export class EReportingEmptyDeclarationError extends EReportingError {
  constructor(message = 'Empty declaration: no transaction to report for the period') {
    super(message, 'EREPORTING_EMPTY_DECLARATION');
    this.name = 'EReportingEmptyDeclarationError';
  }
}
