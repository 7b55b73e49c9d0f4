import { EInvoiceError } from '@einvoice-fr/shared';

/**
 * A field required by the selected profile or document type is missing.
 * Raised before any bytes are produced.
 */
export class EncodingError extends EInvoiceError {
  readonly field: string;
  readonly profile: string;

  constructor(message: string, field: string, profile: string) {
    super(message, 'ENCODING_ERROR', { field, profile });
    this.name = 'EncodingError';
    this.field = field;
    this.profile = profile;
  }
}
