import type {
  GenerateOptions,
  GenerationResult,
  InvoiceData,
  InvoiceFormat,
  InvoiceGenerator,
  InvoiceProfile,
  InvoiceTotals,
} from '@einvoice-fr/contracts';
import { CORRECTIVE_TYPE_CODES } from '@einvoice-fr/contracts';
import { serializeXml, type Logger, type XmlNode } from '@einvoice-fr/shared';
import { computeTotals } from '@einvoice-fr/tax';
import { EncodingError } from './errors.js';

export interface GeneratorOptions {
  /** Defaults to a PII-scrubbing logger prefixed with the generator name */
  logger?: Logger;
}

/**
 * Shared encoding pipeline: check the fields the profile needs, take the
 * totals from the tax engine, build the tree, serialize.
 */
export abstract class BaseGenerator<P extends InvoiceProfile> implements InvoiceGenerator {
  abstract readonly format: InvoiceFormat;
  readonly profile: P;
  protected readonly logger: Logger;

  protected constructor(profile: P, logger: Logger) {
    this.profile = profile;
    this.logger = logger;
  }

  generateXml(invoice: InvoiceData): Uint8Array {
    this.checkEncodable(invoice);

    const xmlBytes = serializeXml(this.buildDocument(invoice, computeTotals(invoice)));
    this.logger.debug('Generated invoice XML', {
      invoiceNumber: invoice.number,
      profile: this.profile,
      size: xmlBytes.length,
    });
    return xmlBytes;
  }

  generate(invoice: InvoiceData, _options?: GenerateOptions): Promise<GenerationResult> {
    return Promise.resolve({ xmlBytes: this.generateXml(invoice), profile: this.profile });
  }

  /**
   * Throws `EncodingError` for the first missing required field.
   */
  protected checkEncodable(invoice: InvoiceData): void {
    if (CORRECTIVE_TYPE_CODES.has(invoice.typeCode) && !invoice.precedingInvoiceReference) {
      throw new EncodingError(
        `Invoice type ${invoice.typeCode} requires a preceding invoice reference`,
        'precedingInvoiceReference',
        this.profile,
      );
    }

    invoice.lines.forEach((line, index) => {
      if (line.vatCategory === 'AE' && !line.vatExemptionReasonCode) {
        throw new EncodingError(
          `Reverse charge line ${line.lineNumber ?? index + 1} has no VAT exemption reason code`,
          `lines[${index}].vatExemptionReasonCode`,
          this.profile,
        );
      }
    });
  }

  protected abstract buildDocument(invoice: InvoiceData, totals: InvoiceTotals): XmlNode;
}
