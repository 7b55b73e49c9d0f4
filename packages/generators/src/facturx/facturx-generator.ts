import type {
  CiiProfile,
  GenerateOptions,
  GenerationResult,
  HybridDocumentEmbedder,
  InvoiceData,
  InvoiceGenerator,
} from '@einvoice-fr/contracts';
import { ConfigurationError, createSafeLogger, type Logger } from '@einvoice-fr/shared';
import type { GeneratorOptions } from '../base-generator.js';
import { CiiGenerator } from '../cii/cii-generator.js';

export interface FacturXGeneratorOptions extends GeneratorOptions {
  /** Converts the source PDF to PDF/A-3 and attaches the XML */
  embedder: HybridDocumentEmbedder;
}

/**
 * Hybrid PDF + CII invoice. The XML comes from the CII encoder; the PDF
 * work is delegated to the injected embedder.
 */
export class FacturXGenerator implements InvoiceGenerator {
  readonly format = 'factur-x' as const;
  readonly profile: CiiProfile;
  private readonly cii: CiiGenerator;
  private readonly embedder: HybridDocumentEmbedder;
  private readonly logger: Logger;

  constructor(profile: string, options: FacturXGeneratorOptions) {
    this.logger = options.logger ?? createSafeLogger({ prefix: 'generators:factur-x' });
    this.cii = new CiiGenerator(profile, { logger: this.logger });
    this.profile = this.cii.profile;
    this.embedder = options.embedder;
  }

  generateXml(invoice: InvoiceData): Uint8Array {
    return this.cii.generateXml(invoice);
  }

  async generate(invoice: InvoiceData, options: GenerateOptions = {}): Promise<GenerationResult> {
    if (options.pdfBytes === undefined) {
      throw new ConfigurationError('Factur-X generation requires the source PDF bytes', { profile: this.profile });
    }

    const xmlBytes = this.generateXml(invoice);
    const level = this.cii.info.facturxLevel;
    const pdfBytes = await this.embedder.embed(options.pdfBytes, xmlBytes, { flavor: 'factur-x', level });

    this.logger.info('Factur-X document generated', { invoiceNumber: invoice.number, level });
    return { xmlBytes, pdfBytes, profile: this.profile };
  }
}
