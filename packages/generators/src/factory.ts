import type { HybridDocumentEmbedder, InvoiceFormat, InvoiceGenerator } from '@einvoice-fr/contracts';
import { ConfigurationError, resolveSettings } from '@einvoice-fr/shared';
import type { GeneratorOptions } from './base-generator.js';
import { CiiGenerator } from './cii/cii-generator.js';
import { FacturXGenerator } from './facturx/facturx-generator.js';
import { UblGenerator } from './ubl/ubl-generator.js';

export interface CreateGeneratorOptions extends GeneratorOptions {
  /** Defaults to the configured default profile */
  profile?: string;
  /** Required for Factur-X */
  embedder?: HybridDocumentEmbedder;
}

/**
 * Builds the generator for an output format.
 */
export function createGenerator(format: InvoiceFormat, options: CreateGeneratorOptions = {}): InvoiceGenerator {
  const profile = options.profile ?? resolveSettings().settings.defaultProfile;
  const generatorOptions: GeneratorOptions = options.logger !== undefined ? { logger: options.logger } : {};

  switch (format) {
    case 'cii':
      return new CiiGenerator(profile, generatorOptions);
    case 'ubl':
      return new UblGenerator(profile, generatorOptions);
    case 'factur-x':
      if (options.embedder === undefined) {
        throw new ConfigurationError('Factur-X generation requires a hybrid document embedder', { format });
      }
      return new FacturXGenerator(profile, { ...generatorOptions, embedder: options.embedder });
  }
}
