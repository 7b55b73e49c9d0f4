import { describe, it, expect } from 'vitest';
import type { EmbedOptions, HybridDocumentEmbedder } from '@einvoice-fr/contracts';
import { createInvoice } from '@einvoice-fr/model';
import { sampleInvoiceInput } from '@einvoice-fr/model/testing';
import { ConfigurationError } from '@einvoice-fr/shared';
import { FacturXGenerator } from './facturx-generator.js';

class RecordingEmbedder implements HybridDocumentEmbedder {
  readonly calls: { pdfBytes: Uint8Array; xmlBytes: Uint8Array; options: EmbedOptions }[] = [];

  embed(pdfBytes: Uint8Array, xmlBytes: Uint8Array, options: EmbedOptions): Promise<Uint8Array> {
    this.calls.push({ pdfBytes, xmlBytes, options });
    return Promise.resolve(new Uint8Array([37, 80, 68, 70, 1]));
  }
}

const SOURCE_PDF = new Uint8Array([37, 80, 68, 70]);

describe('FacturXGenerator', () => {
  it('should embed the CII XML at the matching level', async () => {
    const embedder = new RecordingEmbedder();
    const generator = new FacturXGenerator('EN16931', { embedder });
    const invoice = createInvoice(sampleInvoiceInput());

    const result = await generator.generate(invoice, { pdfBytes: SOURCE_PDF });

    expect(result.profile).toBe('EN16931');
    expect(result.pdfBytes).toEqual(new Uint8Array([37, 80, 68, 70, 1]));
    expect(result.xmlBytes).toEqual(generator.generateXml(invoice));
    expect(embedder.calls).toHaveLength(1);
    expect(embedder.calls[0]?.pdfBytes).toBe(SOURCE_PDF);
    expect(embedder.calls[0]?.options).toEqual({ flavor: 'factur-x', level: 'en16931' });
  });

  it('should map each profile to its Factur-X level', async () => {
    const embedder = new RecordingEmbedder();
    const invoice = createInvoice(sampleInvoiceInput());

    for (const profile of ['MINIMUM', 'BASICWL', 'BASIC', 'EXTENDED']) {
      await new FacturXGenerator(profile, { embedder }).generate(invoice, { pdfBytes: SOURCE_PDF });
    }

    expect(embedder.calls.map((call) => call.options.level)).toEqual(['minimum', 'basicwl', 'basic', 'extended']);
  });

  it('should require the source PDF', async () => {
    const embedder = new RecordingEmbedder();
    const generator = new FacturXGenerator('EN16931', { embedder });

    await expect(generator.generate(createInvoice(sampleInvoiceInput()))).rejects.toThrow(ConfigurationError);
    expect(embedder.calls).toHaveLength(0);
  });

  it('should reject unknown profiles', () => {
    expect(() => new FacturXGenerator('PEPPOL', { embedder: new RecordingEmbedder() })).toThrow(ConfigurationError);
  });
});
