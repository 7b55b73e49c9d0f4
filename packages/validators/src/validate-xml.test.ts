import { describe, it, expect } from 'vitest';
import { CiiGenerator, UblGenerator } from '@einvoice-fr/generators';
import { createInvoice } from '@einvoice-fr/model';
import { sampleInvoiceInput } from '@einvoice-fr/model/testing';
import { createLogger, type LogLevel } from '@einvoice-fr/shared';
import { validateXml } from './validate-xml.js';

const decoder = new TextDecoder();
const invoice = createInvoice(sampleInvoiceInput());

function capture(): { lines: string[]; sink: (level: LogLevel, line: string) => void } {
  const lines: string[] = [];
  return { lines, sink: (_level, line) => lines.push(line) };
}

function body(line: string | undefined): string {
  return (line ?? '').slice((line ?? '').indexOf('] ') + 2);
}

describe('validateXml', () => {
  it('should accept encoder output as bytes or text', () => {
    const bytes = new CiiGenerator('EN16931').generateXml(invoice);

    expect(validateXml(bytes)).toEqual([]);
    expect(validateXml(decoder.decode(bytes), { flavor: 'factur-x', profile: 'EN16931' })).toEqual([]);
    expect(validateXml(new UblGenerator('EN16931').generateXml(invoice), { flavor: 'ubl' })).toEqual([]);
  });

  it('should pick the profile from the guideline identifier', () => {
    expect(validateXml(new CiiGenerator('BASIC').generateXml(invoice))).toEqual([]);
    expect(validateXml(new CiiGenerator('EXTENDED').generateXml(invoice))).toEqual([]);
  });

  it('should skip business rules when the structure is broken', () => {
    const { lines, sink } = capture();
    const xml = decoder
      .decode(new CiiGenerator('EN16931').generateXml(invoice))
      .replace('<ram:TypeCode>380</ram:TypeCode>', '')
      .replace('<ram:GrandTotalAmount>1440.00</ram:GrandTotalAmount>', '<ram:GrandTotalAmount>1450.00</ram:GrandTotalAmount>');

    const errors = validateXml(xml, { logger: createLogger({ level: 'debug', prefix: 'test', sink }) });

    expect(errors).toEqual(["Missing required element 'TypeCode' in 'ExchangedDocument'"]);
    expect(lines.map(body)).toEqual([
      '[DEBUG] [test] Structural validation failed, business rules skipped {"syntax":"cii","profile":"EN16931","errors":1}',
    ]);
  });

  it('should report business rules once the structure is clean', () => {
    const { lines, sink } = capture();
    const xml = decoder
      .decode(new CiiGenerator('EN16931').generateXml(invoice))
      .replace('<ram:TypeCode>380</ram:TypeCode>', '<ram:TypeCode>384</ram:TypeCode>');

    const errors = validateXml(xml, { logger: createLogger({ level: 'debug', prefix: 'test', sink }) });

    expect(errors).toEqual([
      '[BR-FR-07] A corrective Invoice (type code 381 or 384) shall reference the preceding Invoice (BT-25). (location: /CrossIndustryInvoice)',
    ]);
    expect(lines.map(body)).toEqual([
      '[DEBUG] [test] Business-rule validation finished {"syntax":"cii","profile":"EN16931","errors":1}',
    ]);
  });

  it('should return a syntax error for a truncated document', () => {
    const errors = validateXml('<rsm:CrossIndustryInvoice>');

    expect(errors).toHaveLength(1);
    expect(errors[0]).toMatch(/^XML syntax error: /);
  });
});
