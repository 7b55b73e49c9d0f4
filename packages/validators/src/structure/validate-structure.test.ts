import { describe, it, expect } from 'vitest';
import { CII_PROFILES, type ValidateOptions } from '@einvoice-fr/contracts';
import { CiiGenerator, UblGenerator } from '@einvoice-fr/generators';
import { createInvoice, type InvoiceInput } from '@einvoice-fr/model';
import { sampleInvoiceInput } from '@einvoice-fr/model/testing';
import { ConfigurationError } from '@einvoice-fr/shared';
import { validateStructure } from './validate-structure.js';

const decoder = new TextDecoder();

function ciiXml(profile = 'EN16931', overrides: Partial<InvoiceInput> = {}): string {
  return decoder.decode(new CiiGenerator(profile).generateXml(createInvoice(sampleInvoiceInput(overrides))));
}

function ublXml(profile = 'EN16931', overrides: Partial<InvoiceInput> = {}): string {
  return decoder.decode(new UblGenerator(profile).generateXml(createInvoice(sampleInvoiceInput(overrides))));
}

describe('validateStructure', () => {
  describe('encoder output', () => {
    it.each(CII_PROFILES)('should accept a %s document', (profile) => {
      expect(validateStructure(ciiXml(profile))).toEqual([]);
    });

    it('should accept EXTENDED sub-lines and a third-party payer', () => {
      const xml = ciiXml('EXTENDED', {
        lines: [
          {
            description: 'Lot fournitures',
            quantity: '1',
            unitPrice: '100.00',
            subLines: [{ description: 'Stylos', quantity: '10', unitPrice: '10.00' }],
          },
        ],
        payer: { name: 'Groupe Exemple SA', address: { street: '5 place des Tests', city: 'Nantes', postalCode: '44000' } },
      });

      expect(validateStructure(xml)).toEqual([]);
    });

    it('should accept a CII document with every optional section', () => {
      const xml = ciiXml('EN16931', {
        note: 'Merci de votre confiance',
        vatOnDebits: true,
        purchaseOrderReference: 'PO-77',
        contractReference: 'CT-2026-01',
        buyerAccountingReference: '401000',
        billingPeriod: { start: '2026-09-01', end: '2026-09-30' },
        prepaidAmount: '100.00',
      });

      expect(validateStructure(xml, { flavor: 'factur-x', profile: 'EN16931' })).toEqual([]);
    });

    it('should accept UBL invoices, credit notes and PEPPOL documents', () => {
      expect(validateStructure(ublXml())).toEqual([]);
      expect(validateStructure(ublXml('EN16931', { typeCode: '381', precedingInvoiceReference: 'FA-2026-001' }))).toEqual(
        [],
      );
      expect(validateStructure(ublXml('PEPPOL', { purchaseOrderReference: 'PO-77' }), { flavor: 'ubl' })).toEqual([]);
    });
  });

  describe('shape violations', () => {
    it('should report a missing required element', () => {
      const xml = ciiXml().replace('<ram:TypeCode>380</ram:TypeCode>', '');

      expect(validateStructure(xml)).toEqual(["Missing required element 'TypeCode' in 'ExchangedDocument'"]);
    });

    it('should report an element out of sequence', () => {
      const xml = ciiXml()
        .replace('<ram:ID>FA-2026-042</ram:ID>', '')
        .replace('<ram:TypeCode>380</ram:TypeCode>', '<ram:TypeCode>380</ram:TypeCode><ram:ID>FA-2026-042</ram:ID>');

      expect(validateStructure(xml)).toEqual([
        "Missing required element 'ID' in 'ExchangedDocument'",
        "Unexpected element 'ID' in 'ExchangedDocument'",
      ]);
    });

    it('should reject sections the profile does not carry', () => {
      const xml = ciiXml().replace('urn:cen.eu:en16931:2017', 'urn:factur-x.eu:1p0:minimum');

      expect(validateStructure(xml)).toEqual([
        "Unexpected element 'IncludedSupplyChainTradeLineItem' in 'SupplyChainTradeTransaction'",
        "Unexpected element 'IncludedSupplyChainTradeLineItem' in 'SupplyChainTradeTransaction'",
        "Unexpected element 'LineTotalAmount' in 'SpecifiedTradeSettlementHeaderMonetarySummation'",
      ]);
    });

    it('should report a malformed value', () => {
      const xml = ciiXml().replace('>20260915<', '>2026-09-15<');

      expect(validateStructure(xml)).toEqual(["Invalid value '2026-09-15' for 'DateTimeString' in 'IssueDateTime'"]);
    });

    it('should report a missing attribute', () => {
      const xml = ciiXml().replace(' format="102">20260915<', '>20260915<');

      expect(validateStructure(xml)).toEqual(["Missing required attribute 'format' on 'DateTimeString' in 'IssueDateTime'"]);
    });

    it('should report a wrong root element for the requested flavor', () => {
      expect(validateStructure(ciiXml(), { flavor: 'ubl', profile: 'EN16931' })).toEqual([
        "Unexpected root element 'CrossIndustryInvoice', expected 'Invoice' or 'CreditNote'",
      ]);
      expect(validateStructure('<Order xmlns="urn:example:order"/>', { flavor: 'cii', profile: 'EN16931' })).toEqual([
        "Unexpected root element 'Order', expected 'CrossIndustryInvoice'",
      ]);
    });

    it('should report a wrong root namespace', () => {
      const xml = '<rsm:CrossIndustryInvoice xmlns:rsm="urn:example:wrong"/>';

      expect(validateStructure(xml, { flavor: 'cii', profile: 'EN16931' })).toEqual([
        "Unexpected namespace 'urn:example:wrong' for root element 'CrossIndustryInvoice'",
      ]);
    });
  });

  describe('document problems', () => {
    it('should return a single syntax error for malformed XML', () => {
      const errors = validateStructure('<rsm:CrossIndustryInvoice><rsm:ExchangedDocument>');

      expect(errors).toHaveLength(1);
      expect(errors[0]).toMatch(/^XML syntax error: /);
    });

    it('should report a document it cannot recognize', () => {
      expect(validateStructure('<Order xmlns="urn:example:order"/>')).toEqual([
        "Unrecognized invoice document: root element 'Order' in namespace 'urn:example:order'",
      ]);
    });

    it('should report a guideline that contradicts the requested profile', () => {
      expect(validateStructure(ciiXml('BASIC'), { flavor: 'cii', profile: 'EN16931' })).toEqual([
        "Guideline identifier 'urn:cen.eu:en16931:2017#compliant#urn:factur-x.eu:1p0:basic' does not match profile 'EN16931'",
      ]);
    });
  });

  describe('options', () => {
    it('should reject an unknown flavor', () => {
      const options: ValidateOptions = JSON.parse('{ "flavor": "edifact" }');

      expect(() => validateStructure(ciiXml(), options)).toThrow(ConfigurationError);
    });

    it('should reject an unknown profile', () => {
      const options: ValidateOptions = JSON.parse('{ "profile": "XRECHNUNG" }');

      expect(() => validateStructure(ciiXml(), options)).toThrow(ConfigurationError);
    });

    it('should reject a profile that the flavor does not have', () => {
      expect(() => validateStructure(ciiXml(), { flavor: 'ubl', profile: 'EXTENDED' })).toThrow(ConfigurationError);
    });

    it('should check options before reading the document', () => {
      expect(() => validateStructure('<broken', { flavor: 'cii', profile: 'PEPPOL' })).toThrow(ConfigurationError);
    });
  });
});
