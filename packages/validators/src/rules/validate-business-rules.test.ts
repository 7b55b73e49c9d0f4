import { describe, it, expect } from 'vitest';
import { CII_PROFILES } from '@einvoice-fr/contracts';
import { CiiGenerator, UblGenerator } from '@einvoice-fr/generators';
import { createInvoice, type InvoiceInput } from '@einvoice-fr/model';
import { sampleInvoiceInput } from '@einvoice-fr/model/testing';
import { validateBusinessRules } from './validate-business-rules.js';

const decoder = new TextDecoder();
const SUMMATION =
  '/CrossIndustryInvoice/SupplyChainTradeTransaction/ApplicableHeaderTradeSettlement/SpecifiedTradeSettlementHeaderMonetarySummation';

function ciiXml(profile = 'EN16931', overrides: Partial<InvoiceInput> = {}): string {
  return decoder.decode(new CiiGenerator(profile).generateXml(createInvoice(sampleInvoiceInput(overrides))));
}

function ublXml(profile = 'EN16931', overrides: Partial<InvoiceInput> = {}): string {
  return decoder.decode(new UblGenerator(profile).generateXml(createInvoice(sampleInvoiceInput(overrides))));
}

describe('validateBusinessRules', () => {
  describe('encoder output', () => {
    it.each(CII_PROFILES)('should find no violation in a %s document', (profile) => {
      expect(validateBusinessRules(ciiXml(profile))).toEqual([]);
    });

    it('should find no violation in UBL documents', () => {
      expect(validateBusinessRules(ublXml())).toEqual([]);
      expect(validateBusinessRules(ublXml('PEPPOL', { purchaseOrderReference: 'PO-77' }))).toEqual([]);
      expect(
        validateBusinessRules(ublXml('EN16931', { typeCode: '381', precedingInvoiceReference: 'FA-2026-001' })),
      ).toEqual([]);
    });
  });

  describe('EN16931 rules', () => {
    it('should report inconsistent document totals at the summation', () => {
      const xml = ciiXml().replace(
        '<ram:GrandTotalAmount>1440.00</ram:GrandTotalAmount>',
        '<ram:GrandTotalAmount>1450.00</ram:GrandTotalAmount>',
      );

      expect(validateBusinessRules(xml)).toEqual([
        `[BR-CO-15] Invoice total amount with VAT (BT-112) = Invoice total amount without VAT (BT-109) + Invoice total VAT amount (BT-110). (location: ${SUMMATION})`,
        `[BR-CO-16] Amount due for payment (BT-115) = Invoice total amount with VAT (BT-112) - Paid amount (BT-113) + Rounding amount (BT-114). (location: ${SUMMATION})`,
      ]);
    });

    it('should report line totals that do not add up', () => {
      const xml = ciiXml().replace(
        '<ram:LineTotalAmount>850.00</ram:LineTotalAmount>',
        '<ram:LineTotalAmount>860.00</ram:LineTotalAmount>',
      );

      expect(validateBusinessRules(xml)).toEqual([
        '[BR-CO-10] Sum of Invoice line net amount (BT-106) = Σ Invoice line net amount (BT-131). (location: /CrossIndustryInvoice)',
      ]);
    });

    it('should locate a line-level violation', () => {
      const xml = ciiXml('EN16931', {
        lines: [
          { description: 'Ramette papier A4', quantity: '10', unitPrice: '85.00', vatRate: '0.0' },
          { description: "Cartouche d'encre", quantity: '10', unitPrice: '35.00', vatRate: '20.0' },
        ],
      });

      expect(validateBusinessRules(xml)).toEqual([
        '[BR-S-05] In an Invoice line where the Invoiced item VAT category code (BT-151) is "Standard rated" the Invoiced item VAT rate (BT-152) shall be greater than zero. (location: /CrossIndustryInvoice/SupplyChainTradeTransaction/IncludedSupplyChainTradeLineItem[1]/SpecifiedLineTradeSettlement/ApplicableTradeTax)',
      ]);
    });
  });

  describe('French rules', () => {
    it('should require a preceding invoice on a corrective invoice', () => {
      const xml = ciiXml().replace('<ram:TypeCode>380</ram:TypeCode>', '<ram:TypeCode>384</ram:TypeCode>');

      expect(validateBusinessRules(xml)).toEqual([
        '[BR-FR-07] A corrective Invoice (type code 381 or 384) shall reference the preceding Invoice (BT-25). (location: /CrossIndustryInvoice)',
      ]);
    });

    it('should require the operation category note in UBL', () => {
      const xml = ublXml().replace('#AAI#', '');

      expect(validateBusinessRules(xml)).toEqual([
        '[BR-FR-05] An Invoice shall state its operation category in a note starting with #AAI#. (location: /Invoice)',
      ]);
    });
  });

  describe('profile-specific rules', () => {
    it('should apply PEPPOL rules only to PEPPOL documents', () => {
      const xml = ublXml('PEPPOL', { purchaseOrderReference: 'PO-77' })
        .replace(/<cbc:BuyerReference>[^<]*<\/cbc:BuyerReference>/, '')
        .replace(/<cac:OrderReference>[\s\S]*?<\/cac:OrderReference>/, '');

      expect(validateBusinessRules(xml)).toEqual([
        '[PEPPOL-EN16931-R003] A buyer reference or purchase order reference MUST be provided. (location: /Invoice)',
      ]);
      expect(validateBusinessRules(xml, { flavor: 'ubl', profile: 'EN16931' })).toEqual([]);
    });
  });

  it('should return document errors without evaluating rules', () => {
    expect(validateBusinessRules('<Order xmlns="urn:example:order"/>')).toEqual([
      "Unrecognized invoice document: root element 'Order' in namespace 'urn:example:order'",
    ]);
  });
});
