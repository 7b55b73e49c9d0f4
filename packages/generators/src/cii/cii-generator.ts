import {
  CII_PROFILES,
  CII_PROFILE_INFO,
  OPERATION_CATEGORY_LABELS,
  isCodeOf,
  type Address,
  type BillingPeriod,
  type CiiProfile,
  type CiiProfileInfo,
  type InvoiceData,
  type InvoiceLine,
  type InvoiceTotals,
  type Party,
  type PaymentMeans,
  type TaxSummary,
} from '@einvoice-fr/contracts';
import { ConfigurationError, createSafeLogger, element, optionalElement, round, type XmlNode } from '@einvoice-fr/shared';
import { lineNetAmount, minorUnitsFor } from '@einvoice-fr/tax';
import { BaseGenerator, type GeneratorOptions } from '../base-generator.js';
import { formatRate, toFormat102 } from '../format.js';
import { CII_NAMESPACES, CII_ROOT } from './namespaces.js';

/** Factur-X legal mention subject codes */
const NOTE_SUBJECTS = {
  operationCategory: 'AAI',
  latePenalty: 'PMD',
  recoveryFee: 'PMT',
  earlyDiscount: 'AAB',
} as const;

const SUB_LINE_STATUS_REASON = 'DETAIL';

function dateTime(name: string, date: string): XmlNode {
  return element(name, [element('udt:DateTimeString', toFormat102(date), { format: '102' })]);
}

function note(content: string, subjectCode?: string): XmlNode {
  return element('ram:IncludedNote', [
    element('ram:Content', content),
    optionalElement('ram:SubjectCode', subjectCode),
  ]);
}

function billingPeriod(period: BillingPeriod): XmlNode {
  return element('ram:BillingSpecifiedPeriod', [
    dateTime('ram:StartDateTime', period.start),
    dateTime('ram:EndDateTime', period.end),
  ]);
}

function postalAddress(address: Address): XmlNode {
  return element('ram:PostalTradeAddress', [
    element('ram:PostcodeCode', address.postalCode),
    element('ram:LineOne', address.street),
    optionalElement('ram:LineTwo', address.additionalStreet),
    element('ram:CityName', address.city),
    element('ram:CountryID', address.countryCode),
    optionalElement('ram:CountrySubDivisionName', address.countrySubdivision),
  ]);
}

/**
 * SIRET as global id (scheme 0009), SIREN as legal organization (scheme
 * 0002), VAT number as tax registration (scheme VA).
 */
function tradeParty(name: string, party: Party): XmlNode {
  return element(name, [
    optionalElement('ram:GlobalID', party.siret, { schemeID: '0009' }),
    element('ram:Name', party.name),
    party.siren !== undefined &&
      element('ram:SpecifiedLegalOrganization', [element('ram:ID', party.siren, { schemeID: '0002' })]),
    postalAddress(party.address),
    party.email !== undefined &&
      element('ram:URIUniversalCommunication', [element('ram:URIID', party.email, { schemeID: 'EM' })]),
    party.vatNumber !== undefined &&
      element('ram:SpecifiedTaxRegistration', [element('ram:ID', party.vatNumber, { schemeID: 'VA' })]),
  ]);
}

function documentNotes(invoice: InvoiceData): XmlNode[] {
  const notes: XmlNode[] = [];
  if (invoice.note !== undefined) {
    notes.push(note(invoice.note));
  }
  notes.push(note(OPERATION_CATEGORY_LABELS[invoice.operationCategory], NOTE_SUBJECTS.operationCategory));

  const terms = invoice.paymentTerms;
  if (terms !== undefined) {
    if (terms.latePenaltyRate !== undefined) {
      notes.push(note(`Pénalités de retard : ${terms.latePenaltyRate} %`, NOTE_SUBJECTS.latePenalty));
    }
    notes.push(note(`Indemnité forfaitaire pour frais de recouvrement : ${terms.recoveryFee} EUR`, NOTE_SUBJECTS.recoveryFee));
    if (terms.earlyDiscount !== undefined) {
      notes.push(note(`Escompte : ${terms.earlyDiscount}`, NOTE_SUBJECTS.earlyDiscount));
    }
  }
  return notes;
}

function allowanceCharge(isCharge: boolean, amount: string): XmlNode {
  return element('ram:SpecifiedTradeAllowanceCharge', [
    element('ram:ChargeIndicator', [element('udt:Indicator', isCharge ? 'true' : 'false')]),
    element('ram:ActualAmount', amount),
  ]);
}

interface LineIdentity {
  id: string;
  parentId?: string;
}

function lineItem(line: InvoiceLine, identity: LineIdentity, places: number): XmlNode {
  const isSubLine = identity.parentId !== undefined;

  return element('ram:IncludedSupplyChainTradeLineItem', [
    element('ram:AssociatedDocumentLineDocument', [
      element('ram:LineID', identity.id),
      optionalElement('ram:ParentLineID', identity.parentId),
      isSubLine && element('ram:LineStatusReasonCode', SUB_LINE_STATUS_REASON),
    ]),
    element('ram:SpecifiedTradeProduct', [
      optionalElement('ram:SellerAssignedID', line.itemReference),
      optionalElement('ram:BuyerAssignedID', line.buyerReference),
      element('ram:Name', line.description),
    ]),
    element('ram:SpecifiedLineTradeAgreement', [
      element('ram:NetPriceProductTradePrice', [element('ram:ChargeAmount', line.unitPrice)]),
    ]),
    element('ram:SpecifiedLineTradeDelivery', [element('ram:BilledQuantity', line.quantity, { unitCode: line.unit })]),
    element('ram:SpecifiedLineTradeSettlement', [
      element('ram:ApplicableTradeTax', [
        element('ram:TypeCode', 'VAT'),
        optionalElement('ram:ExemptionReason', line.vatExemptionReason),
        element('ram:CategoryCode', line.vatCategory),
        optionalElement('ram:ExemptionReasonCode', line.vatExemptionReasonCode),
        element('ram:RateApplicablePercent', formatRate(line.vatRate)),
      ]),
      line.billingPeriod !== undefined && billingPeriod(line.billingPeriod),
      line.discountAmount !== undefined && allowanceCharge(false, line.discountAmount),
      line.chargeAmount !== undefined && allowanceCharge(true, line.chargeAmount),
      element('ram:SpecifiedTradeSettlementLineMonetarySummation', [
        element('ram:LineTotalAmount', round(lineNetAmount(line), places)),
      ]),
    ]),
  ]);
}

function paymentMeans(means: PaymentMeans): XmlNode {
  const account = means.bankAccount;
  return element('ram:SpecifiedTradeSettlementPaymentMeans', [
    element('ram:TypeCode', means.code),
    account !== undefined && element('ram:PayeePartyCreditorFinancialAccount', [element('ram:IBANID', account.iban)]),
    account?.bic !== undefined &&
      element('ram:PayeeSpecifiedCreditorFinancialInstitution', [element('ram:BICID', account.bic)]),
  ]);
}

function headerTax(summary: TaxSummary, vatOnDebits: boolean): XmlNode {
  return element('ram:ApplicableTradeTax', [
    element('ram:CalculatedAmount', summary.taxAmount),
    element('ram:TypeCode', 'VAT'),
    optionalElement('ram:ExemptionReason', summary.vatExemptionReason),
    element('ram:BasisAmount', summary.taxableAmount),
    element('ram:CategoryCode', summary.vatCategory),
    optionalElement('ram:ExemptionReasonCode', summary.vatExemptionReasonCode),
    // 5 = tax due on invoice date (VAT on debits)
    vatOnDebits && element('ram:DueDateTypeCode', '5'),
    element('ram:RateApplicablePercent', formatRate(summary.vatRate)),
  ]);
}

/**
 * Encoder for the UN/CEFACT Cross Industry Invoice (CII D16B), the XML
 * carried by Factur-X. The profile decides which sections are written:
 * no lines below BASIC, sub-lines and third-party payer only at EXTENDED.
 */
export class CiiGenerator extends BaseGenerator<CiiProfile> {
  readonly format = 'cii' as const;
  readonly info: CiiProfileInfo;

  constructor(profile = 'EN16931', options: GeneratorOptions = {}) {
    if (!isCodeOf(CII_PROFILES, profile)) {
      throw new ConfigurationError(`Unknown CII profile: ${profile}. Available profiles: ${CII_PROFILES.join(', ')}`, {
        profile,
      });
    }
    super(profile, options.logger ?? createSafeLogger({ prefix: 'generators:cii' }));
    this.info = CII_PROFILE_INFO[profile];
  }

  protected buildDocument(invoice: InvoiceData, totals: InvoiceTotals): XmlNode {
    return element(
      `rsm:${CII_ROOT}`,
      [
        element('rsm:ExchangedDocumentContext', [
          element('ram:GuidelineSpecifiedDocumentContextParameter', [element('ram:ID', this.info.guidelineId)]),
        ]),
        element('rsm:ExchangedDocument', [
          element('ram:ID', invoice.number),
          element('ram:TypeCode', invoice.typeCode),
          dateTime('ram:IssueDateTime', invoice.issueDate),
          ...documentNotes(invoice),
        ]),
        element('rsm:SupplyChainTradeTransaction', [
          ...this.lineItems(invoice),
          this.agreement(invoice),
          this.delivery(invoice),
          this.settlement(invoice, totals),
        ]),
      ],
      {
        'xmlns:rsm': CII_NAMESPACES.rsm,
        'xmlns:ram': CII_NAMESPACES.ram,
        'xmlns:qdt': CII_NAMESPACES.qdt,
        'xmlns:udt': CII_NAMESPACES.udt,
      },
    );
  }

  private get isExtended(): boolean {
    return this.profile === 'EXTENDED';
  }

  private lineItems(invoice: InvoiceData): XmlNode[] {
    if (!this.info.includesLines) {
      return [];
    }

    const places = minorUnitsFor(invoice.currency);
    const items: XmlNode[] = [];
    invoice.lines.forEach((line, index) => {
      const id = String(line.lineNumber ?? index + 1);
      items.push(lineItem(line, { id }, places));

      if (this.isExtended) {
        (line.subLines ?? []).forEach((subLine, subIndex) => {
          items.push(lineItem(subLine, { id: `${id}.${subIndex + 1}`, parentId: id }, places));
        });
      }
    });
    return items;
  }

  private agreement(invoice: InvoiceData): XmlNode {
    return element('ram:ApplicableHeaderTradeAgreement', [
      tradeParty('ram:SellerTradeParty', invoice.seller),
      tradeParty('ram:BuyerTradeParty', invoice.buyer),
      invoice.purchaseOrderReference !== undefined &&
        element('ram:BuyerOrderReferencedDocument', [element('ram:IssuerAssignedID', invoice.purchaseOrderReference)]),
      invoice.contractReference !== undefined &&
        element('ram:ContractReferencedDocument', [element('ram:IssuerAssignedID', invoice.contractReference)]),
    ]);
  }

  private delivery(invoice: InvoiceData): XmlNode {
    const shipTo = invoice.buyer.deliveryAddress;
    return element('ram:ApplicableHeaderTradeDelivery', [
      shipTo !== undefined && element('ram:ShipToTradeParty', [postalAddress(shipTo)]),
    ]);
  }

  private settlement(invoice: InvoiceData, totals: InvoiceTotals): XmlNode {
    const { payee, payer, paymentTerms } = invoice;

    return element('ram:ApplicableHeaderTradeSettlement', [
      optionalElement('ram:PaymentReference', invoice.paymentMeans?.paymentReference),
      element('ram:InvoiceCurrencyCode', invoice.currency),
      payee !== undefined && tradeParty('ram:PayeeTradeParty', payee),
      this.isExtended && payer !== undefined && tradeParty('ram:PayerTradeParty', payer),
      invoice.paymentMeans !== undefined && paymentMeans(invoice.paymentMeans),
      ...totals.taxSummaries.map((summary) => headerTax(summary, invoice.vatOnDebits)),
      invoice.billingPeriod !== undefined && billingPeriod(invoice.billingPeriod),
      (paymentTerms !== undefined || invoice.dueDate !== undefined) &&
        element('ram:SpecifiedTradePaymentTerms', [
          optionalElement('ram:Description', paymentTerms?.description),
          invoice.dueDate !== undefined && dateTime('ram:DueDateDateTime', invoice.dueDate),
        ]),
      this.monetarySummation(invoice, totals),
      invoice.precedingInvoiceReference !== undefined &&
        element('ram:InvoiceReferencedDocument', [element('ram:IssuerAssignedID', invoice.precedingInvoiceReference)]),
      invoice.buyerAccountingReference !== undefined &&
        element('ram:ReceivableSpecifiedTradeAccountingAccount', [element('ram:ID', invoice.buyerAccountingReference)]),
    ]);
  }

  private monetarySummation(invoice: InvoiceData, totals: InvoiceTotals): XmlNode {
    return element('ram:SpecifiedTradeSettlementHeaderMonetarySummation', [
      this.profile !== 'MINIMUM' && element('ram:LineTotalAmount', totals.netTotal),
      element('ram:TaxBasisTotalAmount', totals.netTotal),
      element('ram:TaxTotalAmount', totals.taxTotal, { currencyID: invoice.currency }),
      element('ram:GrandTotalAmount', totals.grossTotal),
      invoice.prepaidAmount !== undefined && element('ram:TotalPrepaidAmount', totals.prepaidAmount),
      element('ram:DuePayableAmount', totals.amountDue),
    ]);
  }
}
