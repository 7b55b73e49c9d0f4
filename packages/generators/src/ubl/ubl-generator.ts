import {
  OPERATION_CATEGORY_LABELS,
  PEPPOL_PROFILE_ID,
  UBL_CUSTOMIZATION_IDS,
  UBL_PROFILES,
  isCodeOf,
  type Address,
  type InvoiceData,
  type InvoiceLine,
  type InvoiceTotals,
  type Party,
  type UblProfile,
} from '@einvoice-fr/contracts';
import {
  ConfigurationError,
  createSafeLogger,
  element,
  isNegative,
  negate,
  normalizeDecimal,
  optionalElement,
  round,
  type XmlNode,
} from '@einvoice-fr/shared';
import { lineNetAmount, minorUnitsFor } from '@einvoice-fr/tax';
import { BaseGenerator, type GeneratorOptions } from '../base-generator.js';
import { EncodingError } from '../errors.js';
import { formatRate } from '../format.js';
import { UBL_NAMESPACES } from './namespaces.js';

export const VAT_ON_DEBITS_NOTE = 'TVA sur les débits';

/**
 * Element names that differ between the Invoice and CreditNote documents
 */
interface DocumentVocabulary {
  root: 'Invoice' | 'CreditNote';
  namespace: string;
  typeCode: string;
  line: string;
  quantity: string;
}

const INVOICE_VOCABULARY: DocumentVocabulary = {
  root: 'Invoice',
  namespace: UBL_NAMESPACES.invoice,
  typeCode: 'cbc:InvoiceTypeCode',
  line: 'cac:InvoiceLine',
  quantity: 'cbc:InvoicedQuantity',
};

const CREDIT_NOTE_VOCABULARY: DocumentVocabulary = {
  root: 'CreditNote',
  namespace: UBL_NAMESPACES.creditNote,
  typeCode: 'cbc:CreditNoteTypeCode',
  line: 'cac:CreditNoteLine',
  quantity: 'cbc:CreditedQuantity',
};

function postalAddress(name: string, address: Address): XmlNode {
  return element(name, [
    element('cbc:StreetName', address.street),
    optionalElement('cbc:AdditionalStreetName', address.additionalStreet),
    element('cbc:CityName', address.city),
    element('cbc:PostalZone', address.postalCode),
    optionalElement('cbc:CountrySubentity', address.countrySubdivision),
    element('cac:Country', [element('cbc:IdentificationCode', address.countryCode)]),
  ]);
}

/**
 * Endpoint and legal entity carry the SIREN (scheme 0002), the party
 * identification the SIRET (scheme 0009).
 */
function party(name: string, value: Party): XmlNode {
  return element(name, [
    element('cac:Party', [
      optionalElement('cbc:EndpointID', value.siren, { schemeID: '0002' }),
      value.siret !== undefined &&
        element('cac:PartyIdentification', [element('cbc:ID', value.siret, { schemeID: '0009' })]),
      element('cac:PartyName', [element('cbc:Name', value.name)]),
      postalAddress('cac:PostalAddress', value.address),
      value.vatNumber !== undefined &&
        element('cac:PartyTaxScheme', [
          element('cbc:CompanyID', value.vatNumber),
          element('cac:TaxScheme', [element('cbc:ID', 'VAT')]),
        ]),
      element('cac:PartyLegalEntity', [
        element('cbc:RegistrationName', value.name),
        optionalElement('cbc:CompanyID', value.siren, { schemeID: '0002' }),
      ]),
      (value.phone !== undefined || value.email !== undefined) &&
        element('cac:Contact', [
          optionalElement('cbc:Telephone', value.phone),
          optionalElement('cbc:ElectronicMail', value.email),
        ]),
    ]),
  ]);
}

function payeeParty(value: Party): XmlNode {
  return element('cac:PayeeParty', [
    value.siret !== undefined &&
      element('cac:PartyIdentification', [element('cbc:ID', value.siret, { schemeID: '0009' })]),
    element('cac:PartyName', [element('cbc:Name', value.name)]),
    value.siren !== undefined &&
      element('cac:PartyLegalEntity', [element('cbc:CompanyID', value.siren, { schemeID: '0002' })]),
  ]);
}

function taxScheme(): XmlNode {
  return element('cac:TaxScheme', [element('cbc:ID', 'VAT')]);
}

/**
 * Encoder for UBL 2.1. A credit note (381) is written as a CreditNote
 * document; when its net total is negative every amount and quantity of the
 * document changes sign, so that the totals stay positive and the lines
 * still add up. Every other type is an Invoice.
 */
export class UblGenerator extends BaseGenerator<UblProfile> {
  readonly format = 'ubl' as const;

  constructor(profile = 'EN16931', options: GeneratorOptions = {}) {
    if (!isCodeOf(UBL_PROFILES, profile)) {
      throw new ConfigurationError(`Unknown UBL profile: ${profile}. Available profiles: ${UBL_PROFILES.join(', ')}`, {
        profile,
      });
    }
    super(profile, options.logger ?? createSafeLogger({ prefix: 'generators:ubl' }));
  }

  protected override checkEncodable(invoice: InvoiceData): void {
    super.checkEncodable(invoice);

    if (invoice.typeCode === '381' && invoice.dueDate !== undefined && invoice.paymentMeans === undefined) {
      throw new EncodingError(
        'A credit note due date is written in the payment means: set the payment means',
        'paymentMeans',
        this.profile,
      );
    }

    if (this.profile === 'PEPPOL' && !invoice.buyerAccountingReference && !invoice.purchaseOrderReference) {
      throw new EncodingError(
        'PEPPOL requires a buyer reference: set a buyer accounting reference or a purchase order reference',
        'buyerReference',
        this.profile,
      );
    }
  }

  protected buildDocument(invoice: InvoiceData, totals: InvoiceTotals): XmlNode {
    const isCreditNote = invoice.typeCode === '381';
    const vocabulary = isCreditNote ? CREDIT_NOTE_VOCABULARY : INVOICE_VOCABULARY;
    const flip = isCreditNote && isNegative(totals.netTotal);
    const amount = (value: string): string => (flip ? negate(value) : value);
    const money = (name: string, value: string): XmlNode => element(name, amount(value), { currencyID: invoice.currency });
    const places = minorUnitsFor(invoice.currency);
    const buyerReference = invoice.buyerAccountingReference ?? invoice.purchaseOrderReference;

    const notes = [
      optionalElement('cbc:Note', invoice.note),
      element('cbc:Note', `#AAI#${OPERATION_CATEGORY_LABELS[invoice.operationCategory]}`),
      invoice.vatOnDebits && element('cbc:Note', VAT_ON_DEBITS_NOTE),
    ];

    const line = (value: InvoiceLine, index: number): XmlNode =>
      element(vocabulary.line, [
        element('cbc:ID', String(value.lineNumber ?? index + 1)),
        element(vocabulary.quantity, amount(value.quantity), { unitCode: value.unit }),
        money('cbc:LineExtensionAmount', round(lineNetAmount(value), places)),
        value.billingPeriod !== undefined &&
          element('cac:InvoicePeriod', [
            element('cbc:StartDate', value.billingPeriod.start),
            element('cbc:EndDate', value.billingPeriod.end),
          ]),
        // A flipped charge reads as an allowance of the same amount
        value.chargeAmount !== undefined &&
          element('cac:AllowanceCharge', [
            element('cbc:ChargeIndicator', String(!flip)),
            element('cbc:Amount', value.chargeAmount, { currencyID: invoice.currency }),
          ]),
        value.discountAmount !== undefined &&
          element('cac:AllowanceCharge', [
            element('cbc:ChargeIndicator', String(flip)),
            element('cbc:Amount', value.discountAmount, { currencyID: invoice.currency }),
          ]),
        element('cac:Item', [
          element('cbc:Name', value.description),
          value.buyerReference !== undefined &&
            element('cac:BuyersItemIdentification', [element('cbc:ID', value.buyerReference)]),
          value.itemReference !== undefined &&
            element('cac:SellersItemIdentification', [element('cbc:ID', value.itemReference)]),
          element('cac:ClassifiedTaxCategory', [
            element('cbc:ID', value.vatCategory),
            element('cbc:Percent', formatRate(value.vatRate)),
            taxScheme(),
          ]),
        ]),
        // The sign moves to the quantity; the unit price is kept as it is
        element('cac:Price', [
          element('cbc:PriceAmount', normalizeDecimal(value.unitPrice), { currencyID: invoice.currency }),
        ]),
      ]);

    return element(
      vocabulary.root,
      [
        element('cbc:CustomizationID', UBL_CUSTOMIZATION_IDS[this.profile]),
        this.profile === 'PEPPOL' && element('cbc:ProfileID', PEPPOL_PROFILE_ID),
        element('cbc:ID', invoice.number),
        element('cbc:IssueDate', invoice.issueDate),
        !isCreditNote && optionalElement('cbc:DueDate', invoice.dueDate),
        element(vocabulary.typeCode, invoice.typeCode),
        ...notes,
        element('cbc:DocumentCurrencyCode', invoice.currency),
        optionalElement('cbc:AccountingCost', invoice.buyerAccountingReference),
        optionalElement('cbc:BuyerReference', buyerReference),
        invoice.billingPeriod !== undefined &&
          element('cac:InvoicePeriod', [
            element('cbc:StartDate', invoice.billingPeriod.start),
            element('cbc:EndDate', invoice.billingPeriod.end),
          ]),
        invoice.purchaseOrderReference !== undefined &&
          element('cac:OrderReference', [element('cbc:ID', invoice.purchaseOrderReference)]),
        invoice.precedingInvoiceReference !== undefined &&
          element('cac:BillingReference', [
            element('cac:InvoiceDocumentReference', [element('cbc:ID', invoice.precedingInvoiceReference)]),
          ]),
        invoice.contractReference !== undefined &&
          element('cac:ContractDocumentReference', [element('cbc:ID', invoice.contractReference)]),
        party('cac:AccountingSupplierParty', invoice.seller),
        party('cac:AccountingCustomerParty', invoice.buyer),
        invoice.payee !== undefined && payeeParty(invoice.payee),
        invoice.buyer.deliveryAddress !== undefined &&
          element('cac:Delivery', [
            element('cac:DeliveryLocation', [postalAddress('cac:Address', invoice.buyer.deliveryAddress)]),
          ]),
        invoice.paymentMeans !== undefined &&
          element('cac:PaymentMeans', [
            element('cbc:PaymentMeansCode', invoice.paymentMeans.code),
            isCreditNote && optionalElement('cbc:PaymentDueDate', invoice.dueDate),
            optionalElement('cbc:PaymentID', invoice.paymentMeans.paymentReference),
            invoice.paymentMeans.bankAccount !== undefined &&
              element('cac:PayeeFinancialAccount', [
                element('cbc:ID', invoice.paymentMeans.bankAccount.iban),
                invoice.paymentMeans.bankAccount.bic !== undefined &&
                  element('cac:FinancialInstitutionBranch', [
                    element('cbc:ID', invoice.paymentMeans.bankAccount.bic),
                  ]),
              ]),
          ]),
        invoice.paymentTerms?.description !== undefined &&
          element('cac:PaymentTerms', [element('cbc:Note', invoice.paymentTerms.description)]),
        element('cac:TaxTotal', [
          money('cbc:TaxAmount', totals.taxTotal),
          ...totals.taxSummaries.map((summary) =>
            element('cac:TaxSubtotal', [
              money('cbc:TaxableAmount', summary.taxableAmount),
              money('cbc:TaxAmount', summary.taxAmount),
              element('cac:TaxCategory', [
                element('cbc:ID', summary.vatCategory),
                element('cbc:Percent', formatRate(summary.vatRate)),
                optionalElement('cbc:TaxExemptionReasonCode', summary.vatExemptionReasonCode),
                optionalElement('cbc:TaxExemptionReason', summary.vatExemptionReason),
                taxScheme(),
              ]),
            ]),
          ),
        ]),
        element('cac:LegalMonetaryTotal', [
          money('cbc:LineExtensionAmount', totals.netTotal),
          money('cbc:TaxExclusiveAmount', totals.netTotal),
          money('cbc:TaxInclusiveAmount', totals.grossTotal),
          invoice.prepaidAmount !== undefined && money('cbc:PrepaidAmount', totals.prepaidAmount),
          money('cbc:PayableAmount', totals.amountDue),
        ]),
        ...invoice.lines.map(line),
      ],
      {
        xmlns: vocabulary.namespace,
        'xmlns:cac': UBL_NAMESPACES.cac,
        'xmlns:cbc': UBL_NAMESPACES.cbc,
      },
    );
  }
}
