import { CORRECTIVE_TYPE_CODES } from '@einvoice-fr/contracts';
import type {
  Address,
  BankAccount,
  BillingPeriod,
  CurrencyCode,
  DecimalAmount,
  ISODate,
  InvoiceData,
  InvoiceLine,
  InvoiceTotals,
  InvoiceTypeCode,
  OperationCategory,
  Party,
  PaymentMeans,
  PaymentTerms,
  TaxSummary,
} from '@einvoice-fr/contracts';
import { computeTotals, lineNetAmount } from '@einvoice-fr/tax';
import type { z } from 'zod';
import { deepFreeze } from './freeze.js';
import {
  addressSchema,
  invoiceLineSchema,
  invoiceSchema,
  partySchema,
  type AddressInput,
  type InvoiceInput,
  type InvoiceLineInput,
  type ParsedAddress,
  type ParsedInvoice,
  type ParsedInvoiceLine,
  type ParsedLine,
  type ParsedParty,
  type PartyInput,
} from './schemas.js';
import { constructionError } from './violations.js';

function toAddress(parsed: ParsedAddress): Address {
  return {
    street: parsed.street,
    city: parsed.city,
    postalCode: parsed.postalCode,
    countryCode: parsed.countryCode,
    ...(parsed.additionalStreet !== undefined ? { additionalStreet: parsed.additionalStreet } : {}),
    ...(parsed.countrySubdivision !== undefined ? { countrySubdivision: parsed.countrySubdivision } : {}),
  };
}

function toParty(parsed: ParsedParty): Party {
  return {
    name: parsed.name,
    address: toAddress(parsed.address),
    ...(parsed.siren !== undefined ? { siren: parsed.siren } : {}),
    ...(parsed.siret !== undefined ? { siret: parsed.siret } : {}),
    ...(parsed.vatNumber !== undefined ? { vatNumber: parsed.vatNumber } : {}),
    ...(parsed.registrationId !== undefined ? { registrationId: parsed.registrationId } : {}),
    ...(parsed.deliveryAddress !== undefined ? { deliveryAddress: toAddress(parsed.deliveryAddress) } : {}),
    ...(parsed.email !== undefined ? { email: parsed.email } : {}),
    ...(parsed.phone !== undefined ? { phone: parsed.phone } : {}),
  };
}

function toLine(parsed: ParsedLine): InvoiceLine {
  return {
    description: parsed.description,
    quantity: parsed.quantity,
    unit: parsed.unit,
    unitPrice: parsed.unitPrice,
    vatRate: parsed.vatRate,
    vatCategory: parsed.vatCategory,
    ...(parsed.lineNumber !== undefined ? { lineNumber: parsed.lineNumber } : {}),
    ...(parsed.itemReference !== undefined ? { itemReference: parsed.itemReference } : {}),
    ...(parsed.buyerReference !== undefined ? { buyerReference: parsed.buyerReference } : {}),
    ...(parsed.discountAmount !== undefined ? { discountAmount: parsed.discountAmount } : {}),
    ...(parsed.chargeAmount !== undefined ? { chargeAmount: parsed.chargeAmount } : {}),
    ...(parsed.vatExemptionReason !== undefined ? { vatExemptionReason: parsed.vatExemptionReason } : {}),
    ...(parsed.vatExemptionReasonCode !== undefined ? { vatExemptionReasonCode: parsed.vatExemptionReasonCode } : {}),
    ...(parsed.billingPeriod !== undefined ? { billingPeriod: { ...parsed.billingPeriod } } : {}),
  };
}

function toInvoiceLine(parsed: ParsedInvoiceLine): InvoiceLine {
  const line = toLine(parsed);
  return parsed.subLines !== undefined ? { ...line, subLines: parsed.subLines.map(toLine) } : line;
}

function toPaymentTerms(parsed: NonNullable<ParsedInvoice['paymentTerms']>): PaymentTerms {
  return {
    recoveryFee: parsed.recoveryFee,
    ...(parsed.description !== undefined ? { description: parsed.description } : {}),
    ...(parsed.latePenaltyRate !== undefined ? { latePenaltyRate: parsed.latePenaltyRate } : {}),
    ...(parsed.earlyDiscount !== undefined ? { earlyDiscount: parsed.earlyDiscount } : {}),
  };
}

function toPaymentMeans(parsed: NonNullable<ParsedInvoice['paymentMeans']>): PaymentMeans {
  let bankAccount: BankAccount | undefined;
  if (parsed.bankAccount !== undefined) {
    bankAccount = { iban: parsed.bankAccount.iban };
    if (parsed.bankAccount.bic !== undefined) {
      bankAccount = { ...bankAccount, bic: parsed.bankAccount.bic };
    }
  }

  return {
    code: parsed.code,
    ...(bankAccount !== undefined ? { bankAccount } : {}),
    ...(parsed.paymentReference !== undefined ? { paymentReference: parsed.paymentReference } : {}),
  };
}

function parseOrThrow<S extends z.ZodTypeAny>(schema: S, input: unknown, subject: string): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw constructionError(subject, result.error);
  }
  return result.data;
}

/**
 * An immutable invoice.
 *
 * Only the stored attributes live on the instance. Totals and the VAT
 * breakdown are recomputed from the lines by the tax engine on every access,
 * so they cannot drift from the lines.
 */
export class Invoice implements InvoiceData {
  readonly number: string;
  readonly issueDate: ISODate;
  readonly dueDate?: ISODate;
  readonly typeCode: InvoiceTypeCode;
  readonly currency: CurrencyCode;
  readonly seller: Party;
  readonly buyer: Party;
  readonly lines: readonly InvoiceLine[];
  readonly operationCategory: OperationCategory;
  readonly vatOnDebits: boolean;
  readonly purchaseOrderReference?: string;
  readonly contractReference?: string;
  readonly precedingInvoiceReference?: string;
  readonly buyerAccountingReference?: string;
  readonly paymentTerms?: PaymentTerms;
  readonly paymentMeans?: PaymentMeans;
  readonly prepaidAmount?: DecimalAmount;
  readonly billingPeriod?: BillingPeriod;
  readonly payee?: Party;
  readonly payer?: Party;
  readonly note?: string;

  private constructor(parsed: ParsedInvoice) {
    this.number = parsed.number;
    this.issueDate = parsed.issueDate;
    this.typeCode = parsed.typeCode;
    this.currency = parsed.currency;
    this.seller = deepFreeze(toParty(parsed.seller));
    this.buyer = deepFreeze(toParty(parsed.buyer));
    this.lines = deepFreeze(parsed.lines.map(toInvoiceLine));
    this.operationCategory = parsed.operationCategory;
    this.vatOnDebits = parsed.vatOnDebits;

    if (parsed.dueDate !== undefined) this.dueDate = parsed.dueDate;
    if (parsed.purchaseOrderReference !== undefined) this.purchaseOrderReference = parsed.purchaseOrderReference;
    if (parsed.contractReference !== undefined) this.contractReference = parsed.contractReference;
    if (parsed.precedingInvoiceReference !== undefined) this.precedingInvoiceReference = parsed.precedingInvoiceReference;
    if (parsed.buyerAccountingReference !== undefined) this.buyerAccountingReference = parsed.buyerAccountingReference;
    if (parsed.paymentTerms !== undefined) this.paymentTerms = deepFreeze(toPaymentTerms(parsed.paymentTerms));
    if (parsed.paymentMeans !== undefined) this.paymentMeans = deepFreeze(toPaymentMeans(parsed.paymentMeans));
    if (parsed.prepaidAmount !== undefined) this.prepaidAmount = parsed.prepaidAmount;
    if (parsed.billingPeriod !== undefined) this.billingPeriod = deepFreeze({ ...parsed.billingPeriod });
    if (parsed.payee !== undefined) this.payee = deepFreeze(toParty(parsed.payee));
    if (parsed.payer !== undefined) this.payer = deepFreeze(toParty(parsed.payer));
    if (parsed.note !== undefined) this.note = parsed.note;

    Object.freeze(this);
  }

  /**
   * Validates the input, applies defaults and returns a frozen invoice.
   * Every violation is listed on the thrown `ValidationError`.
   */
  static create(input: InvoiceInput): Invoice {
    return new Invoice(parseOrThrow(invoiceSchema, input, 'invoice'));
  }

  get totals(): InvoiceTotals {
    return computeTotals(this);
  }

  get netTotal(): DecimalAmount {
    return this.totals.netTotal;
  }

  get taxTotal(): DecimalAmount {
    return this.totals.taxTotal;
  }

  get grossTotal(): DecimalAmount {
    return this.totals.grossTotal;
  }

  get amountDue(): DecimalAmount {
    return this.totals.amountDue;
  }

  get taxSummaries(): readonly TaxSummary[] {
    return this.totals.taxSummaries;
  }

  /**
   * Exact net amount of each line, in line order
   */
  lineNetAmounts(): DecimalAmount[] {
    return this.lines.map(lineNetAmount);
  }

  isCorrective(): boolean {
    return CORRECTIVE_TYPE_CODES.has(this.typeCode);
  }

  toJSON(): InvoiceData & { totals: InvoiceTotals } {
    return { ...this, totals: this.totals };
  }
}

export function createInvoice(input: InvoiceInput): Invoice {
  return Invoice.create(input);
}

export function createInvoiceLine(input: InvoiceLineInput): InvoiceLine {
  return deepFreeze(toInvoiceLine(parseOrThrow(invoiceLineSchema, input, 'invoice line')));
}

export function createParty(input: PartyInput): Party {
  return deepFreeze(toParty(parseOrThrow(partySchema, input, 'party')));
}

export function createAddress(input: AddressInput): Address {
  return deepFreeze(toAddress(parseOrThrow(addressSchema, input, 'address')));
}
