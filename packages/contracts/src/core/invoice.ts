import type {
  InvoiceTypeCode,
  OperationCategory,
  PaymentMeansCode,
  UnitOfMeasure,
  VatCategory,
} from './codes.js';
import type { CountryCode, CurrencyCode, DecimalAmount, ISODate } from './primitives.js';

/**
 * Postal address (EN16931 BG-5 / BG-8 / BG-15)
 */
export interface Address {
  /** Street and number */
  readonly street: string;

  /** Additional street line */
  readonly additionalStreet?: string;

  readonly city: string;

  readonly postalCode: string;

  /**
   * Country code (ISO 3166-1 alpha-2)
   * @default "FR"
   */
  readonly countryCode: CountryCode;

  /** Country subdivision (département, région) */
  readonly countrySubdivision?: string;
}

/**
 * Seller, buyer, payee or payer of an invoice
 */
export interface Party {
  /** Legal name */
  readonly name: string;

  /** SIREN, the 9-digit national business identifier */
  readonly siren?: string;

  /** SIRET, the 14-digit establishment identifier */
  readonly siret?: string;

  /** Intra-community VAT number */
  readonly vatNumber?: string;

  /** Other legal registration identifier */
  readonly registrationId?: string;

  readonly address: Address;

  /** Delivery address when it differs from the main address */
  readonly deliveryAddress?: Address;

  readonly email?: string;

  readonly phone?: string;
}

/**
 * Inclusive date range (EN16931 BG-14 / BG-26)
 */
export interface BillingPeriod {
  readonly start: ISODate;
  readonly end: ISODate;
}

export interface BankAccount {
  readonly iban: string;
  readonly bic?: string;
}

/**
 * Payment terms, including the French Commercial Code mentions
 * (late penalties, early discount, fixed recovery fee).
 */
export interface PaymentTerms {
  /** Free text, e.g. "30 jours fin de mois" */
  readonly description?: string;

  /** Late payment penalty rate in percent */
  readonly latePenaltyRate?: DecimalAmount;

  /** Early payment discount terms ("Néant" when none) */
  readonly earlyDiscount?: string;

  /**
   * Fixed recovery fee in EUR
   * @default "40.00"
   */
  readonly recoveryFee: DecimalAmount;
}

export interface PaymentMeans {
  readonly code: PaymentMeansCode;
  readonly bankAccount?: BankAccount;
  readonly paymentReference?: string;
}

/**
 * Invoice line (EN16931 BG-25)
 */
export interface InvoiceLine {
  /** Explicit line number; lines are numbered by position when absent */
  readonly lineNumber?: number;

  readonly description: string;

  /** May be negative (reversal of an advance) */
  readonly quantity: DecimalAmount;

  /** @default "C62" */
  readonly unit: UnitOfMeasure;

  /** Net unit price; may be negative for deduction lines */
  readonly unitPrice: DecimalAmount;

  /**
   * VAT rate in percent
   * @default "20.0"
   */
  readonly vatRate: DecimalAmount;

  /** @default "S" */
  readonly vatCategory: VatCategory;

  /** Seller item reference */
  readonly itemReference?: string;

  /** Buyer item reference */
  readonly buyerReference?: string;

  readonly discountAmount?: DecimalAmount;

  readonly chargeAmount?: DecimalAmount;

  /** BT-121, e.g. "Autoliquidation" */
  readonly vatExemptionReason?: string;

  /** BT-120, VATEX code such as "VATEX-EU-AE" */
  readonly vatExemptionReasonCode?: string;

  readonly billingPeriod?: BillingPeriod;

  /** Detail lines (EXTENDED profile only); they do not count towards totals */
  readonly subLines?: readonly InvoiceLine[];
}

/**
 * Stored attributes of an invoice. Totals are never part of this shape:
 * they are derived from the lines by the tax engine.
 */
export interface InvoiceData {
  readonly number: string;
  readonly issueDate: ISODate;
  readonly dueDate?: ISODate;

  /** @default "380" */
  readonly typeCode: InvoiceTypeCode;

  /** @default "EUR" */
  readonly currency: CurrencyCode;

  readonly seller: Party;
  readonly buyer: Party;

  /** At least one line */
  readonly lines: readonly InvoiceLine[];

  readonly operationCategory: OperationCategory;

  /** VAT on debits option */
  readonly vatOnDebits: boolean;

  readonly purchaseOrderReference?: string;
  readonly contractReference?: string;

  /** Required for credit notes and corrected invoices */
  readonly precedingInvoiceReference?: string;

  readonly buyerAccountingReference?: string;

  readonly paymentTerms?: PaymentTerms;
  readonly paymentMeans?: PaymentMeans;

  /** Amount already paid (advances, retention guarantee), BT-113 */
  readonly prepaidAmount?: DecimalAmount;

  readonly billingPeriod?: BillingPeriod;

  /** Payee when different from the seller (factoring) */
  readonly payee?: Party;

  /** Third-party payer (EXTENDED profile only) */
  readonly payer?: Party;

  readonly note?: string;
}

/**
 * VAT breakdown for one (category, rate) pair
 */
export interface TaxSummary {
  readonly vatCategory: VatCategory;
  readonly vatRate: DecimalAmount;
  readonly taxableAmount: DecimalAmount;
  readonly taxAmount: DecimalAmount;
  readonly vatExemptionReason?: string;
  readonly vatExemptionReasonCode?: string;
}

/**
 * Document totals derived from the lines
 */
export interface InvoiceTotals {
  readonly netTotal: DecimalAmount;
  readonly taxTotal: DecimalAmount;
  readonly grossTotal: DecimalAmount;
  readonly prepaidAmount: DecimalAmount;

  /** Gross total minus prepaid amount; negative means a credit in the buyer's favour */
  readonly amountDue: DecimalAmount;

  readonly taxSummaries: readonly TaxSummary[];
}
