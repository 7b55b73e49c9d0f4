import { z } from 'zod';
import {
  INVOICE_TYPE_CODES,
  OPERATION_CATEGORIES,
  PAYMENT_MEANS_CODES,
  UNITS_OF_MEASURE,
  VAT_CATEGORIES,
} from '@einvoice-fr/contracts';
import {
  ISO_DATE_PATTERN,
  SIREN_PATTERN,
  SIRET_PATTERN,
  fromNumber,
  isCalendarDate,
  isNegative,
  isZero,
  isValidDecimalAmount,
  normalizeDecimal,
  validateVatNumberFormat,
} from '@einvoice-fr/shared';

/**
 * Rule identifiers attached to the checks zod cannot express on its own.
 * They become the `code` of the reported violation.
 */
export const MODEL_RULES = {
  reverseChargeRate: 'MODEL-AE-RATE',
  reverseChargeReason: 'MODEL-AE-REASON',
  billingPeriod: 'MODEL-BILLING-PERIOD',
  vatNumber: 'MODEL-VAT-NUMBER',
  siretSiren: 'MODEL-SIRET-SIREN',
  calendarDate: 'MODEL-DATE',
} as const;

/**
 * Decimal given as a string or a number, carried on as a normalized string
 */
export const decimalSchema = z
  .union([
    z.string().trim().refine(isValidDecimalAmount, { message: 'Invalid decimal amount' }),
    z.number().finite(),
  ])
  .transform((value) => (typeof value === 'number' ? fromNumber(value) : normalizeDecimal(value)));

export const nonNegativeDecimalSchema = decimalSchema.refine(
  (value) => !isValidDecimalAmount(String(value)) || !isNegative(value),
  { message: 'Must be greater than or equal to 0' },
);

export const isoDateSchema = z
  .string()
  .regex(ISO_DATE_PATTERN, 'Expected a YYYY-MM-DD date')
  .refine(isCalendarDate, { message: 'Not a calendar date', params: { rule: MODEL_RULES.calendarDate } });

const optionalText = z.string().trim().min(1).optional();

export const billingPeriodSchema = z
  .object({
    start: isoDateSchema,
    end: isoDateSchema,
  })
  .refine((period) => period.start <= period.end, {
    message: 'Billing period start must not be after its end',
    path: ['end'],
    params: { rule: MODEL_RULES.billingPeriod },
  });

export const addressSchema = z.object({
  street: z.string().trim().min(1, 'Street is required'),
  additionalStreet: optionalText,
  city: z.string().trim().min(1, 'City is required'),
  postalCode: z.string().trim().min(1, 'Postal code is required'),
  countryCode: z
    .string()
    .regex(/^[A-Z]{2}$/, 'Country code must be two uppercase letters')
    .default('FR'),
  countrySubdivision: optionalText,
});

export const partySchema = z
  .object({
    name: z.string().trim().min(1, 'Party name is required'),
    siren: z.string().regex(SIREN_PATTERN, 'SIREN must be exactly 9 digits').optional(),
    siret: z.string().regex(SIRET_PATTERN, 'SIRET must be exactly 14 digits').optional(),
    vatNumber: z.string().trim().optional(),
    registrationId: optionalText,
    address: addressSchema,
    deliveryAddress: addressSchema.optional(),
    email: z.string().email().optional(),
    phone: optionalText,
  })
  .superRefine((party, ctx) => {
    if (party.vatNumber !== undefined) {
      const check = validateVatNumberFormat(party.vatNumber);
      if (!check.valid) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: check.reason ?? 'Invalid VAT number',
          path: ['vatNumber'],
          params: { rule: MODEL_RULES.vatNumber },
        });
      }
    }
    if (party.siren !== undefined && party.siret !== undefined && !party.siret.startsWith(party.siren)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'SIRET does not belong to the SIREN',
        path: ['siret'],
        params: { rule: MODEL_RULES.siretSiren },
      });
    }
  });

const lineShape = {
  lineNumber: z.number().int().positive().optional(),
  description: z.string().trim().min(1, 'Line description is required'),
  quantity: decimalSchema,
  unit: z.enum(UNITS_OF_MEASURE).default('C62'),
  unitPrice: decimalSchema,
  vatRate: nonNegativeDecimalSchema.default('20.0'),
  vatCategory: z.enum(VAT_CATEGORIES).default('S'),
  itemReference: optionalText,
  buyerReference: optionalText,
  discountAmount: nonNegativeDecimalSchema.optional(),
  chargeAmount: nonNegativeDecimalSchema.optional(),
  vatExemptionReason: optionalText,
  vatExemptionReasonCode: optionalText,
  billingPeriod: billingPeriodSchema.optional(),
};

interface ReverseChargeFields {
  vatCategory: string;
  vatRate: string;
  vatExemptionReasonCode?: string | undefined;
}

function checkReverseCharge(line: ReverseChargeFields, ctx: z.RefinementCtx): void {
  if (line.vatCategory !== 'AE') {
    return;
  }
  // An unparseable rate has already been reported
  const rate = String(line.vatRate);
  if (isValidDecimalAmount(rate) && !isZero(rate)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'Reverse charge lines must have a VAT rate of 0',
      path: ['vatRate'],
      params: { rule: MODEL_RULES.reverseChargeRate },
    });
  }
  if (line.vatExemptionReasonCode === undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'Reverse charge lines require a VAT exemption reason code',
      path: ['vatExemptionReasonCode'],
      params: { rule: MODEL_RULES.reverseChargeReason },
    });
  }
}

/** Detail line; nested one level below a line */
export const subLineSchema = z.object(lineShape).superRefine(checkReverseCharge);

export const invoiceLineSchema = z
  .object({ ...lineShape, subLines: z.array(subLineSchema).min(1).optional() })
  .superRefine(checkReverseCharge);

export const bankAccountSchema = z.object({
  iban: z
    .string()
    .transform((value) => value.replace(/\s/g, '').toUpperCase())
    .pipe(z.string().regex(/^[A-Z]{2}\d{2}[A-Z0-9]{11,30}$/, 'Invalid IBAN format')),
  bic: z
    .string()
    .regex(/^[A-Z]{6}[A-Z0-9]{2}([A-Z0-9]{3})?$/, 'Invalid BIC format')
    .optional(),
});

export const paymentTermsSchema = z.object({
  description: optionalText,
  latePenaltyRate: nonNegativeDecimalSchema.optional(),
  earlyDiscount: optionalText,
  recoveryFee: nonNegativeDecimalSchema.default('40.00'),
});

export const paymentMeansSchema = z.object({
  code: z.enum(PAYMENT_MEANS_CODES),
  bankAccount: bankAccountSchema.optional(),
  paymentReference: optionalText,
});

export const invoiceSchema = z.object({
  number: z.string().trim().min(1, 'Invoice number is required'),
  issueDate: isoDateSchema,
  dueDate: isoDateSchema.optional(),
  typeCode: z.enum(INVOICE_TYPE_CODES).default('380'),
  currency: z
    .string()
    .regex(/^[A-Z]{3}$/, 'Currency must be an ISO 4217 code')
    .default('EUR'),
  seller: partySchema,
  buyer: partySchema,
  lines: z.array(invoiceLineSchema).min(1, 'An invoice needs at least one line'),
  operationCategory: z.enum(OPERATION_CATEGORIES),
  vatOnDebits: z.boolean().default(false),
  purchaseOrderReference: optionalText,
  contractReference: optionalText,
  precedingInvoiceReference: optionalText,
  buyerAccountingReference: optionalText,
  paymentTerms: paymentTermsSchema.optional(),
  paymentMeans: paymentMeansSchema.optional(),
  prepaidAmount: decimalSchema.optional(),
  billingPeriod: billingPeriodSchema.optional(),
  payee: partySchema.optional(),
  payer: partySchema.optional(),
  note: optionalText,
});

export type AddressInput = z.input<typeof addressSchema>;
export type PartyInput = z.input<typeof partySchema>;
export type InvoiceLineInput = z.input<typeof invoiceLineSchema>;
export type InvoiceInput = z.input<typeof invoiceSchema>;

export type ParsedAddress = z.output<typeof addressSchema>;
export type ParsedParty = z.output<typeof partySchema>;
export type ParsedLine = z.output<typeof subLineSchema>;
export type ParsedInvoiceLine = z.output<typeof invoiceLineSchema>;
export type ParsedInvoice = z.output<typeof invoiceSchema>;
