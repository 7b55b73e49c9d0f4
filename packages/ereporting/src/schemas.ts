import { z } from 'zod';
import { EREPORTING_TRANSACTION_TYPES, OPERATION_CATEGORIES } from '@einvoice-fr/contracts';
import {
  ISO_DATE_PATTERN,
  SIREN_PATTERN,
  isCalendarDate,
  isNegative,
  isPositive,
  isValidDecimalAmount,
} from '@einvoice-fr/shared';

const siren = z.string().regex(SIREN_PATTERN, 'SIREN must be exactly 9 digits');

const isoDate = z
  .string()
  .regex(ISO_DATE_PATTERN, 'Expected a YYYY-MM-DD date')
  .refine(isCalendarDate, 'Not a calendar date');

const decimal = z.string().refine(isValidDecimalAmount, 'Invalid decimal amount');

const nonNegativeDecimal = decimal.refine((value) => !isValidDecimalAmount(value) || !isNegative(value), {
  message: 'Must be greater than or equal to 0',
});

const currency = z.string().regex(/^[A-Z]{3}$/, 'Currency must be an ISO 4217 code');

export const taxBreakdownSchema = z.object({
  vatRate: nonNegativeDecimal.optional(),
  vatExemption: z.boolean(),
  taxableAmount: decimal,
  vatAmount: decimal,
});

export const transactionDataSchema = z.object({
  transactionId: z.string().min(1),
  sellerSiren: siren,
  transactionType: z.enum(EREPORTING_TRANSACTION_TYPES),
  periodStart: isoDate.optional(),
  periodEnd: isoDate.optional(),
  invoiceDate: isoDate.optional(),
  invoiceNumber: z.string().min(1).optional(),
  operationCategory: z.enum(OPERATION_CATEGORIES),
  totalExclTax: decimal,
  vatAmount: decimal,
  vatRate: nonNegativeDecimal.optional(),
  vatExemption: z.boolean(),
  taxDueInFrance: decimal.optional(),
  vatOnDebits: z.boolean(),
  countryCode: z
    .string()
    .regex(/^[A-Z]{2}$/, 'Country code must be two uppercase letters')
    .optional(),
  currency,
});

export const paymentDataSchema = z.object({
  paymentId: z.string().min(1),
  sellerSiren: siren,
  cashingDate: isoDate,
  cashedAmount: decimal.refine((value) => !isValidDecimalAmount(value) || isPositive(value), {
    message: 'Cashed amount must be greater than 0',
  }),
  currency,
  invoiceReference: z.string().min(1, 'Invoice reference is required'),
});

export const aggregatedTransactionDataSchema = z.object({
  sellerSiren: siren,
  periodStart: isoDate,
  periodEnd: isoDate,
  operationCategory: z.enum(OPERATION_CATEGORIES),
  taxBreakdowns: z.array(taxBreakdownSchema).min(1, 'At least one tax breakdown is required'),
  vatOnDebits: z.boolean(),
});

/**
 * Shape findings as `field: message` strings
 */
export function shapeErrors(schema: z.ZodTypeAny, value: unknown): string[] {
  const result = schema.safeParse(value);
  if (result.success) {
    return [];
  }
  return result.error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
  );
}
