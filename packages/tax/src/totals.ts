import type { DecimalAmount, InvoiceData, InvoiceLine, InvoiceTotals, TaxSummary, VatCategory } from '@einvoice-fr/contracts';
import { add, compare, multiply, normalizeDecimal, percentage, round, subtract, sum } from '@einvoice-fr/shared';
import { minorUnitsFor } from './currency.js';

/**
 * The parts of an invoice the tax engine reads
 */
export type TaxableDocument = Pick<InvoiceData, 'lines' | 'currency' | 'prepaidAmount'>;

/**
 * Exact line net amount: quantity × unit price − discount + charge.
 * No rounding is applied.
 */
export function lineNetAmount(line: InvoiceLine): DecimalAmount {
  let net = multiply(line.quantity, line.unitPrice);
  if (line.discountAmount !== undefined) {
    net = subtract(net, line.discountAmount);
  }
  if (line.chargeAmount !== undefined) {
    net = add(net, line.chargeAmount);
  }
  return net;
}

/**
 * "20", "20.0" and "20.00" belong to the same group.
 */
function rateKey(rate: DecimalAmount): string {
  const normalized = normalizeDecimal(rate);
  return normalized.includes('.') ? normalized.replace(/\.?0+$/, '') : normalized;
}

interface TaxGroup {
  category: VatCategory;
  rate: DecimalAmount;
  netAmounts: DecimalAmount[];
  exemptionReason?: string;
  exemptionReasonCode?: string;
}

function groupLines(lines: readonly InvoiceLine[]): TaxGroup[] {
  const groups = new Map<string, TaxGroup>();

  for (const line of lines) {
    const key = `${line.vatCategory}|${rateKey(line.vatRate)}`;
    let group = groups.get(key);
    if (group === undefined) {
      group = { category: line.vatCategory, rate: line.vatRate, netAmounts: [] };
      groups.set(key, group);
    }

    group.netAmounts.push(lineNetAmount(line));
    if (group.exemptionReason === undefined && line.vatExemptionReason) {
      group.exemptionReason = line.vatExemptionReason;
    }
    if (group.exemptionReasonCode === undefined && line.vatExemptionReasonCode) {
      group.exemptionReasonCode = line.vatExemptionReasonCode;
    }
  }

  return [...groups.values()];
}

function summarize(group: TaxGroup, places: number): TaxSummary {
  // Rounded once per group, from the exact sum of the line amounts
  const taxableAmount = round(sum(group.netAmounts), places);
  // BT-117 = BT-116 × rate
  const taxAmount =
    group.category === 'AE' ? round('0', places) : percentage(taxableAmount, group.rate, { decimalPlaces: places });

  return {
    vatCategory: group.category,
    vatRate: group.rate,
    taxableAmount,
    taxAmount,
    ...(group.exemptionReason !== undefined ? { vatExemptionReason: group.exemptionReason } : {}),
    ...(group.exemptionReasonCode !== undefined ? { vatExemptionReasonCode: group.exemptionReasonCode } : {}),
  };
}

function bySummaryOrder(a: TaxSummary, b: TaxSummary): number {
  if (a.vatCategory !== b.vatCategory) {
    return a.vatCategory < b.vatCategory ? -1 : 1;
  }
  return compare(a.vatRate, b.vatRate);
}

/**
 * Derives the VAT breakdown and document totals from the lines.
 *
 * Lines are grouped by (VAT category, rate). Each group's taxable base is
 * the exact sum of its line amounts rounded half-up once to the currency's
 * minor unit; its tax is rate × that rounded base, rounded the same way. Reverse
 * charge groups carry no tax. Sub-lines are informative and ignored.
 *
 * Pure: the same document always yields the same totals.
 */
export function computeTotals(document: TaxableDocument): InvoiceTotals {
  const places = minorUnitsFor(document.currency);
  const taxSummaries = groupLines(document.lines)
    .map((group) => summarize(group, places))
    .sort(bySummaryOrder);

  const netTotal = round(sum(taxSummaries.map((s) => s.taxableAmount)), places);
  const taxTotal = round(sum(taxSummaries.map((s) => s.taxAmount)), places);
  const grossTotal = add(netTotal, taxTotal);
  const prepaidAmount = round(document.prepaidAmount ?? '0', places);

  return {
    netTotal,
    taxTotal,
    grossTotal,
    prepaidAmount,
    amountDue: subtract(grossTotal, prepaidAmount),
    taxSummaries,
  };
}
