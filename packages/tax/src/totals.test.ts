import { describe, it, expect } from 'vitest';
import type { InvoiceLine, VatCategory } from '@einvoice-fr/contracts';
import { add, equals, sum } from '@einvoice-fr/shared';
import { computeTotals, lineNetAmount } from './totals.js';
import { minorUnitsFor } from './currency.js';

function line(overrides: Partial<InvoiceLine> = {}): InvoiceLine {
  return {
    description: 'Item',
    quantity: '1',
    unit: 'C62',
    unitPrice: '100.00',
    vatRate: '20.0',
    vatCategory: 'S',
    ...overrides,
  };
}

describe('lineNetAmount', () => {
  it('should apply discount and charge exactly', () => {
    expect(lineNetAmount(line({ quantity: '2', unitPrice: '50.00', discountAmount: '5.00', chargeAmount: '1.50' }))).toBe(
      '96.50',
    );
  });

  it('should allow negative quantities', () => {
    expect(lineNetAmount(line({ quantity: '-1', unitPrice: '250.00' }))).toBe('-250.00');
  });
});

describe('computeTotals', () => {
  it('should compute two reduced and standard rate groups', () => {
    const totals = computeTotals({
      currency: 'EUR',
      lines: [
        line({ quantity: '100', unitPrice: '2.00', vatRate: '5.5' }),
        line({ quantity: '50', unitPrice: '3.00', vatRate: '20.0' }),
      ],
    });

    expect(totals.taxSummaries.map((s) => [s.vatRate, s.taxableAmount, s.taxAmount])).toEqual([
      ['5.5', '200.00', '11.00'],
      ['20.0', '150.00', '30.00'],
    ]);
    expect(totals.netTotal).toBe('350.00');
    expect(totals.taxTotal).toBe('41.00');
    expect(totals.grossTotal).toBe('391.00');
    expect(totals.prepaidAmount).toBe('0.00');
    expect(totals.amountDue).toBe('391.00');
  });

  it('should charge no tax on reverse charge groups whatever the nominal rate', () => {
    const totals = computeTotals({
      currency: 'EUR',
      lines: [
        line({
          quantity: '10',
          vatCategory: 'AE',
          vatRate: '20.0',
          vatExemptionReason: 'Autoliquidation',
          vatExemptionReasonCode: 'VATEX-EU-AE',
        }),
      ],
    });

    expect(totals.taxSummaries).toEqual([
      {
        vatCategory: 'AE',
        vatRate: '20.0',
        taxableAmount: '1000.00',
        taxAmount: '0.00',
        vatExemptionReason: 'Autoliquidation',
        vatExemptionReasonCode: 'VATEX-EU-AE',
      },
    ]);
    expect(totals.taxTotal).toBe('0.00');
    expect(totals.grossTotal).toBe('1000.00');
  });

  it('should group equal rates written differently', () => {
    const totals = computeTotals({
      currency: 'EUR',
      lines: [line({ vatRate: '20' }), line({ vatRate: '20.00' })],
    });

    expect(totals.taxSummaries).toHaveLength(1);
    expect(totals.taxSummaries[0]?.vatRate).toBe('20');
    expect(totals.taxSummaries[0]?.taxableAmount).toBe('200.00');
  });

  it('should round each group once rather than per line', () => {
    const totals = computeTotals({
      currency: 'EUR',
      lines: [
        line({ unitPrice: '0.335', vatRate: '20' }),
        line({ unitPrice: '0.335', vatRate: '20' }),
        line({ unitPrice: '0.335', vatRate: '20' }),
      ],
    });

    expect(totals.netTotal).toBe('1.01');
    expect(totals.taxTotal).toBe('0.20');
    expect(totals.grossTotal).toBe('1.21');
  });

  it('should take the tax from the rounded base', () => {
    const totals = computeTotals({
      currency: 'EUR',
      lines: [line({ quantity: '3', unitPrice: '0.333', vatRate: '5.5' })],
    });

    expect(totals.taxSummaries[0]?.taxableAmount).toBe('1.00');
    expect(totals.taxSummaries[0]?.taxAmount).toBe('0.06');
  });

  it('should allow a negative amount due', () => {
    const totals = computeTotals({ currency: 'EUR', lines: [line()], prepaidAmount: '150' });

    expect(totals.grossTotal).toBe('120.00');
    expect(totals.prepaidAmount).toBe('150.00');
    expect(totals.amountDue).toBe('-30.00');
  });

  it('should order summaries by category then numeric rate', () => {
    const totals = computeTotals({
      currency: 'EUR',
      lines: [
        line({ vatRate: '20' }),
        line({ vatCategory: 'Z', vatRate: '0' }),
        line({ vatRate: '5.5' }),
        line({ vatCategory: 'AE', vatRate: '0', vatExemptionReasonCode: 'VATEX-EU-AE' }),
        line({ vatRate: '10' }),
      ],
    });

    expect(totals.taxSummaries.map((s) => `${s.vatCategory}/${s.vatRate}`)).toEqual([
      'AE/0',
      'S/5.5',
      'S/10',
      'S/20',
      'Z/0',
    ]);
  });

  it('should round to the currency minor unit', () => {
    const totals = computeTotals({
      currency: 'JPY',
      lines: [line({ quantity: '3', unitPrice: '333.5', vatRate: '10' })],
    });

    expect(totals.netTotal).toBe('1001');
    expect(totals.taxTotal).toBe('100');
    expect(totals.grossTotal).toBe('1101');
    expect(totals.amountDue).toBe('1101');
  });

  it('should ignore sub-lines', () => {
    const totals = computeTotals({
      currency: 'EUR',
      lines: [line({ subLines: [line({ unitPrice: '999.00' })] })],
    });

    expect(totals.netTotal).toBe('100.00');
  });

  it('should be deterministic and leave the input untouched', () => {
    const lines = Object.freeze([line({ quantity: '3', unitPrice: '12.34' }), line({ vatRate: '5.5' })]);
    const first = computeTotals({ currency: 'EUR', lines });
    const second = computeTotals({ currency: 'EUR', lines });

    expect(second).toEqual(first);
  });

  it('should keep totals consistent with the summaries for any partition', () => {
    const categories: VatCategory[] = ['S', 'S', 'S', 'Z', 'E', 'AE', 'K'];
    const rates = ['20', '10', '5.5', '2.1', '0'];
    let seed = 7;
    const next = (modulo: number): number => {
      seed = (seed * 48271) % 2147483647;
      return seed % modulo;
    };

    for (let run = 0; run < 25; run++) {
      const lines: InvoiceLine[] = [];
      const count = 1 + next(8);
      for (let i = 0; i < count; i++) {
        const category = categories[next(categories.length)] ?? 'S';
        lines.push(
          line({
            vatCategory: category,
            vatRate: category === 'S' ? (rates[next(4)] ?? '20') : '0',
            quantity: String(1 + next(40)),
            unitPrice: `${next(500)}.${String(next(1000)).padStart(3, '0')}`,
          }),
        );
      }

      const totals = computeTotals({ currency: 'EUR', lines, prepaidAmount: '10.00' });

      expect(equals(sum(totals.taxSummaries.map((s) => s.taxableAmount)), totals.netTotal)).toBe(true);
      expect(equals(sum(totals.taxSummaries.map((s) => s.taxAmount)), totals.taxTotal)).toBe(true);
      expect(equals(add(totals.netTotal, totals.taxTotal), totals.grossTotal)).toBe(true);
      expect(equals(add(totals.amountDue, totals.prepaidAmount), totals.grossTotal)).toBe(true);
      for (const summary of totals.taxSummaries) {
        if (summary.vatCategory === 'AE') {
          expect(summary.taxAmount).toBe('0.00');
        }
      }
    }
  });
});

describe('minorUnitsFor', () => {
  it('should default to two decimals', () => {
    expect(minorUnitsFor('EUR')).toBe(2);
    expect(minorUnitsFor('jpy')).toBe(0);
    expect(minorUnitsFor('KWD')).toBe(3);
  });
});
