import { describe, it, expect } from 'vitest';
import type { TransactionData } from '@einvoice-fr/contracts';
import { createInvoice } from '@einvoice-fr/model';
import { SAMPLE_SELLER, sampleInvoiceInput } from '@einvoice-fr/model/testing';
import { createSequentialIdGenerator } from '@einvoice-fr/shared';
import { EReportingEmptyDeclarationError, EReportingValidationError } from './errors.js';
import { aggregateTransactions, createSubmission, prepareTransaction, transactionFromInvoice } from './transactions.js';

function transaction(overrides: Partial<TransactionData> = {}): TransactionData {
  return {
    transactionId: 'tx-1',
    sellerSiren: '123456789',
    transactionType: 'b2c_domestic',
    invoiceDate: '2026-09-15',
    operationCategory: 'delivery',
    totalExclTax: '100.00',
    vatAmount: '20.00',
    vatRate: '20.0',
    vatExemption: false,
    vatOnDebits: false,
    currency: 'EUR',
    ...overrides,
  };
}

describe('transactionFromInvoice', () => {
  it('should copy the totals of a single-rate invoice', () => {
    const invoice = createInvoice(sampleInvoiceInput());

    const result = transactionFromInvoice(invoice, 'b2c_domestic', undefined, {
      idGenerator: createSequentialIdGenerator('TX'),
    });

    expect(result).toEqual({
      transactionId: 'TX-000001',
      sellerSiren: '123456789',
      transactionType: 'b2c_domestic',
      invoiceDate: '2026-09-15',
      invoiceNumber: 'FA-2026-042',
      operationCategory: 'delivery',
      totalExclTax: '1200.00',
      vatAmount: '240.00',
      vatRate: '20.0',
      vatExemption: false,
      vatOnDebits: false,
      currency: 'EUR',
    });
  });

  it('should leave the rate out when the lines use several rates', () => {
    const invoice = createInvoice(
      sampleInvoiceInput({
        lines: [
          { description: 'Livre', quantity: '2', unitPrice: '10.00', vatRate: '5.5' },
          { description: 'Stylo', quantity: '1', unitPrice: '10.00', vatRate: '20.0' },
        ],
      }),
    );

    const result = transactionFromInvoice(invoice, 'b2c_domestic');

    expect(result.vatRate).toBeUndefined();
    expect(result.totalExclTax).toBe('30.00');
    expect(result.vatAmount).toBe('3.10');
  });

  it('should flag an invoice made only of exempt lines', () => {
    const invoice = createInvoice(
      sampleInvoiceInput({
        lines: [{ description: 'Formation', quantity: '1', unitPrice: '500.00', vatRate: '0', vatCategory: 'E' }],
      }),
    );

    const result = transactionFromInvoice(invoice, 'b2b_intra_eu', 'DE');

    expect(result.vatExemption).toBe(true);
    expect(result.countryCode).toBe('DE');
    expect(result.vatAmount).toBe('0.00');
  });

  it('should take the SIREN from the SIRET and copy the billing period', () => {
    const { siren: _siren, ...seller } = SAMPLE_SELLER;
    const invoice = createInvoice(
      sampleInvoiceInput({ seller, billingPeriod: { start: '2026-09-01', end: '2026-09-30' } }),
    );

    const result = transactionFromInvoice(invoice, 'b2c_domestic');

    expect(result.sellerSiren).toBe('123456789');
    expect(result.periodStart).toBe('2026-09-01');
    expect(result.periodEnd).toBe('2026-09-30');
  });
});

describe('createSubmission', () => {
  it('should stamp an id and the creation time', () => {
    const submission = createSubmission(
      { transmissionMode: 'individual', transactionData: transaction() },
      { idGenerator: createSequentialIdGenerator('SUB'), now: () => new Date('2026-09-15T10:00:00Z') },
    );

    expect(submission).toEqual({
      submissionId: 'SUB-000001',
      createdAt: '2026-09-15T10:00:00.000Z',
      transmissionMode: 'individual',
      transactionData: transaction(),
    });
  });
});

describe('prepareTransaction', () => {
  it('should wrap a valid transaction', () => {
    const submission = prepareTransaction(transaction());

    expect(submission.transmissionMode).toBe('individual');
    expect(submission.transactionData?.transactionId).toBe('tx-1');
  });

  it('should list every finding of an invalid transaction', () => {
    const attempt = () => prepareTransaction(transaction({ transactionType: 'b2b_extra_eu', sellerSiren: '1' }));

    expect(attempt).toThrow(EReportingValidationError);
    try {
      attempt();
    } catch (error) {
      expect(error).toBeInstanceOf(EReportingValidationError);
      if (error instanceof EReportingValidationError) {
        expect(error.message).toBe('Invalid e-reporting transaction');
        expect(error.errors).toEqual([
          'sellerSiren: SIREN must be exactly 9 digits',
          'Country code is required for b2b_extra_eu transactions',
        ]);
        expect(error.toJSON()).toMatchObject({ code: 'EREPORTING_VALIDATION_ERROR', errors: error.errors });
      }
    }
  });
});

describe('aggregateTransactions', () => {
  it('should merge transactions sharing a rate', () => {
    const result = aggregateTransactions(
      [transaction(), transaction({ transactionId: 'tx-2', totalExclTax: '200.00', vatAmount: '40.00' })],
      '2026-09-01',
      '2026-09-10',
    );

    expect(result).toEqual({
      sellerSiren: '123456789',
      periodStart: '2026-09-01',
      periodEnd: '2026-09-10',
      operationCategory: 'delivery',
      taxBreakdowns: [{ vatRate: '20.0', vatExemption: false, taxableAmount: '300.00', vatAmount: '60.00' }],
      vatOnDebits: false,
    });
  });

  it('should keep one breakdown per rate in order of appearance', () => {
    const result = aggregateTransactions(
      [
        transaction({ totalExclTax: '100.00', vatAmount: '20.00' }),
        transaction({ transactionId: 'tx-2', vatRate: '5.5', totalExclTax: '200.00', vatAmount: '11.00' }),
      ],
      '2026-09-01',
      '2026-09-10',
    );

    expect(result.taxBreakdowns.map((breakdown) => breakdown.vatRate)).toEqual(['20.0', '5.5']);
    expect(result.taxBreakdowns.map((breakdown) => breakdown.taxableAmount)).toEqual(['100.00', '200.00']);
    expect(result.taxBreakdowns.map((breakdown) => breakdown.vatAmount)).toEqual(['20.00', '11.00']);
  });

  it('should treat equal rates written differently as one', () => {
    const result = aggregateTransactions(
      [transaction(), transaction({ transactionId: 'tx-2', vatRate: '20' })],
      '2026-09-01',
      '2026-09-10',
    );

    expect(result.taxBreakdowns).toHaveLength(1);
  });

  it('should keep exempt sales apart', () => {
    const { vatRate: _rate, ...exempt } = transaction({ transactionId: 'tx-2', vatAmount: '0.00' });
    const result = aggregateTransactions(
      [transaction(), { ...exempt, vatExemption: true }],
      '2026-09-01',
      '2026-09-10',
    );

    expect(result.taxBreakdowns).toEqual([
      { vatRate: '20.0', vatExemption: false, taxableAmount: '100.00', vatAmount: '20.00' },
      { vatExemption: true, taxableAmount: '100.00', vatAmount: '0.00' },
    ]);
  });

  it('should mark mixed categories and debit-based VAT', () => {
    const result = aggregateTransactions(
      [transaction(), transaction({ transactionId: 'tx-2', operationCategory: 'service', vatOnDebits: true })],
      '2026-09-01',
      '2026-09-10',
    );

    expect(result.operationCategory).toBe('mixed');
    expect(result.vatOnDebits).toBe(true);
  });

  it('should refuse an empty list', () => {
    expect(() => aggregateTransactions([], '2026-09-01', '2026-09-10')).toThrow(EReportingEmptyDeclarationError);
  });

  it('should refuse transactions of several sellers', () => {
    expect(() =>
      aggregateTransactions(
        [transaction(), transaction({ transactionId: 'tx-2', sellerSiren: '987654321' })],
        '2026-09-01',
        '2026-09-10',
      ),
    ).toThrow('Aggregated transactions must share the same SIREN');
  });

  it('should refuse transactions in several currencies', () => {
    const attempt = () =>
      aggregateTransactions(
        [transaction(), transaction({ transactionId: 'tx-2', currency: 'USD' })],
        '2026-09-01',
        '2026-09-10',
      );

    expect(attempt).toThrow('Aggregated transactions must share the same currency');
    try {
      attempt();
    } catch (error) {
      expect(error).toBeInstanceOf(EReportingValidationError);
      if (error instanceof EReportingValidationError) {
        expect(error.errors).toEqual(['Found several currencies: EUR, USD']);
      }
    }
  });
});
