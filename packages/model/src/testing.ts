/**
 * Sample inputs shared by the test suites of the workspace.
 */
import type { InvoiceInput, PartyInput } from './schemas.js';

export const SAMPLE_SELLER: PartyInput = {
  name: 'Papeterie Exemple SAS',
  siren: '123456789',
  siret: '12345678900012',
  vatNumber: 'FR32123456789',
  address: {
    street: '1 rue de la Paix',
    city: 'Paris',
    postalCode: '75002',
  },
  email: 'factures@example.test',
};

export const SAMPLE_BUYER: PartyInput = {
  name: 'Client Exemple SARL',
  siren: '987654321',
  vatNumber: 'FR61987654321',
  address: {
    street: '10 avenue des Tests',
    city: 'Lyon',
    postalCode: '69001',
  },
};

/**
 * A two-line standard-rate invoice: 10 × 85.00 and 10 × 35.00 at 20 %,
 * net 1200.00, tax 240.00, gross 1440.00.
 */
export function sampleInvoiceInput(overrides: Partial<InvoiceInput> = {}): InvoiceInput {
  return {
    number: 'FA-2026-042',
    issueDate: '2026-09-15',
    dueDate: '2026-10-15',
    seller: SAMPLE_SELLER,
    buyer: SAMPLE_BUYER,
    operationCategory: 'delivery',
    lines: [
      { description: 'Ramette papier A4', quantity: '10', unitPrice: '85.00', vatRate: '20.0' },
      { description: "Cartouche d'encre", quantity: '10', unitPrice: '35.00', vatRate: '20.0' },
    ],
    paymentTerms: {
      description: '30 jours date de facture',
      latePenaltyRate: '10.0',
      earlyDiscount: 'Néant',
    },
    paymentMeans: {
      code: '30',
      bankAccount: { iban: 'FR7600000000000000000000000', bic: 'TESTFRPPXXX' },
    },
    ...overrides,
  };
}
