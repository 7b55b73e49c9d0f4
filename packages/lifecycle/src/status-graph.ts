import type { InvoiceStatus, StatusInfo } from '@einvoice-fr/contracts';

/**
 * Allowed transitions (AFNOR XP Z12-012). Statuses with no outgoing edge
 * are terminal.
 */
export const TRANSITIONS: Readonly<Record<InvoiceStatus, readonly InvoiceStatus[]>> = {
  // Emission
  '200': ['201', '209'],
  '201': ['202', '212'],
  // Reception
  '202': ['203', '212'],
  '203': ['204', '212'],
  // Buyer processing
  '204': ['205', '206', '210', '207', '208'],
  '205': ['211', '213'],
  '206': ['211', '210', '207'],
  '207': ['205', '210', '208'],
  '208': ['214'],
  '214': ['204'],
  // Payment
  '211': ['213'],
  // Terminal
  '209': [],
  '210': [],
  '212': [],
  '213': [],
};

/**
 * Mandatory statuses go to the tax administration. WK is the accredited
 * platform, BY the buyer, SE the seller.
 */
export const STATUS_METADATA: Readonly<Record<InvoiceStatus, StatusInfo>> = {
  '200': { category: 'mandatory', defaultProducer: 'WK', reasonRequired: false },
  '201': { category: 'recommended', defaultProducer: 'WK', reasonRequired: false },
  '202': { category: 'recommended', defaultProducer: 'WK', reasonRequired: false },
  '203': { category: 'recommended', defaultProducer: 'WK', reasonRequired: false },
  '204': { category: 'recommended', defaultProducer: 'BY', reasonRequired: false },
  '205': { category: 'recommended', defaultProducer: 'BY', reasonRequired: false },
  '206': { category: 'recommended', defaultProducer: 'BY', reasonRequired: false },
  '207': { category: 'recommended', defaultProducer: 'BY', reasonRequired: false },
  '208': { category: 'recommended', defaultProducer: 'BY', reasonRequired: false },
  '209': { category: 'mandatory', defaultProducer: 'WK', reasonRequired: false },
  '210': { category: 'mandatory', defaultProducer: 'BY', reasonRequired: true },
  '211': { category: 'recommended', defaultProducer: 'BY', reasonRequired: false },
  '212': { category: 'mandatory', defaultProducer: 'WK', reasonRequired: false },
  '213': { category: 'mandatory', defaultProducer: 'SE', reasonRequired: false },
  '214': { category: 'recommended', defaultProducer: 'SE', reasonRequired: false },
};

export function allowedTransitions(status: InvoiceStatus): readonly InvoiceStatus[] {
  return TRANSITIONS[status];
}

export function isTerminalStatus(status: InvoiceStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

export function isMandatoryStatus(status: InvoiceStatus): boolean {
  return STATUS_METADATA[status].category === 'mandatory';
}
