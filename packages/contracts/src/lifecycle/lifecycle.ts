import type { DecimalAmount, ISODate, ISODateTime } from '../core/primitives.js';

/**
 * Invoice lifecycle status codes (AFNOR XP Z12-012).
 * The numbering is non-contiguous by regulation.
 */
export const INVOICE_STATUSES = [
  '200', // Déposée
  '201', // Émise
  '202', // Reçue
  '203', // Mise à disposition
  '204', // Prise en charge
  '205', // Approuvée
  '206', // Partiellement approuvée
  '207', // En litige
  '208', // Suspendue
  '209', // Rejetée à l'émission
  '210', // Refusée
  '211', // Paiement transmis
  '212', // Rejetée à la réception
  '213', // Encaissée
  '214', // Complétée
] as const;
export type InvoiceStatus = (typeof INVOICE_STATUSES)[number];

export const INVOICE_STATUS_LABELS: Readonly<Record<InvoiceStatus, string>> = {
  '200': 'deposited',
  '201': 'emitted',
  '202': 'received',
  '203': 'made available',
  '204': 'taken in charge',
  '205': 'approved',
  '206': 'partially approved',
  '207': 'disputed',
  '208': 'suspended',
  '209': 'rejected at emission',
  '210': 'refused',
  '211': 'payment transmitted',
  '212': 'rejected at reception',
  '213': 'collected',
  '214': 'completed',
};

/**
 * Mandatory statuses are reported to the tax administration;
 * recommended ones are exchanged between the parties only.
 */
export type StatusCategory = 'mandatory' | 'recommended';

/**
 * Party roles in lifecycle messages
 */
export const CDAR_ROLE_CODES = [
  'BY', // buyer
  'SE', // seller
  'DL', // factor
  'WK', // accredited platform
  'DFH', // public invoicing portal
] as const;
export type CdarRoleCode = (typeof CDAR_ROLE_CODES)[number];

export interface StatusInfo {
  readonly category: StatusCategory;
  readonly defaultProducer: CdarRoleCode;
  readonly reasonRequired: boolean;
}

/**
 * One status change in an invoice's history
 */
export interface LifecycleEvent {
  readonly timestamp: ISODateTime;
  readonly status: InvoiceStatus;

  /** Free-text reason (mandatory for refusal) */
  readonly reason?: string;

  /** Reason code from the XP Z12-012 list */
  readonly reasonCode?: string;

  /** Role of the party that produced the status */
  readonly producer?: CdarRoleCode;

  /** Amount for a partial collection (retention guarantee) */
  readonly amount?: DecimalAmount;

  /** Identifier of the associated lifecycle message */
  readonly cdarMessageId?: string;
}

/**
 * Party of a lifecycle message
 */
export interface CdarParty {
  /** SIREN, SIRET, GLN or routing code */
  readonly identifier: string;

  /** "0002" SIREN, "0009" SIRET, "0224" routing code, "0088" GLN */
  readonly schemeId: string;

  readonly roleCode: CdarRoleCode;
}

/**
 * Cross-Domain Acknowledgement And Response message
 */
export interface CdarMessage {
  readonly messageId: string;
  readonly issueDate: ISODate;
  readonly statusCode: InvoiceStatus;

  /** Number of the referenced invoice */
  readonly invoiceReference: string;

  readonly sender: CdarParty;

  /** May be several (issuing platform and public portal) */
  readonly recipients: readonly CdarParty[];

  readonly reason?: string;
  readonly reasonCode?: string;
  readonly amount?: DecimalAmount;
}
