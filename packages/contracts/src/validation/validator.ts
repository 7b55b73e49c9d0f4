import type { CiiProfile, UblProfile } from '../codec/generator.js';

export const VALIDATION_FLAVORS = ['factur-x', 'cii', 'ubl', 'autodetect'] as const;
export type ValidationFlavor = (typeof VALIDATION_FLAVORS)[number];

export type ValidationProfile = CiiProfile | UblProfile | 'autodetect';

export interface ValidateOptions {
  /** @default "autodetect" */
  readonly flavor?: ValidationFlavor;

  /** @default "autodetect" */
  readonly profile?: ValidationProfile;
}

/**
 * Syntax family of an invoice document
 */
export type DetectedFlavor = 'cii' | 'ubl' | 'unknown';

/**
 * Root document kind
 */
export type DocumentType = 'invoice' | 'credit-note' | 'unknown';

/**
 * Result of format and profile detection
 */
export interface DetectedFormat {
  readonly flavor: DetectedFlavor;
  readonly documentType: DocumentType;

  /** Profile inferred from the guideline or customization identifier */
  readonly profile?: CiiProfile | UblProfile;

  /** Raw guideline (CII) or CustomizationID (UBL) */
  readonly customizationId?: string;

  /** Namespace of the root element */
  readonly namespace?: string;
}
