import type { InvoiceData } from '../core/invoice.js';

/**
 * CII (Factur-X / ZUGFeRD) profiles, ordered from least to most detailed.
 */
export const CII_PROFILES = ['MINIMUM', 'BASICWL', 'BASIC', 'EN16931', 'EXTENDED'] as const;
export type CiiProfile = (typeof CII_PROFILES)[number];

export const UBL_PROFILES = ['EN16931', 'PEPPOL'] as const;
export type UblProfile = (typeof UBL_PROFILES)[number];

export type InvoiceProfile = CiiProfile | UblProfile;

/**
 * Output format of a generator
 */
export type InvoiceFormat = 'factur-x' | 'cii' | 'ubl';

/**
 * Static description of a CII profile
 */
export interface CiiProfileInfo {
  readonly profile: CiiProfile;

  /** Position in the detail ordering (0 = MINIMUM) */
  readonly rank: number;

  /** Guideline identifier written to GuidelineSpecifiedDocumentContextParameter */
  readonly guidelineId: string;

  /** Factur-X conformance level written to the hybrid PDF metadata */
  readonly facturxLevel: FacturXLevel;

  /** Whether invoice lines are emitted */
  readonly includesLines: boolean;

  /**
   * Whether documents at this profile are accepted for the French mandate.
   * MINIMUM and BASICWL are structurally valid but materially incomplete.
   */
  readonly regulatoryGrade: boolean;
}

export type FacturXLevel = 'minimum' | 'basicwl' | 'basic' | 'en16931' | 'extended';

export const CII_PROFILE_INFO: Readonly<Record<CiiProfile, CiiProfileInfo>> = {
  MINIMUM: {
    profile: 'MINIMUM',
    rank: 0,
    guidelineId: 'urn:factur-x.eu:1p0:minimum',
    facturxLevel: 'minimum',
    includesLines: false,
    regulatoryGrade: false,
  },
  BASICWL: {
    profile: 'BASICWL',
    rank: 1,
    guidelineId: 'urn:factur-x.eu:1p0:basicwl',
    facturxLevel: 'basicwl',
    includesLines: false,
    regulatoryGrade: false,
  },
  BASIC: {
    profile: 'BASIC',
    rank: 2,
    guidelineId: 'urn:cen.eu:en16931:2017#compliant#urn:factur-x.eu:1p0:basic',
    facturxLevel: 'basic',
    includesLines: true,
    regulatoryGrade: false,
  },
  EN16931: {
    profile: 'EN16931',
    rank: 3,
    guidelineId: 'urn:cen.eu:en16931:2017',
    facturxLevel: 'en16931',
    includesLines: true,
    regulatoryGrade: true,
  },
  EXTENDED: {
    profile: 'EXTENDED',
    rank: 4,
    guidelineId: 'urn:cen.eu:en16931:2017#conformant#urn:factur-x.eu:1p0:extended',
    facturxLevel: 'extended',
    includesLines: true,
    regulatoryGrade: true,
  },
};

export const UBL_CUSTOMIZATION_IDS: Readonly<Record<UblProfile, string>> = {
  EN16931: 'urn:cen.eu:en16931:2017',
  PEPPOL: 'urn:cen.eu:en16931:2017#compliant#urn:fdc:peppol.eu:2017:poacc:billing:3.0',
};

export const PEPPOL_PROFILE_ID = 'urn:fdc:peppol.eu:2017:poacc:billing:3.0';

/**
 * Result of a generation
 */
export interface GenerationResult {
  /** UTF-8 XML, declaration included */
  readonly xmlBytes: Uint8Array;

  /** Hybrid PDF/A-3 bytes, only for the Factur-X format */
  readonly pdfBytes?: Uint8Array;

  readonly profile: InvoiceProfile;
}

export interface GenerateOptions {
  /** Source PDF to embed the XML into (Factur-X only) */
  readonly pdfBytes?: Uint8Array;
}

/**
 * Encoder contract shared by every output format.
 * The profile is fixed when the generator is constructed.
 */
export interface InvoiceGenerator {
  readonly format: InvoiceFormat;
  readonly profile: InvoiceProfile;

  /**
   * Serializes the invoice. Throws before returning any bytes when a field
   * required by the profile or the document type is missing.
   */
  generateXml(invoice: InvoiceData): Uint8Array;

  generate(invoice: InvoiceData, options?: GenerateOptions): Promise<GenerationResult>;
}

export interface EmbedOptions {
  readonly flavor: 'factur-x';
  readonly level: FacturXLevel;
}

/**
 * External collaborator that converts a PDF to PDF/A-3 and attaches the XML.
 * Implementations live outside this repository.
 */
export interface HybridDocumentEmbedder {
  embed(pdfBytes: Uint8Array, xmlBytes: Uint8Array, options: EmbedOptions): Uint8Array | Promise<Uint8Array>;
}
