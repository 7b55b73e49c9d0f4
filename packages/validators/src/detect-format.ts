import {
  CII_PROFILES,
  CII_PROFILE_INFO,
  UBL_PROFILES,
  UBL_CUSTOMIZATION_IDS,
  type CiiProfile,
  type DetectedFormat,
  type UblProfile,
} from '@einvoice-fr/contracts';
import { findText, parseXmlDocument, XmlSyntaxError, type XmlElement } from '@einvoice-fr/shared';

export const CII_NAMESPACE = 'urn:un:unece:uncefact:data:standard:CrossIndustryInvoice:100';
export const UBL_INVOICE_NAMESPACE = 'urn:oasis:names:specification:ubl:schema:xsd:Invoice-2';
export const UBL_CREDIT_NOTE_NAMESPACE = 'urn:oasis:names:specification:ubl:schema:xsd:CreditNote-2';

const CREDIT_NOTE_TYPE_CODE = '381';

function ciiProfileFor(guidelineId: string): CiiProfile | undefined {
  return CII_PROFILES.find((profile) => CII_PROFILE_INFO[profile].guidelineId === guidelineId);
}

function ublProfileFor(customizationId: string): UblProfile | undefined {
  return UBL_PROFILES.find((profile) => UBL_CUSTOMIZATION_IDS[profile] === customizationId);
}

/**
 * Detects syntax, document type and profile from an already parsed root.
 */
export function detectFromRoot(root: XmlElement): DetectedFormat {
  const namespace = root.namespace;
  const base = namespace !== undefined ? { namespace } : {};

  if (root.name === 'CrossIndustryInvoice' && namespace === CII_NAMESPACE) {
    const guidelineId = findText(root, 'ExchangedDocumentContext/GuidelineSpecifiedDocumentContextParameter/ID');
    const profile = guidelineId !== undefined ? ciiProfileFor(guidelineId) : undefined;
    const typeCode = findText(root, 'ExchangedDocument/TypeCode');
    return {
      ...base,
      flavor: 'cii',
      documentType: typeCode === CREDIT_NOTE_TYPE_CODE ? 'credit-note' : 'invoice',
      ...(guidelineId !== undefined ? { customizationId: guidelineId } : {}),
      ...(profile !== undefined ? { profile } : {}),
    };
  }

  const isInvoice = root.name === 'Invoice' && namespace === UBL_INVOICE_NAMESPACE;
  const isCreditNote = root.name === 'CreditNote' && namespace === UBL_CREDIT_NOTE_NAMESPACE;
  if (isInvoice || isCreditNote) {
    const customizationId = findText(root, 'CustomizationID');
    const profile = customizationId !== undefined ? ublProfileFor(customizationId) : undefined;
    return {
      ...base,
      flavor: 'ubl',
      documentType: isCreditNote ? 'credit-note' : 'invoice',
      ...(customizationId !== undefined ? { customizationId } : {}),
      ...(profile !== undefined ? { profile } : {}),
    };
  }

  return { ...base, flavor: 'unknown', documentType: 'unknown' };
}

/**
 * Detects the invoice syntax and profile from the root namespace and the
 * guideline (CII) or CustomizationID (UBL). Documents that are not
 * well-formed are reported as unknown.
 */
export function detectInvoiceFormat(xml: string | Uint8Array): DetectedFormat {
  let root: XmlElement;
  try {
    root = parseXmlDocument(xml);
  } catch (error) {
    if (error instanceof XmlSyntaxError) {
      return { flavor: 'unknown', documentType: 'unknown' };
    }
    throw error;
  }
  return detectFromRoot(root);
}
