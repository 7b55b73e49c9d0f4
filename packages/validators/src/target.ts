import {
  CII_PROFILES,
  UBL_PROFILES,
  VALIDATION_FLAVORS,
  isCodeOf,
  type DetectedFormat,
  type InvoiceProfile,
  type ValidateOptions,
  type ValidationFlavor,
  type ValidationProfile,
} from '@einvoice-fr/contracts';
import { ConfigurationError, parseXmlDocument, XmlSyntaxError, type XmlElement } from '@einvoice-fr/shared';
import { detectFromRoot } from './detect-format.js';
import type { Syntax } from './structure/content-model.js';

const AUTODETECT = 'autodetect';

export interface ValidationTarget {
  readonly syntax: Syntax;
  readonly profile: InvoiceProfile;
  readonly detected: DetectedFormat;
}

export type PreparedDocument =
  | { readonly ok: true; readonly root: XmlElement; readonly target: ValidationTarget }
  | { readonly ok: false; readonly errors: string[] };

interface CheckedOptions {
  flavor: ValidationFlavor;
  profile: ValidationProfile;
}

function syntaxOf(flavor: Exclude<ValidationFlavor, 'autodetect'>): Syntax {
  return flavor === 'ubl' ? 'ubl' : 'cii';
}

function profilesOf(syntax: Syntax): readonly InvoiceProfile[] {
  return syntax === 'ubl' ? UBL_PROFILES : CII_PROFILES;
}

/**
 * @throws ConfigurationError on an unknown flavor or profile, or a profile
 * that does not exist for the requested flavor
 */
export function checkOptions(options: ValidateOptions = {}): CheckedOptions {
  const flavor: string = options.flavor ?? AUTODETECT;
  const profile: string = options.profile ?? AUTODETECT;

  if (!isCodeOf(VALIDATION_FLAVORS, flavor)) {
    throw new ConfigurationError(`Unknown validation flavor: ${flavor}. Available flavors: ${VALIDATION_FLAVORS.join(', ')}`, {
      flavor,
    });
  }
  const known = [...CII_PROFILES, ...UBL_PROFILES, AUTODETECT] as const;
  if (!isCodeOf(known, profile)) {
    throw new ConfigurationError(`Unknown validation profile: ${profile}`, { profile });
  }
  if (flavor !== AUTODETECT && profile !== AUTODETECT) {
    const allowed = profilesOf(syntaxOf(flavor));
    if (!allowed.includes(profile)) {
      throw new ConfigurationError(`Profile ${profile} does not exist for ${flavor}. Available profiles: ${allowed.join(', ')}`, {
        flavor,
        profile,
      });
    }
  }
  return { flavor, profile };
}

function describeSyntaxError(error: XmlSyntaxError): string {
  return error.line !== undefined
    ? `XML syntax error: ${error.message} (line ${error.line}, column ${error.column ?? 0})`
    : `XML syntax error: ${error.message}`;
}

/**
 * Parses the document and settles which content model and rule set apply.
 * Problems with the document itself come back as error strings.
 */
export function prepareDocument(xml: string | Uint8Array, options: ValidateOptions = {}): PreparedDocument {
  const checked = checkOptions(options);

  let root: XmlElement;
  try {
    root = parseXmlDocument(xml);
  } catch (error) {
    if (error instanceof XmlSyntaxError) {
      return { ok: false, errors: [describeSyntaxError(error)] };
    }
    throw error;
  }

  const detected = detectFromRoot(root);
  let syntax: Syntax;
  if (checked.flavor !== AUTODETECT) {
    syntax = syntaxOf(checked.flavor);
  } else if (detected.flavor !== 'unknown') {
    syntax = detected.flavor;
  } else {
    return {
      ok: false,
      errors: [`Unrecognized invoice document: root element '${root.name}' in namespace '${root.namespace ?? ''}'`],
    };
  }

  if (checked.profile !== AUTODETECT) {
    // The CII guideline names the profile, so a mismatch is a document error
    if (syntax === 'cii' && detected.flavor === 'cii' && detected.profile !== undefined && detected.profile !== checked.profile) {
      return {
        ok: false,
        errors: [`Guideline identifier '${detected.customizationId ?? ''}' does not match profile '${checked.profile}'`],
      };
    }
    return { ok: true, root, target: { syntax, profile: checked.profile, detected } };
  }

  if (detected.flavor === syntax && detected.profile !== undefined) {
    return { ok: true, root, target: { syntax, profile: detected.profile, detected } };
  }
  if (syntax === 'ubl') {
    return { ok: true, root, target: { syntax, profile: 'EN16931', detected } };
  }
  return {
    ok: false,
    errors: [`Unrecognized guideline identifier '${detected.customizationId ?? ''}': cannot select a CII profile`],
  };
}
