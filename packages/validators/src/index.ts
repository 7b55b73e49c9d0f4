/**
 * @einvoice-fr/validators
 *
 * Format detection and two-stage validation of invoice XML: structure
 * against bundled content models, then EN16931 and French business rules.
 *
 * @packageDocumentation
 */

export { validateXml, type ValidateXmlOptions } from './validate-xml.js';
export { validateStructure, checkStructure } from './structure/validate-structure.js';
export { validateBusinessRules, evaluateRules, formatViolation } from './rules/validate-business-rules.js';
export {
  detectInvoiceFormat,
  detectFromRoot,
  CII_NAMESPACE,
  UBL_INVOICE_NAMESPACE,
  UBL_CREDIT_NOTE_NAMESPACE,
} from './detect-format.js';
export { prepareDocument, checkOptions, type ValidationTarget, type PreparedDocument } from './target.js';
export { loadContentModel, type ContentModel, type ParticleRule, type RootRule, type Syntax } from './structure/content-model.js';
export { loadRuleSet, type RuleDefinition, type Assertion, type ValueExpression, type SumOver } from './rules/definitions.js';
