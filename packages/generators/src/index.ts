/**
 * @einvoice-fr/generators
 *
 * Invoice encoders: CII (UN/CEFACT), UBL 2.1 and the Factur-X hybrid
 * orchestrator.
 *
 * @packageDocumentation
 */

export { BaseGenerator, type GeneratorOptions } from './base-generator.js';
export { CiiGenerator } from './cii/cii-generator.js';
export { CII_NAMESPACES, CII_ROOT } from './cii/namespaces.js';
export { UblGenerator, VAT_ON_DEBITS_NOTE } from './ubl/ubl-generator.js';
export { UBL_NAMESPACES } from './ubl/namespaces.js';
export { FacturXGenerator, type FacturXGeneratorOptions } from './facturx/facturx-generator.js';
export { createGenerator, type CreateGeneratorOptions } from './factory.js';
export { EncodingError } from './errors.js';
export { toFormat102, formatRate } from './format.js';
