import type { ValidateOptions } from '@einvoice-fr/contracts';
import { createSafeLogger, type Logger } from '@einvoice-fr/shared';
import { evaluateRules } from './rules/validate-business-rules.js';
import { checkStructure } from './structure/validate-structure.js';
import { prepareDocument } from './target.js';

export interface ValidateXmlOptions extends ValidateOptions {
  readonly logger?: Logger;
}

const defaultLogger = createSafeLogger({ prefix: 'validators' });

/**
 * Structural stage, then the business-rule stage only when the structure is
 * clean. Returns the errors of the last stage that ran.
 *
 * @throws ConfigurationError on an unknown flavor or profile
 */
export function validateXml(xml: string | Uint8Array, options: ValidateXmlOptions = {}): string[] {
  const logger = options.logger ?? defaultLogger;

  const prepared = prepareDocument(xml, options);
  if (!prepared.ok) {
    return prepared.errors;
  }
  const { root, target } = prepared;

  const structural = checkStructure(root, target);
  if (structural.length > 0) {
    logger.debug('Structural validation failed, business rules skipped', {
      syntax: target.syntax,
      profile: target.profile,
      errors: structural.length,
    });
    return structural;
  }

  const errors = evaluateRules(root, target);
  logger.debug('Business-rule validation finished', {
    syntax: target.syntax,
    profile: target.profile,
    errors: errors.length,
  });
  return errors;
}
