import type { ValidateOptions } from '@einvoice-fr/contracts';
import type { XmlElement } from '@einvoice-fr/shared';
import { prepareDocument, type ValidationTarget } from '../target.js';
import { loadRuleSet, type RuleDefinition } from './definitions.js';
import { holds, locateAll, locateRoot } from './evaluator.js';

export function formatViolation(rule: RuleDefinition, location: string): string {
  return `[${rule.id}] ${rule.message} (location: ${location})`;
}

/**
 * Runs every rule of the target's rule set that applies to its profile.
 */
export function evaluateRules(root: XmlElement, target: ValidationTarget): string[] {
  const errors: string[] = [];
  const start = locateRoot(root);

  for (const rule of loadRuleSet(target.syntax)) {
    if (rule.profiles !== undefined && !rule.profiles.includes(target.profile)) continue;

    for (const { element, location } of locateAll(start, rule.context ?? '')) {
      if (!holds(rule.assert, element)) {
        errors.push(formatViolation(rule, location));
      }
    }
  }
  return errors;
}

/**
 * Evaluates the EN16931 (BR-*, BR-CO-*) and French (BR-FR-*) rules against
 * the document.
 *
 * @returns `[RULE-ID] message (location: /path)` entries in rule order
 * @throws ConfigurationError on an unknown flavor or profile
 */
export function validateBusinessRules(xml: string | Uint8Array, options: ValidateOptions = {}): string[] {
  const prepared = prepareDocument(xml, options);
  if (!prepared.ok) {
    return prepared.errors;
  }
  return evaluateRules(prepared.root, prepared.target);
}
