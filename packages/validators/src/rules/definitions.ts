import { z } from 'zod';
import { CII_PROFILES, UBL_PROFILES, type InvoiceProfile } from '@einvoice-fr/contracts';
import { ConfigurationError } from '@einvoice-fr/shared';
import { readJsonAsset } from '../assets.js';
import type { Syntax } from '../structure/content-model.js';

/**
 * Sum over a repeated item, skipping items that carry the `unless` element
 */
export interface SumOver {
  readonly each: string;
  readonly of: string;
  readonly unless?: string | undefined;
}

/**
 * Decimal-valued expression. Paths are slash-separated local names relative
 * to the rule context; a step may list alternatives (`InvoiceLine|CreditNoteLine`)
 * and an empty path is the context itself.
 */
export type ValueExpression =
  | { readonly path: string; readonly default?: string | undefined }
  | { readonly sum: string | SumOver }
  | { readonly add: readonly ValueExpression[] }
  | { readonly subtract: readonly [ValueExpression, ValueExpression] }
  | { readonly percentage: readonly [ValueExpression, ValueExpression] }
  | { readonly value: string };

export type Assertion =
  | { readonly type: 'exists'; readonly path: string }
  | { readonly type: 'textEquals'; readonly path: string; readonly value: string }
  | { readonly type: 'oneOf'; readonly path: string; readonly values: readonly string[] }
  | { readonly type: 'pattern'; readonly path: string; readonly pattern: string }
  | { readonly type: 'equals'; readonly left: ValueExpression; readonly right: ValueExpression }
  | { readonly type: 'greaterThan'; readonly left: ValueExpression; readonly right: ValueExpression }
  | { readonly type: 'some'; readonly path: string; readonly where: Assertion }
  | { readonly type: 'any'; readonly of: readonly Assertion[] }
  | { readonly type: 'all'; readonly of: readonly Assertion[] }
  | { readonly type: 'not'; readonly assertion: Assertion }
  | { readonly type: 'when'; readonly if: Assertion; readonly then: Assertion };

export interface RuleDefinition {
  readonly id: string;
  readonly message: string;
  /** Where the rule is evaluated, once per matching element; the root when absent */
  readonly context?: string | undefined;
  readonly profiles?: readonly InvoiceProfile[] | undefined;
  readonly assert: Assertion;
}

const regexSource = z.string().refine((source) => {
  try {
    new RegExp(source);
    return true;
  } catch {
    return false;
  }
}, 'Invalid regular expression');

const sumOverSchema = z.object({ each: z.string(), of: z.string(), unless: z.string().optional() }).strict();

export const valueExpressionSchema: z.ZodType<ValueExpression> = z.lazy(() =>
  z.union([
    z.object({ path: z.string(), default: z.string().optional() }).strict(),
    z.object({ sum: z.union([z.string(), sumOverSchema]) }).strict(),
    z.object({ add: z.array(valueExpressionSchema).min(1) }).strict(),
    z.object({ subtract: z.tuple([valueExpressionSchema, valueExpressionSchema]) }).strict(),
    z.object({ percentage: z.tuple([valueExpressionSchema, valueExpressionSchema]) }).strict(),
    z.object({ value: z.string() }).strict(),
  ]),
);

export const assertionSchema: z.ZodType<Assertion> = z.lazy(() =>
  z.discriminatedUnion('type', [
    z.object({ type: z.literal('exists'), path: z.string() }).strict(),
    z.object({ type: z.literal('textEquals'), path: z.string(), value: z.string() }).strict(),
    z.object({ type: z.literal('oneOf'), path: z.string(), values: z.array(z.string()).min(1) }).strict(),
    z.object({ type: z.literal('pattern'), path: z.string(), pattern: regexSource }).strict(),
    z.object({ type: z.literal('equals'), left: valueExpressionSchema, right: valueExpressionSchema }).strict(),
    z.object({ type: z.literal('greaterThan'), left: valueExpressionSchema, right: valueExpressionSchema }).strict(),
    z.object({ type: z.literal('some'), path: z.string(), where: assertionSchema }).strict(),
    z.object({ type: z.literal('any'), of: z.array(assertionSchema).min(1) }).strict(),
    z.object({ type: z.literal('all'), of: z.array(assertionSchema).min(1) }).strict(),
    z.object({ type: z.literal('not'), assertion: assertionSchema }).strict(),
    z.object({ type: z.literal('when'), if: assertionSchema, then: assertionSchema }).strict(),
  ]),
);

const ruleSchema = z
  .object({
    id: z.string().regex(/^[A-Z][A-Z0-9-]*\d$/, 'Rule ids look like BR-CO-10'),
    message: z.string().min(1),
    context: z.string().optional(),
    profiles: z.array(z.enum([...CII_PROFILES, ...UBL_PROFILES])).optional(),
    assert: assertionSchema,
  })
  .strict();

const ruleSetSchema = z
  .object({
    syntax: z.enum(['cii', 'ubl']),
    rules: z.array(ruleSchema),
  })
  .strict()
  .superRefine((set, ctx) => {
    const seen = new Set<string>();
    set.rules.forEach((rule, index) => {
      if (seen.has(rule.id)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Duplicate rule id ${rule.id}`, path: ['rules', index, 'id'] });
      }
      seen.add(rule.id);
    });
  });

const ruleSets = new Map<Syntax, readonly RuleDefinition[]>();

/**
 * Rule set bundled for a syntax, in file order.
 *
 * @throws ConfigurationError when the bundled file does not describe a rule set
 */
export function loadRuleSet(syntax: Syntax): readonly RuleDefinition[] {
  const cached = ruleSets.get(syntax);
  if (cached) return cached;

  const file = `rules/${syntax}.json`;
  const result = ruleSetSchema.safeParse(readJsonAsset(file));
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigurationError(`Invalid rule set ${file}: ${issue?.path.join('.') ?? ''} ${issue?.message ?? ''}`.trim(), {
      asset: file,
    });
  }
  if (result.data.syntax !== syntax) {
    throw new ConfigurationError(`Rule set ${file} is declared for ${result.data.syntax}`, { asset: file });
  }

  ruleSets.set(syntax, result.data.rules);
  return result.data.rules;
}
