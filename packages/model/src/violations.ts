import type { ZodError, ZodIssue } from 'zod';
import { ValidationError, type ViolationDetail } from '@einvoice-fr/shared';

/**
 * `lines.0.vatRate` becomes `lines[0].vatRate`
 */
export function formatPath(path: readonly (string | number)[]): string {
  return path.reduce<string>((acc, segment) => {
    if (typeof segment === 'number') {
      return `${acc}[${segment}]`;
    }
    return acc === '' ? segment : `${acc}.${segment}`;
  }, '');
}

function ruleOf(issue: ZodIssue): string {
  if (issue.code === 'custom') {
    const rule: unknown = issue.params?.['rule'];
    if (typeof rule === 'string') {
      return rule;
    }
  }
  return `MODEL-${issue.code.toUpperCase().replace(/_/g, '-')}`;
}

export function toViolations(error: ZodError): ViolationDetail[] {
  return error.issues.map((issue) => {
    const path = formatPath(issue.path);
    return path === '' ? { code: ruleOf(issue), message: issue.message } : { code: ruleOf(issue), message: issue.message, path };
  });
}

/**
 * One error listing every violation found in the input.
 */
export function constructionError(subject: string, error: ZodError): ValidationError {
  const diagnostics = toViolations(error);
  const first = diagnostics[0];
  const summary = first === undefined ? '' : `: ${first.path !== undefined ? `${first.path}: ` : ''}${first.message}`;
  const more = diagnostics.length > 1 ? ` (+${diagnostics.length - 1} more)` : '';

  return new ValidationError(`Invalid ${subject}${summary}${more}`, diagnostics, { subject });
}
