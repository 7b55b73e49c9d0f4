import {
  add,
  compare,
  equals,
  isValidDecimalAmount,
  percentage,
  subtract,
  sum,
  type XmlElement,
} from '@einvoice-fr/shared';
import type { DecimalAmount } from '@einvoice-fr/contracts';
import type { Assertion, SumOver, ValueExpression } from './definitions.js';

/**
 * Element paired with its location, e.g.
 * `/CrossIndustryInvoice/SupplyChainTradeTransaction/IncludedSupplyChainTradeLineItem[2]`
 */
export interface LocatedElement {
  readonly element: XmlElement;
  readonly location: string;
}

export function locateRoot(root: XmlElement): LocatedElement {
  return { element: root, location: `/${root.name}` };
}

function steps(path: string): string[][] {
  return path
    .split('/')
    .filter((step) => step !== '')
    .map((step) => step.split('|'));
}

/**
 * Fans out along a path, recording positions where a name repeats among
 * siblings. A step may list alternatives: `InvoiceLine|CreditNoteLine`.
 */
export function locateAll(start: LocatedElement, path: string): LocatedElement[] {
  let current: LocatedElement[] = [start];
  for (const names of steps(path)) {
    current = current.flatMap(({ element, location }) =>
      element.children
        .filter((child) => names.includes(child.name))
        .map((child) => {
          const sameName = element.children.filter((sibling) => sibling.name === child.name);
          const position = sameName.length > 1 ? `[${sameName.indexOf(child) + 1}]` : '';
          return { element: child, location: `${location}/${child.name}${position}` };
        }),
    );
  }
  return current;
}

/**
 * Every element reached by the path, in document order; the empty path is
 * the context itself.
 */
export function select(context: XmlElement, path: string): XmlElement[] {
  let current: XmlElement[] = [context];
  for (const names of steps(path)) {
    current = current.flatMap((element) => element.children.filter((child) => names.includes(child.name)));
  }
  return current;
}

function textAt(context: XmlElement, path: string): string | undefined {
  const text = select(context, path)[0]?.text;
  return text === '' ? undefined : text;
}

const patternCache = new Map<string, RegExp>();

function compiled(source: string): RegExp {
  let pattern = patternCache.get(source);
  if (!pattern) {
    pattern = new RegExp(source);
    patternCache.set(source, pattern);
  }
  return pattern;
}

function decimalOrUndefined(text: string | undefined): DecimalAmount | undefined {
  return text !== undefined && isValidDecimalAmount(text) ? text : undefined;
}

function sumOf(texts: readonly string[]): DecimalAmount | undefined {
  return texts.every(isValidDecimalAmount) ? sum(texts) : undefined;
}

function sumOver(context: XmlElement, operand: SumOver): DecimalAmount | undefined {
  const items = select(context, operand.each).filter(
    (item) => operand.unless === undefined || select(item, operand.unless).length === 0,
  );
  return sumOf(items.flatMap((item) => select(item, operand.of)).map((el) => el.text));
}

/**
 * Decimal value of an expression, or undefined when an operand is missing
 * or not a number. Rules over undefined values do not fire.
 */
export function evaluate(expression: ValueExpression, context: XmlElement): DecimalAmount | undefined {
  if ('path' in expression) {
    return decimalOrUndefined(textAt(context, expression.path) ?? expression.default);
  }
  if ('sum' in expression) {
    const operand = expression.sum;
    return typeof operand === 'string' ? sumOf(select(context, operand).map((el) => el.text)) : sumOver(context, operand);
  }
  if ('add' in expression) {
    const operands = expression.add.map((operand) => evaluate(operand, context));
    let total: DecimalAmount = '0';
    for (const operand of operands) {
      if (operand === undefined) return undefined;
      total = add(total, operand);
    }
    return total;
  }
  if ('subtract' in expression) {
    const [left, right] = expression.subtract.map((operand) => evaluate(operand, context));
    return left !== undefined && right !== undefined ? subtract(left, right) : undefined;
  }
  if ('percentage' in expression) {
    const [base, rate] = expression.percentage.map((operand) => evaluate(operand, context));
    return base !== undefined && rate !== undefined ? percentage(base, rate) : undefined;
  }
  return decimalOrUndefined(expression.value);
}

function hasContent(element: XmlElement): boolean {
  return element.text !== '' || element.children.length > 0;
}

/**
 * Whether the assertion holds at the context element.
 */
export function holds(assertion: Assertion, context: XmlElement): boolean {
  switch (assertion.type) {
    case 'exists':
      return select(context, assertion.path).some(hasContent);
    case 'textEquals':
      return textAt(context, assertion.path) === assertion.value;
    case 'oneOf': {
      const text = textAt(context, assertion.path);
      return text === undefined || assertion.values.includes(text);
    }
    case 'pattern': {
      const text = textAt(context, assertion.path);
      return text === undefined || compiled(assertion.pattern).test(text);
    }
    case 'equals': {
      const left = evaluate(assertion.left, context);
      const right = evaluate(assertion.right, context);
      return left === undefined || right === undefined || equals(left, right);
    }
    case 'greaterThan': {
      const left = evaluate(assertion.left, context);
      const right = evaluate(assertion.right, context);
      return left === undefined || right === undefined || compare(left, right) > 0;
    }
    case 'some':
      return select(context, assertion.path).some((element) => holds(assertion.where, element));
    case 'any':
      return assertion.of.some((inner) => holds(inner, context));
    case 'all':
      return assertion.of.every((inner) => holds(inner, context));
    case 'not':
      return !holds(assertion.assertion, context);
    case 'when':
      return !holds(assertion.if, context) || holds(assertion.then, context);
  }
}
