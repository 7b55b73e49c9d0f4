/**
 * XML tree helpers over fast-xml-parser.
 *
 * Documents are built from a small node tree and serialized with XMLBuilder;
 * parsing yields a typed, namespace-resolved element tree so callers never
 * touch the parser's untyped output.
 */

import { XMLBuilder, XMLParser, XMLValidator } from 'fast-xml-parser';
import { EInvoiceError } from '../errors/errors.js';

const ATTRIBUTE_PREFIX = '@_';
const ATTRIBUTES_KEY = ':@';
const TEXT_KEY = '#text';

export const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

/**
 * Node of a document being built
 */
export interface XmlNode {
  /** Qualified name, e.g. "ram:ID" */
  readonly name: string;
  readonly attributes?: Readonly<Record<string, string>>;
  readonly text?: string;
  readonly children?: readonly XmlNode[];
}

type ChildSpec = XmlNode | undefined | false | null;

/**
 * Shorthand node constructor. Falsy children are skipped so optional
 * content can be written inline: `element('ram:X', [cond && element(...)])`.
 */
export function element(
  name: string,
  content?: string | readonly ChildSpec[],
  attributes?: Readonly<Record<string, string>>,
): XmlNode {
  const node: { name: string; attributes?: Readonly<Record<string, string>>; text?: string; children?: XmlNode[] } = {
    name,
  };
  if (attributes !== undefined) {
    node.attributes = attributes;
  }
  if (typeof content === 'string') {
    node.text = content;
  } else if (content !== undefined) {
    node.children = content.filter((child): child is XmlNode => Boolean(child));
  }
  return node;
}

/**
 * Text element, or nothing when the value is absent or empty.
 */
export function optionalElement(
  name: string,
  value: string | undefined,
  attributes?: Readonly<Record<string, string>>,
): XmlNode | undefined {
  return value === undefined || value === '' ? undefined : element(name, value, attributes);
}

type OrderedEntry = Record<string, unknown>;

function toOrdered(node: XmlNode): OrderedEntry {
  const body: OrderedEntry[] = [];
  if (node.text !== undefined) {
    body.push({ [TEXT_KEY]: node.text });
  }
  for (const child of node.children ?? []) {
    body.push(toOrdered(child));
  }

  const entry: OrderedEntry = { [node.name]: body };
  if (node.attributes !== undefined) {
    const attributes: Record<string, string> = {};
    for (const [key, value] of Object.entries(node.attributes)) {
      attributes[ATTRIBUTE_PREFIX + key] = value;
    }
    entry[ATTRIBUTES_KEY] = attributes;
  }
  return entry;
}

const builder = new XMLBuilder({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  format: true,
  indentBy: '  ',
  suppressEmptyNode: true,
});

/**
 * Serializes a tree to an indented XML string with declaration.
 */
export function serializeXmlString(root: XmlNode): string {
  const body: string = builder.build([toOrdered(root)]);
  return `${XML_DECLARATION}\n${body.trim()}\n`;
}

/**
 * Serializes a tree to UTF-8 bytes with declaration.
 */
export function serializeXml(root: XmlNode): Uint8Array {
  return new TextEncoder().encode(serializeXmlString(root));
}

/**
 * Parsed element with resolved namespace
 */
export interface XmlElement {
  /** Local name, prefix removed */
  readonly name: string;
  readonly qualifiedName: string;
  readonly namespace: string | undefined;
  /** Attributes by local name, namespace declarations excluded */
  readonly attributes: Readonly<Record<string, string>>;
  readonly children: readonly XmlElement[];
  /** Direct text content, trimmed */
  readonly text: string;
}

export class XmlSyntaxError extends EInvoiceError {
  readonly line: number | undefined;
  readonly column: number | undefined;

  constructor(message: string, line?: number, column?: number) {
    super(message, 'XML_SYNTAX_ERROR', { line, column });
    this.name = 'XmlSyntaxError';
    this.line = line;
    this.column = column;
  }
}

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
});

export function decodeXml(xml: string | Uint8Array): string {
  const text = typeof xml === 'string' ? xml : new TextDecoder('utf-8').decode(xml);
  return text.startsWith('\uFEFF') ? text.slice(1) : text;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function splitName(qualifiedName: string): [prefix: string, local: string] {
  const index = qualifiedName.indexOf(':');
  return index === -1 ? ['', qualifiedName] : [qualifiedName.slice(0, index), qualifiedName.slice(index + 1)];
}

function readAttributes(raw: unknown, scope: ReadonlyMap<string, string>): {
  attributes: Record<string, string>;
  scope: ReadonlyMap<string, string>;
} {
  const attributes: Record<string, string> = {};
  let nextScope = scope;
  if (!isRecord(raw)) {
    return { attributes, scope };
  }

  for (const [key, value] of Object.entries(raw)) {
    const name = key.startsWith(ATTRIBUTE_PREFIX) ? key.slice(ATTRIBUTE_PREFIX.length) : key;
    const text = typeof value === 'string' ? value : String(value);

    if (name === 'xmlns' || name.startsWith('xmlns:')) {
      const declared = new Map(nextScope);
      declared.set(name === 'xmlns' ? '' : name.slice('xmlns:'.length), text);
      nextScope = declared;
    } else {
      attributes[splitName(name)[1]] = text;
    }
  }
  return { attributes, scope: nextScope };
}

function convertChildren(nodes: unknown, scope: ReadonlyMap<string, string>): {
  elements: XmlElement[];
  text: string;
} {
  const elements: XmlElement[] = [];
  const texts: string[] = [];
  if (!Array.isArray(nodes)) {
    return { elements, text: '' };
  }

  for (const node of nodes) {
    if (!isRecord(node)) continue;
    const tag = Object.keys(node).find((key) => key !== ATTRIBUTES_KEY);
    if (tag === undefined || tag.startsWith('?') || tag.startsWith('!')) continue;

    const value = node[tag];
    if (tag === TEXT_KEY) {
      texts.push(typeof value === 'string' ? value : String(value));
      continue;
    }

    const { attributes, scope: childScope } = readAttributes(node[ATTRIBUTES_KEY], scope);
    const [prefix, name] = splitName(tag);
    const content = convertChildren(value, childScope);
    elements.push({
      name,
      qualifiedName: tag,
      namespace: childScope.get(prefix),
      attributes,
      children: content.elements,
      text: content.text,
    });
  }
  return { elements, text: texts.join('').trim() };
}

/**
 * Checks well-formedness and parses a document into an element tree.
 *
 * @throws XmlSyntaxError when the document is not well-formed
 */
export function parseXmlDocument(xml: string | Uint8Array): XmlElement {
  const text = decodeXml(xml);
  const check = XMLValidator.validate(text);
  if (check !== true) {
    throw new XmlSyntaxError(check.err.msg, check.err.line, check.err.col);
  }

  const { elements } = convertChildren(parser.parse(text), new Map());
  const root = elements[0];
  if (root === undefined) {
    throw new XmlSyntaxError('Document has no root element');
  }
  return root;
}

/**
 * First child with the given local name
 */
export function childElement(parent: XmlElement | undefined, name: string): XmlElement | undefined {
  return parent?.children.find((child) => child.name === name);
}

/**
 * All children with the given local name, in document order
 */
export function childElements(parent: XmlElement | undefined, name: string): XmlElement[] {
  return parent ? parent.children.filter((child) => child.name === name) : [];
}

/**
 * Follows a slash-separated path of local names, taking the first match at
 * each step.
 *
 * @example findElement(root, 'ExchangedDocument/IssueDateTime/DateTimeString')
 */
export function findElement(parent: XmlElement | undefined, path: string): XmlElement | undefined {
  let current = parent;
  for (const step of path.split('/')) {
    if (step === '') continue;
    current = childElement(current, step);
    if (current === undefined) return undefined;
  }
  return current;
}

/**
 * Every element reached by the path, fanning out at each step.
 */
export function findElements(parent: XmlElement | undefined, path: string): XmlElement[] {
  let current: XmlElement[] = parent ? [parent] : [];
  for (const step of path.split('/')) {
    if (step === '') continue;
    current = current.flatMap((el) => childElements(el, step));
  }
  return current;
}

/**
 * Trimmed text at the path, or undefined when missing or empty.
 */
export function findText(parent: XmlElement | undefined, path: string): string | undefined {
  const found = findElement(parent, path);
  return found === undefined || found.text === '' ? undefined : found.text;
}
