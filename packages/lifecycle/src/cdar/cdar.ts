import {
  CDAR_ROLE_CODES,
  INVOICE_STATUSES,
  isCodeOf,
  type CdarMessage,
  type CdarParty,
  type ISODate,
  type LifecycleEvent,
} from '@einvoice-fr/contracts';
import {
  XmlSyntaxError,
  childElements,
  element,
  findElement,
  findText,
  generateId,
  isValidDecimalAmount,
  normalizeDecimal,
  optionalElement,
  parseXmlDocument,
  serializeXml,
  type GenerateIdOptions,
  type XmlElement,
  type XmlNode,
} from '@einvoice-fr/shared';
import { CdarParseError } from '../errors.js';
import type { LifecycleManager } from '../lifecycle-manager.js';
import { CDAR_GUIDELINE_ID, CDAR_NAMESPACES, CDAR_ROOT, CDAR_TYPE_CODE } from './namespaces.js';

function party(name: string, value: CdarParty): XmlNode {
  return element(name, [
    element('ram:ID', value.identifier, { schemeID: value.schemeId }),
    element('ram:RoleCode', value.roleCode),
  ]);
}

/**
 * Encodes a lifecycle message as a UN/CEFACT CDAR document.
 */
export function generateCdarXml(message: CdarMessage): Uint8Array {
  const root = element(
    `rsm:${CDAR_ROOT}`,
    [
      element('rsm:ExchangedDocumentContext', [
        element('ram:GuidelineSpecifiedDocumentContextParameter', [element('ram:ID', CDAR_GUIDELINE_ID)]),
      ]),
      element('rsm:ExchangedDocument', [
        element('ram:ID', message.messageId),
        element('ram:TypeCode', CDAR_TYPE_CODE),
        element('ram:StatusCode', message.statusCode),
        element('ram:IssueDateTime', [
          element('udt:DateTimeString', message.issueDate.replace(/-/g, ''), { format: '102' }),
        ]),
        party('ram:SenderTradeParty', message.sender),
        ...message.recipients.map((recipient) => party('ram:RecipientTradeParty', recipient)),
      ]),
      element('rsm:AcknowledgementDocument', [
        element('ram:StatusCode', message.statusCode),
        optionalElement('ram:ReasonInformation', message.reason),
        optionalElement('ram:ReasonCode', message.reasonCode),
        optionalElement('ram:SpecifiedAmount', message.amount),
        element('ram:ReferenceReferencedDocument', [element('ram:IssuerAssignedID', message.invoiceReference)]),
      ]),
    ],
    {
      'xmlns:rsm': CDAR_NAMESPACES.rsm,
      'xmlns:ram': CDAR_NAMESPACES.ram,
      'xmlns:udt': CDAR_NAMESPACES.udt,
    },
  );
  return serializeXml(root);
}

function required(parent: XmlElement, path: string): string {
  const text = findText(parent, path);
  if (text === undefined) {
    throw new CdarParseError(`Missing required element: ${path}`, { path });
  }
  return text;
}

function requiredElement(parent: XmlElement, path: string): XmlElement {
  const found = findElement(parent, path);
  if (found === undefined) {
    throw new CdarParseError(`Missing required element: ${path}`, { path });
  }
  return found;
}

function fromFormat102(value: string): ISODate {
  const match = /^(\d{4})(\d{2})(\d{2})$/.exec(value);
  if (!match) {
    throw new CdarParseError(`Invalid issue date: ${value}`, { value });
  }
  return `${match[1]}-${match[2]}-${match[3]}`;
}

function parseParty(node: XmlElement): CdarParty {
  const idElement = requiredElement(node, 'ID');
  const roleCode = required(node, 'RoleCode');
  if (!isCodeOf(CDAR_ROLE_CODES, roleCode)) {
    throw new CdarParseError(`Unknown role code: ${roleCode}`, { roleCode });
  }
  return {
    identifier: idElement.text,
    schemeId: idElement.attributes['schemeID'] ?? '',
    roleCode,
  };
}

/**
 * Decodes a CDAR document.
 *
 * @throws CdarParseError when the document is not well-formed, lacks a
 * required element or carries an unknown status or role code
 */
export function parseCdarXml(xml: string | Uint8Array): CdarMessage {
  let root: XmlElement;
  try {
    root = parseXmlDocument(xml);
  } catch (error) {
    if (error instanceof XmlSyntaxError) {
      throw new CdarParseError(`Malformed CDAR document: ${error.message}`);
    }
    throw error;
  }
  if (root.name !== CDAR_ROOT) {
    throw new CdarParseError(`Unexpected root element: ${root.name}`, { root: root.name });
  }

  const document = requiredElement(root, 'ExchangedDocument');
  const statusCode = required(document, 'StatusCode');
  if (!isCodeOf(INVOICE_STATUSES, statusCode)) {
    throw new CdarParseError(`Unknown status code: ${statusCode}`, { statusCode });
  }

  const acknowledgement = requiredElement(root, 'AcknowledgementDocument');
  const reason = findText(acknowledgement, 'ReasonInformation');
  const reasonCode = findText(acknowledgement, 'ReasonCode');
  const amount = findText(acknowledgement, 'SpecifiedAmount');
  if (amount !== undefined && !isValidDecimalAmount(amount)) {
    throw new CdarParseError(`Invalid amount: ${amount}`, { amount });
  }

  return {
    messageId: required(document, 'ID'),
    issueDate: fromFormat102(required(document, 'IssueDateTime/DateTimeString')),
    statusCode,
    invoiceReference: required(acknowledgement, 'ReferenceReferencedDocument/IssuerAssignedID'),
    sender: parseParty(requiredElement(document, 'SenderTradeParty')),
    recipients: childElements(document, 'RecipientTradeParty').map(parseParty),
    ...(reason !== undefined ? { reason } : {}),
    ...(reasonCode !== undefined ? { reasonCode } : {}),
    ...(amount !== undefined ? { amount: normalizeDecimal(amount) } : {}),
  };
}

export interface CdarParties {
  readonly sender: CdarParty;
  readonly recipients: readonly CdarParty[];
}

/**
 * Message announcing a lifecycle event. The event's message id is reused
 * when it has one.
 */
export function cdarMessageFromEvent(
  manager: LifecycleManager,
  event: LifecycleEvent,
  parties: CdarParties,
  options?: GenerateIdOptions,
): CdarMessage {
  return {
    messageId: event.cdarMessageId ?? generateId('cdar', options),
    issueDate: event.timestamp.slice(0, 10),
    statusCode: event.status,
    invoiceReference: manager.invoiceReference,
    sender: parties.sender,
    recipients: parties.recipients,
    ...(event.reason !== undefined ? { reason: event.reason } : {}),
    ...(event.reasonCode !== undefined ? { reasonCode: event.reasonCode } : {}),
    ...(event.amount !== undefined ? { amount: event.amount } : {}),
  };
}
