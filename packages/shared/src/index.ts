/**
 * @einvoice-fr/shared
 *
 * Shared utilities: decimal arithmetic, calendar dates, errors, logging, ids,
 * settings, identifier checks and XML helpers.
 *
 * @packageDocumentation
 */

export { createLogger, isLogLevel, LOG_LEVELS, type Logger, type LogLevel, type LoggerOptions, type LogSink } from './logging/logger.js';
export { createSafeLogger, type SafeLoggerOptions } from './logging/safe-logger.js';
export { EInvoiceError, ValidationError, ConfigurationError, type ViolationDetail } from './errors/errors.js';
export {
  generateId,
  generateUuid,
  createSequentialIdGenerator,
  defaultIdGenerator,
  uuidGenerator,
  type IdGenerator,
  type GenerateIdOptions,
} from './utils/ids.js';
export {
  resolveSettings,
  maskSettings,
  DEFAULT_SETTINGS,
  SETTINGS_ENV_VARS,
  type EInvoiceSettings,
  type SettingsOverrides,
  type SettingsSource,
  type ResolvedSettings,
} from './config/settings.js';

export {
  ISO_DATE_PATTERN,
  ISO_DATE_FORMAT,
  parseCalendarDate,
  isCalendarDate,
  formatCalendarDate,
} from './dates/dates.js';

// Decimal arithmetic
export {
  // Operations
  add,
  subtract,
  multiply,
  divide,
  sum,
  percentage,
  round,
  abs,
  negate,
  // Comparisons
  compare,
  equals,
  isZero,
  isNegative,
  isPositive,
  // Conversions
  normalizeDecimal,
  fromNumber,
  isValidDecimalAmount,
  // Types & Constants
  DecimalFormatError,
  type RoundingMode,
  type DecimalConfig,
  DEFAULT_ROUNDING_MODE,
  DEFAULT_DECIMAL_PLACES,
  MAX_DECIMAL_PLACES,
} from './decimal/decimal-utils.js';

// French identifiers and EU VAT numbers (offline syntax check only)
export {
  SIREN_PATTERN,
  SIRET_PATTERN,
  EU_MEMBER_STATES,
  normalizeIdentifier,
  isValidSiren,
  isValidSiret,
  sirenFromSiret,
  isEuMemberState,
  validateVatNumberFormat,
  type EuMemberState,
  type VatNumberCheck,
} from './identifiers/identifiers.js';

// XML
export {
  element,
  optionalElement,
  serializeXml,
  serializeXmlString,
  parseXmlDocument,
  decodeXml,
  childElement,
  childElements,
  findElement,
  findElements,
  findText,
  XmlSyntaxError,
  XML_DECLARATION,
  type XmlNode,
  type XmlElement,
} from './xml/xml.js';
