import { createLogger, type Logger, type LoggerOptions } from './logger.js';

interface ScrubPattern {
  pattern: RegExp;
  replacement: string;
}

/**
 * PII patterns that should be scrubbed from logs. Order matters: longer
 * numeric identifiers go first so a SIRET is not half-matched as a SIREN.
 */
const PII_PATTERNS: ScrubPattern[] = [
  // IBAN
  {
    pattern: /\b[A-Z]{2}\d{2}[A-Z0-9]{4}\d{7}([A-Z0-9]?){0,16}\b/gi,
    replacement: '[IBAN:REDACTED]',
  },
  {
    pattern: /\b[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}\b/g,
    replacement: '[EMAIL:REDACTED]',
  },
  // French phone numbers (01 23 45 67 89, +33 1 23 45 67 89)
  {
    pattern: /(\+33\s?|0033\s?|\b0)[1-9](?:[\s.-]?\d{2}){4}\b/g,
    replacement: '[PHONE:REDACTED]',
  },
  // International phone numbers
  {
    pattern: /\+\d{1,3}[\s\-.]?\(?\d{2,4}\)?[\s\-.]?\d{3,4}[\s\-.]?\d{3,4}/g,
    replacement: '[PHONE:REDACTED]',
  },
  // EU VAT numbers
  {
    pattern: /\b(FR[A-Z0-9]{2}\d{9}|[A-Z]{2}\d{8,12})\b/g,
    replacement: '[VATID:REDACTED]',
  },
  {
    pattern: /\b\d{14}\b/g,
    replacement: '[SIRET:REDACTED]',
  },
  {
    pattern: /\b\d{9}\b/g,
    replacement: '[SIREN:REDACTED]',
  },
];

/**
 * Context fields that are always redacted (compared lowercased)
 */
const SENSITIVE_FIELD_NAMES = new Set([
  'password',
  'secret',
  'token',
  'apikey',
  'api_key',
  'authorization',
  'credentials',
  'privatekey',
  'iban',
  'bic',
  'bankaccount',
  'email',
  'phone',
  'address',
  'street',
  'postalcode',
  'siren',
  'siret',
  'vatnumber',
]);

const MAX_DEPTH = 10;

function scrubString(value: string, patterns: readonly ScrubPattern[]): string {
  let result = value;
  for (const { pattern, replacement } of patterns) {
    result = result.replace(pattern, replacement);
  }
  return result;
}

function scrubValue(value: unknown, patterns: readonly ScrubPattern[], depth: number): unknown {
  if (depth > MAX_DEPTH) {
    return '[MAX_DEPTH_REACHED]';
  }

  if (value === null || value === undefined || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }

  if (typeof value === 'string') {
    return scrubString(value, patterns);
  }

  if (Array.isArray(value)) {
    return value.map((item: unknown) => scrubValue(item, patterns, depth + 1));
  }

  if (typeof value === 'object') {
    return scrubRecord(Object.entries(value), patterns, depth + 1);
  }

  // Functions, symbols, bigint
  return '[UNSUPPORTED_TYPE]';
}

function scrubRecord(
  entries: [string, unknown][],
  patterns: readonly ScrubPattern[],
  depth: number,
): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of entries) {
    result[key] = SENSITIVE_FIELD_NAMES.has(key.toLowerCase()) ? '[REDACTED]' : scrubValue(value, patterns, depth);
  }
  return result;
}

/**
 * Safe logger options
 */
export interface SafeLoggerOptions extends LoggerOptions {
  /**
   * Correlation ID to include in all log entries
   */
  correlationId?: string;

  /**
   * Whether to enable PII scrubbing
   * @default true
   */
  scrubPii?: boolean;

  /**
   * Additional patterns to scrub
   */
  additionalPatterns?: ScrubPattern[];
}

/**
 * Create a logger that scrubs personal data before anything is written:
 * IBANs, e-mail addresses, phone numbers, VAT numbers, SIREN/SIRET, and
 * any context field with a sensitive name.
 *
 * @example
 * ```typescript
 * const logger = createSafeLogger({ prefix: 'pdp', correlationId: 'abc-123' });
 * logger.info('Invoice submitted', { invoiceNumber: 'FA-2026-001', iban: 'FR76...' });
 * ```
 */
export function createSafeLogger(options: SafeLoggerOptions = {}): Logger {
  const baseLogger = createLogger(options);
  const scrubPii = options.scrubPii ?? true;
  const patterns = [...PII_PATTERNS, ...(options.additionalPatterns ?? [])];

  const baseContext: Record<string, unknown> = {};
  if (options.correlationId !== undefined) {
    baseContext['correlationId'] = options.correlationId;
  }

  const scrubContext = (context?: Record<string, unknown>): Record<string, unknown> => {
    const merged = { ...baseContext, ...context };
    return scrubPii ? scrubRecord(Object.entries(merged), patterns, 0) : merged;
  };

  const scrubMessage = (message: string): string => (scrubPii ? scrubString(message, patterns) : message);

  return {
    debug: (message, context) => baseLogger.debug(scrubMessage(message), scrubContext(context)),
    info: (message, context) => baseLogger.info(scrubMessage(message), scrubContext(context)),
    warn: (message, context) => baseLogger.warn(scrubMessage(message), scrubContext(context)),
    error: (message, context) => baseLogger.error(scrubMessage(message), scrubContext(context)),

    child(context: Record<string, unknown>): Logger {
      return createSafeLogger({ ...options, context: { ...options.context, ...context } });
    },
  };
}
