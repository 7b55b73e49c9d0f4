import {
  CII_PROFILES,
  UBL_PROFILES,
  isCodeOf,
  type InvoiceProfile,
  type PdpEnvironment,
} from '@einvoice-fr/contracts';
import { ConfigurationError } from '../errors/errors.js';
import { isLogLevel, type LogLevel } from '../logging/logger.js';

/**
 * Engine settings
 */
export interface EInvoiceSettings {
  /** Filing platform connector name */
  pdpConnector: string;
  apiKey?: string;
  environment: PdpEnvironment;
  baseUrl?: string;
  defaultProfile: InvoiceProfile;
  defaultCurrency: string;
  logLevel: LogLevel;
}

export type SettingsOverrides = Partial<EInvoiceSettings>;

/**
 * Built-in defaults
 */
export const DEFAULT_SETTINGS = {
  pdpConnector: 'memory',
  environment: 'sandbox',
  defaultProfile: 'EN16931',
  defaultCurrency: 'EUR',
  logLevel: 'info',
} as const satisfies Omit<EInvoiceSettings, 'apiKey' | 'baseUrl'>;

/**
 * Environment variable read for each setting
 */
export const SETTINGS_ENV_VARS: Readonly<Record<keyof EInvoiceSettings, string>> = {
  pdpConnector: 'EINVOICE_PDP_CONNECTOR',
  apiKey: 'EINVOICE_API_KEY',
  environment: 'EINVOICE_ENVIRONMENT',
  baseUrl: 'EINVOICE_BASE_URL',
  defaultProfile: 'EINVOICE_DEFAULT_PROFILE',
  defaultCurrency: 'EINVOICE_DEFAULT_CURRENCY',
  logLevel: 'EINVOICE_LOG_LEVEL',
};

export type SettingsSource = 'default' | 'env' | 'overrides';

export interface ResolvedSettings {
  /** Merged settings */
  settings: Readonly<EInvoiceSettings>;
  /** Sources that contributed to this result */
  sources: SettingsSource[];
}

type RawSettings = Partial<Record<keyof EInvoiceSettings, string>>;

const KNOWN_PROFILES: readonly string[] = [...CII_PROFILES, ...UBL_PROFILES];

function readEnv(env: Readonly<Record<string, string | undefined>>): RawSettings {
  const raw: RawSettings = {};
  for (const [key, variable] of Object.entries(SETTINGS_ENV_VARS)) {
    const value = env[variable];
    if (value !== undefined && value !== '' && isSettingKey(key)) {
      raw[key] = value;
    }
  }
  return raw;
}

function isSettingKey(key: string): key is keyof EInvoiceSettings {
  return key in SETTINGS_ENV_VARS;
}

function parseEnvironment(value: string): PdpEnvironment {
  if (value === 'sandbox' || value === 'production') {
    return value;
  }
  throw new ConfigurationError(`Unknown environment '${value}' (expected sandbox or production)`, {
    setting: 'environment',
  });
}

function parseProfile(value: string): InvoiceProfile {
  if (isCodeOf(CII_PROFILES, value) || isCodeOf(UBL_PROFILES, value)) {
    return value;
  }
  throw new ConfigurationError(`Unknown profile '${value}' (expected one of ${KNOWN_PROFILES.join(', ')})`, {
    setting: 'defaultProfile',
  });
}

function parseCurrency(value: string): string {
  if (/^[A-Z]{3}$/.test(value)) {
    return value;
  }
  throw new ConfigurationError(`Invalid currency code '${value}'`, { setting: 'defaultCurrency' });
}

function parseLogLevel(value: string): LogLevel {
  if (isLogLevel(value)) {
    return value;
  }
  throw new ConfigurationError(`Unknown log level '${value}'`, { setting: 'logLevel' });
}

function applyRaw(target: EInvoiceSettings, raw: RawSettings): void {
  if (raw.pdpConnector !== undefined) target.pdpConnector = raw.pdpConnector;
  if (raw.apiKey !== undefined) target.apiKey = raw.apiKey;
  if (raw.environment !== undefined) target.environment = parseEnvironment(raw.environment);
  if (raw.baseUrl !== undefined) target.baseUrl = raw.baseUrl;
  if (raw.defaultProfile !== undefined) target.defaultProfile = parseProfile(raw.defaultProfile);
  if (raw.defaultCurrency !== undefined) target.defaultCurrency = parseCurrency(raw.defaultCurrency);
  if (raw.logLevel !== undefined) target.logLevel = parseLogLevel(raw.logLevel);
}

/**
 * Resolve settings by merging, in increasing precedence:
 * 1. Built-in defaults
 * 2. `EINVOICE_*` environment variables
 * 3. Explicit overrides
 *
 * Every value is checked whatever its source.
 *
 * @throws ConfigurationError on an unknown environment, profile or log level,
 * or a malformed currency code
 */
export function resolveSettings(
  overrides?: SettingsOverrides,
  env: Readonly<Record<string, string | undefined>> = process.env,
): ResolvedSettings {
  const sources: SettingsSource[] = ['default'];
  const settings: EInvoiceSettings = { ...DEFAULT_SETTINGS };

  const fromEnv = readEnv(env);
  if (Object.keys(fromEnv).length > 0) {
    sources.push('env');
    applyRaw(settings, fromEnv);
  }

  if (overrides && Object.keys(overrides).length > 0) {
    sources.push('overrides');
    applyRaw(settings, overrides);
  }

  return { settings: Object.freeze(settings), sources };
}

/**
 * Copy of the settings safe to log (API key masked)
 */
export function maskSettings(settings: Readonly<EInvoiceSettings>): Record<string, unknown> {
  const { apiKey, ...rest } = settings;
  return apiKey === undefined ? { ...rest } : { ...rest, apiKey: '***' };
}
