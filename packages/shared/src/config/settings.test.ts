import { describe, it, expect } from 'vitest';
import { resolveSettings, maskSettings } from './settings.js';
import { ConfigurationError } from '../errors/errors.js';

describe('resolveSettings', () => {
  it('should return defaults when nothing is set', () => {
    const { settings, sources } = resolveSettings(undefined, {});

    expect(settings).toEqual({
      pdpConnector: 'memory',
      environment: 'sandbox',
      defaultProfile: 'EN16931',
      defaultCurrency: 'EUR',
      logLevel: 'info',
    });
    expect(sources).toEqual(['default']);
  });

  it('should read EINVOICE_* environment variables', () => {
    const { settings, sources } = resolveSettings(undefined, {
      EINVOICE_ENVIRONMENT: 'production',
      EINVOICE_DEFAULT_PROFILE: 'EXTENDED',
      EINVOICE_API_KEY: 'test-secret',
      EINVOICE_LOG_LEVEL: 'debug',
    });

    expect(settings.environment).toBe('production');
    expect(settings.defaultProfile).toBe('EXTENDED');
    expect(settings.apiKey).toBe('test-secret');
    expect(settings.logLevel).toBe('debug');
    expect(sources).toEqual(['default', 'env']);
  });

  it('should let overrides win over the environment', () => {
    const { settings, sources } = resolveSettings(
      { defaultProfile: 'PEPPOL', defaultCurrency: 'USD' },
      { EINVOICE_DEFAULT_PROFILE: 'BASIC' },
    );

    expect(settings.defaultProfile).toBe('PEPPOL');
    expect(settings.defaultCurrency).toBe('USD');
    expect(sources).toEqual(['default', 'env', 'overrides']);
  });

  it('should ignore empty environment values', () => {
    const { sources } = resolveSettings(undefined, { EINVOICE_BASE_URL: '' });
    expect(sources).toEqual(['default']);
  });

  it('should reject unknown values', () => {
    expect(() => resolveSettings(undefined, { EINVOICE_ENVIRONMENT: 'staging' })).toThrow(ConfigurationError);
    expect(() => resolveSettings(undefined, { EINVOICE_DEFAULT_PROFILE: 'XRECHNUNG' })).toThrow(
      /Unknown profile 'XRECHNUNG'/,
    );
    expect(() => resolveSettings(undefined, { EINVOICE_DEFAULT_CURRENCY: 'euro' })).toThrow(
      "Invalid currency code 'euro'",
    );
    expect(() => resolveSettings(undefined, { EINVOICE_LOG_LEVEL: 'trace' })).toThrow("Unknown log level 'trace'");
  });

  it('should return frozen settings', () => {
    const { settings } = resolveSettings(undefined, {});
    expect(Object.isFrozen(settings)).toBe(true);
  });
});

describe('maskSettings', () => {
  it('should mask the API key', () => {
    const { settings } = resolveSettings({ apiKey: 'test-secret' }, {});
    expect(maskSettings(settings)['apiKey']).toBe('***');
  });

  it('should not add an API key when none is set', () => {
    const { settings } = resolveSettings(undefined, {});
    expect(maskSettings(settings)).not.toHaveProperty('apiKey');
  });
});
