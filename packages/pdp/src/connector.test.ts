import { describe, it, expect } from 'vitest';
import { ConfigurationError, resolveSettings } from '@einvoice-fr/shared';
import { PdpAuthenticationError, PdpConnectionError, PdpError, PdpValidationError } from './errors.js';
import { createPdpConnector } from './factory.js';
import { MemoryPdpConnector } from './memory/memory-connector.js';

describe('BasePdpConnector', () => {
  it('should default to the sandbox', () => {
    const pdp = new MemoryPdpConnector();

    expect(pdp.name).toBe('memory');
    expect(pdp.environment).toBe('sandbox');
    expect(pdp.baseUrl).toBeUndefined();
  });

  it('should drop trailing slashes from the base URL', () => {
    const pdp = new MemoryPdpConnector({ baseUrl: 'https://pdp.example.test/api/', environment: 'production' });

    expect(pdp.baseUrl).toBe('https://pdp.example.test/api');
    expect(pdp.environment).toBe('production');
  });

  it('should refuse an empty API key', () => {
    expect(() => new MemoryPdpConnector({ apiKey: ' ' })).toThrow(PdpAuthenticationError);
  });
});

describe('createPdpConnector', () => {
  it('should build the memory connector from the settings', () => {
    const { settings } = resolveSettings({ apiKey: 'test-secret' }, {});

    expect(createPdpConnector(settings)).toBeInstanceOf(MemoryPdpConnector);
  });

  it('should reject an unknown connector', () => {
    const { settings } = resolveSettings({ pdpConnector: 'unknown' }, {});

    expect(() => createPdpConnector(settings)).toThrow(ConfigurationError);
    expect(() => createPdpConnector(settings)).toThrow("Unknown filing platform connector 'unknown'");
  });
});

describe('platform errors', () => {
  it('should share the base class and carry their codes', () => {
    const errors = [
      new PdpAuthenticationError('Expired token'),
      new PdpValidationError('Rejected', ['BR-01']),
      new PdpConnectionError('Timeout'),
    ];

    expect(errors.every((error) => error instanceof PdpError)).toBe(true);
    expect(errors.map((error) => error.code)).toEqual([
      'PDP_AUTHENTICATION_ERROR',
      'PDP_VALIDATION_ERROR',
      'PDP_CONNECTION_ERROR',
    ]);
  });

  it('should serialize validation reasons', () => {
    expect(new PdpValidationError('Rejected', ['BR-01']).toJSON()).toEqual({
      name: 'PdpValidationError',
      message: 'Rejected',
      code: 'PDP_VALIDATION_ERROR',
      context: undefined,
      errors: ['BR-01'],
    });
  });
});
