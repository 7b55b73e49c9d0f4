import { ConfigurationError, type EInvoiceSettings, type Logger } from '@einvoice-fr/shared';
import type { BasePdpConnector } from './base-connector.js';
import { MemoryPdpConnector } from './memory/memory-connector.js';

/**
 * Builds the connector named by the settings.
 *
 * @throws ConfigurationError for a connector this package does not provide
 */
export function createPdpConnector(
  settings: Readonly<EInvoiceSettings>,
  options: { logger?: Logger } = {},
): BasePdpConnector {
  switch (settings.pdpConnector) {
    case 'memory':
      return new MemoryPdpConnector({
        environment: settings.environment,
        ...(settings.apiKey !== undefined ? { apiKey: settings.apiKey } : {}),
        ...(settings.baseUrl !== undefined ? { baseUrl: settings.baseUrl } : {}),
        ...(options.logger !== undefined ? { logger: options.logger } : {}),
      });
    default:
      throw new ConfigurationError(`Unknown filing platform connector '${settings.pdpConnector}'`, {
        setting: 'pdpConnector',
      });
  }
}
