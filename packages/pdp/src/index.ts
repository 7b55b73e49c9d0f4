/**
 * @einvoice-fr/pdp
 *
 * Filing platform (PDP/PA) connectors: error taxonomy, shared base and the
 * in-memory platform.
 *
 * @packageDocumentation
 */

export {
  BasePdpConnector,
  DEFAULT_PAGE_SIZE,
  MAX_PAGE_SIZE,
  type PdpConnectorOptions,
  type ResolvedSearchFilters,
} from './base-connector.js';
export { MemoryPdpConnector, type MemoryPdpConnectorOptions } from './memory/memory-connector.js';
export { createPdpConnector } from './factory.js';
export { PdpError, PdpAuthenticationError, PdpValidationError, PdpNotFoundError, PdpConnectionError } from './errors.js';
