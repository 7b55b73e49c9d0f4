/**
 * @einvoice-fr/lifecycle
 *
 * Invoice lifecycle statuses (AFNOR XP Z12-012) and the CDAR messages that
 * carry them between platforms.
 *
 * @packageDocumentation
 */

export { LifecycleManager, type LifecycleManagerOptions, type TransitionOptions } from './lifecycle-manager.js';
export {
  TRANSITIONS,
  STATUS_METADATA,
  allowedTransitions,
  isTerminalStatus,
  isMandatoryStatus,
} from './status-graph.js';
export { LifecycleTransitionError, LifecycleReasonRequiredError, CdarParseError } from './errors.js';
export { generateCdarXml, parseCdarXml, cdarMessageFromEvent, type CdarParties } from './cdar/cdar.js';
export { CDAR_NAMESPACES, CDAR_ROOT, CDAR_GUIDELINE_ID, CDAR_TYPE_CODE } from './cdar/namespaces.js';
