/**
 * @einvoice-fr/contracts
 *
 * Code sets, domain types and component contracts for the French
 * e-invoicing compliance engine. This package has zero runtime
 * dependencies.
 *
 * @packageDocumentation
 */

// Core types
export * from './core/primitives.js';
export * from './core/codes.js';
export * from './core/invoice.js';
export * from './core/diagnostic.js';

// Codec
export * from './codec/generator.js';

// Validation
export * from './validation/validator.js';

// Lifecycle
export * from './lifecycle/lifecycle.js';

// E-reporting
export * from './ereporting/ereporting.js';

// Filing platform
export * from './pdp/connector.js';
