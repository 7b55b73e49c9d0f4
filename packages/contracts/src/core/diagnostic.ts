/**
 * Severity levels for diagnostics
 */
export type DiagnosticSeverity = 'error' | 'warning' | 'info';

/**
 * Category of the diagnostic
 */
export type DiagnosticCategory =
  | 'model' // Domain model contract violations
  | 'schema' // Structural (content model) validation
  | 'business-rule' // Business rules (EN16931, BR-FR)
  | 'format'; // Format detection/parsing

/**
 * A single finding produced while building or validating a document
 */
export interface Diagnostic {
  /**
   * Stable code for this finding
   * Examples: 'BR-CO-10', 'SCHEMA-MISSING', 'MODEL-SIREN'
   */
  code: string;

  /**
   * Human-readable message
   */
  message: string;

  severity: DiagnosticSeverity;

  category: DiagnosticCategory;

  /**
   * Component that produced the diagnostic
   */
  source: string;

  /**
   * Location in the source (element path or input field path)
   */
  location?: string;

  /**
   * Additional context (e.g., expected vs actual values)
   */
  context?: Record<string, unknown>;
}
