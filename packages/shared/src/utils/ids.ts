/**
 * ID generation utilities with support for deterministic testing.
 *
 * By default, uses timestamp + crypto.randomUUID() for unique IDs.
 * For deterministic testing, pass a custom IdGenerator.
 */

/**
 * IdGenerator interface for injectable ID generation.
 */
export interface IdGenerator {
  /** Generate a unique identifier */
  generate(prefix?: string): string;
}

/**
 * Default ID generator using timestamp + crypto random.
 */
export const defaultIdGenerator: IdGenerator = {
  generate: (prefix?: string) => {
    const timestamp = Date.now().toString(36);
    const random = globalThis.crypto.randomUUID().slice(0, 8);
    return prefix ? `${prefix}-${timestamp}-${random}` : `${timestamp}-${random}`;
  },
};

/**
 * Generator returning plain RFC 4122 v4 UUIDs (the prefix is ignored).
 */
export const uuidGenerator: IdGenerator = {
  generate: () => globalThis.crypto.randomUUID(),
};

/**
 * Generator producing `PREFIX-000001`, `PREFIX-000002`, ... Each instance
 * keeps its own counter.
 *
 * @example
 * const ids = createSequentialIdGenerator('MEM');
 * ids.generate() // => 'MEM-000001'
 */
export function createSequentialIdGenerator(defaultPrefix: string, width = 6): IdGenerator {
  let counter = 0;
  return {
    generate: (prefix?: string) => {
      counter += 1;
      return `${prefix ?? defaultPrefix}-${String(counter).padStart(width, '0')}`;
    },
  };
}

/**
 * Options for ID generation functions.
 */
export interface GenerateIdOptions {
  /**
   * Custom ID generator for deterministic testing.
   * If not provided, uses default generator with timestamp + crypto random.
   */
  idGenerator?: IdGenerator;
}

/**
 * Generate a unique ID.
 *
 * @example
 * generateId('cdar') // => 'cdar-lq2x4y-a1b2c3d4'
 *
 * // Deterministic testing
 * const fixedGenerator = { generate: () => 'fixed-id' };
 * generateId('cdar', { idGenerator: fixedGenerator }) // => 'fixed-id'
 */
export function generateId(prefix = '', options?: GenerateIdOptions): string {
  const generator = options?.idGenerator ?? defaultIdGenerator;
  return generator.generate(prefix || undefined);
}

/**
 * Generate a UUID, e.g. for e-reporting transaction and submission ids.
 */
export function generateUuid(options?: GenerateIdOptions): string {
  return (options?.idGenerator ?? uuidGenerator).generate();
}
