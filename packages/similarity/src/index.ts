/**
 * @connect-migrator/similarity
 *
 * Lexical similarity measures and the provider capability used by the
 * semantic mapping tier.
 */

export * from './similarity/index.js';
export * from './providers/index.js';
export * from './types/index.js';
