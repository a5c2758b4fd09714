/**
 * letcheck - Monomorphic type inference for a small let/if language
 *
 * Constraint generation, union-find unification and class naming over
 * the two ground types int and bool.
 */

// Re-export parser
export * from './parser/index.js';

// Re-export constraint system
export * from './constraint/index.js';

// Re-export inference, scope checking and evaluation
export * from './analysis/index.js';

// Re-export output
export * from './output/index.js';

// Re-export driver
export * from './driver/index.js';
