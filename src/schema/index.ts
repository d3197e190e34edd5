/**
 * Schema module: single source of truth for invocation and config shapes.
 * Zod schemas + inferred TypeScript types, plus the subject grammar.
 */

export * from './config.js';
export * from './subject.js';
