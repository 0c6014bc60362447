/**
 * AST Utilities
 *
 * Shared utilities for working with propositional formula trees.
 */

export * from './factory.js';
export * from './printer.js';
export * from './analysis.js';
export * from './intern.js';
