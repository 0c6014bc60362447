/**
 * Library Entry Point
 *
 * Parser, engines and supporting utilities, without the CLI.
 */

// Core
export { parse, tryParse, Tokenizer, Parser } from './parser/index.js';
export { createLogicEngine, decide, LogicEngine } from './logicEngine.js';

// Engines
export * from './engines/index.js';

// AST helpers
export * from './utils/ast/index.js';
export { evaluate } from './utils/evaluation.js';
export { allAssignments } from './utils/enumerate.js';

// Configuration and logging
export { loadConfig } from './config.js';
export type { SolverConfig } from './config.js';
export { createLogger, silentLogger } from './logger.js';
export type { Logger, LoggerOptions } from './logger.js';

// Types and Interfaces
export * from './types/index.js';
