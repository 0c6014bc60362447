/**
 * Shared type definitions
 */

// Re-export error types
export {
    LogicException,
    ParseError,
    createParseError,
    createInvalidArgumentError,
    createEngineError,
    getSuggestion,
    serializeLogicError,
} from './errors.js';

export type {
    LogicErrorCode,
    ParseErrorKind,
    ErrorSpan,
    LogicError,
} from './errors.js';

// Re-export AST types
export type {
    BinaryConnective,
    FormulaType,
    VariableNode,
    NotNode,
    BinaryNode,
    Formula,
} from './ast.js';

// Re-export parser types
export type {
    TokenType,
    Token,
    ParseResult,
} from './parser.js';

// Re-export tableau types
export type {
    SignedFormula,
    Expansion,
    EngineStatistics,
    Verdict,
    ValidityResult,
    VerificationReport,
} from './tableau.js';

export type {
    EngineName,
    LogLevel,
    DecideOptions,
    EngineOptions,
    SolverOptions,
} from './options.js';

export { DEFAULTS, ENGINE_NAMES, LOG_LEVELS } from './options.js';
