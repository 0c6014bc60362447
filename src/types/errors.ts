/**
 * Structured Error System
 *
 * Provides machine-readable errors with codes, spans, and suggestions.
 */

/**
 * Error codes for solver operations
 */
export type LogicErrorCode =
  | 'PARSE_ERROR'           // Syntax errors in formula
  | 'INVALID_ARGUMENT'      // Bad configuration value or CLI flag
  | 'ENGINE_ERROR';         // Internal engine failure

/**
 * Ways in which a formula string can fail to parse
 */
export type ParseErrorKind =
  | 'UnexpectedCharacter'
  | 'UnterminatedExpression'
  | 'UnknownOperator'
  | 'EmptyVariableName'
  | 'TrailingInput'
  | 'UnexpectedEndOfInput';

/**
 * Source location span for error reporting
 */
export interface ErrorSpan {
  start: number;
  end: number;
  line?: number;
  col?: number;
}

/**
 * Structured error with code, message, span, and suggestions
 */
export interface LogicError {
  code: LogicErrorCode;
  message: string;
  kind?: ParseErrorKind;
  span?: ErrorSpan;
  suggestion?: string;
  context?: string;          // The problematic formula
  details?: Record<string, unknown>;
}

/**
 * Exception class wrapping LogicError for throw/catch patterns
 */
export class LogicException extends Error {
  public readonly error: LogicError;

  constructor(error: LogicError) {
    super(error.message);
    this.name = 'LogicException';
    this.error = error;

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  toJSON(): LogicError {
    return this.error;
  }
}

/**
 * Rejection of an input string by the parser. Never recovered internally.
 */
export class ParseError extends LogicException {
  public readonly kind: ParseErrorKind;
  public readonly position?: number;

  constructor(kind: ParseErrorKind, error: LogicError, position?: number) {
    super({ ...error, kind });
    this.name = 'ParseError';
    this.kind = kind;
    this.position = position;
  }
}

/**
 * Common syntax error patterns and their suggestions
 */
const SYNTAX_SUGGESTIONS: Array<{
  pattern: RegExp;
  suggestion: string;
}> = [
    {
      pattern: /^\s*$/,
      suggestion: 'Provide a formula, e.g. (a^b)'
    },
    {
      pattern: /&/,
      suggestion: "Use '^' for conjunction instead of '&'"
    },
    {
      pattern: /<-(?!>)/,
      suggestion: "Biconditional is written '<->'"
    },
    {
      pattern: /(\^|\||->)\s*\)?\s*$/,
      suggestion: 'Incomplete binary formula - missing right operand'
    },
    {
      pattern: /-\s*$/,
      suggestion: "Incomplete negation - missing operand after '-'"
    },
    {
      pattern: /\([^)]*$/,
      suggestion: "Unbalanced parentheses - missing closing ')'"
    },
    {
      pattern: /^[^(]*\)/,
      suggestion: "Unbalanced parentheses - missing opening '('"
    },
    {
      pattern: /(^|[^A-Za-z0-9])[0-9]/,
      suggestion: 'Variable names must start with a letter'
    },
  ];

/**
 * Get a suggestion for a syntax error based on the input
 */
export function getSuggestion(input: string): string | undefined {
  for (const { pattern, suggestion } of SYNTAX_SUGGESTIONS) {
    if (pattern.test(input)) {
      return suggestion;
    }
  }
  return undefined;
}

/**
 * Create a parse error with optional span and suggestion
 */
export function createParseError(
  kind: ParseErrorKind,
  message: string,
  input: string,
  position?: number
): ParseError {
  const span = position !== undefined ? {
    start: position,
    end: position + 1,
    line: getLineNumber(input, position),
    col: getColumnNumber(input, position),
  } : undefined;

  return new ParseError(kind, {
    code: 'PARSE_ERROR',
    message,
    span,
    suggestion: getSuggestion(input),
    context: input,
  }, position);
}

/**
 * Create an invalid argument error (configuration or CLI)
 */
export function createInvalidArgumentError(
  message: string,
  details?: Record<string, unknown>
): LogicException {
  return new LogicException({
    code: 'INVALID_ARGUMENT',
    message,
    details,
  });
}

/**
 * Create an engine error
 */
export function createEngineError(
  message: string,
  details?: Record<string, unknown>
): LogicException {
  return new LogicException({
    code: 'ENGINE_ERROR',
    message: `Engine error: ${message}`,
    details,
  });
}

/**
 * Get line number from position in string
 */
function getLineNumber(input: string, position: number): number {
  const lines = input.substring(0, position).split('\n');
  return lines.length;
}

/**
 * Get column number from position in string
 */
function getColumnNumber(input: string, position: number): number {
  const lastNewline = input.lastIndexOf('\n', position - 1);
  return position - lastNewline;
}

/**
 * Serialize a LogicError for JSON output
 */
export function serializeLogicError(error: LogicError): object {
  return {
    code: error.code,
    message: error.message,
    ...(error.kind ? { kind: error.kind } : {}),
    ...(error.span ? { span: error.span } : {}),
    ...(error.suggestion ? { suggestion: error.suggestion } : {}),
    ...(error.context !== undefined ? { context: error.context } : {}),
    ...(error.details ? { details: error.details } : {}),
  };
}
