import type { Formula, ParseResult } from '../types/index.js';
import { ParseError } from '../types/errors.js';
import { Tokenizer } from './tokenizer.js';
import { Parser } from './parser.js';

export { Tokenizer } from './tokenizer.js';
export { Parser } from './parser.js';

/**
 * Parse a propositional formula string into an AST.
 * @throws ParseError when the input is not a formula
 */
export function parse(input: string): Formula {
    const tokenizer = new Tokenizer(input);
    const tokens = tokenizer.tokenize();
    const parser = new Parser(tokens, input);
    return parser.parse();
}

/**
 * Parse without throwing: parse errors are returned, anything else propagates.
 */
export function tryParse(input: string): ParseResult {
    try {
        return { ok: true, formula: parse(input) };
    } catch (e) {
        if (e instanceof ParseError) {
            return { ok: false, error: e };
        }
        throw e;
    }
}
