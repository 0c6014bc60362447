/**
 * Parser Types
 */

import type { Formula } from './ast.js';
import type { ParseError } from './errors.js';

export type TokenType =
    | 'VARIABLE'      // a, p1, Rain
    | 'NOT'           // -
    | 'AND'           // ^
    | 'OR'            // |
    | 'IMPLIES'       // ->
    | 'IFF'           // <->
    | 'LPAREN'        // (
    | 'RPAREN'        // )
    | 'EOF';

export interface Token {
    type: TokenType;
    value: string;
    /** Index into the original, unstripped input */
    position: number;
}

export type ParseResult =
    | { ok: true; formula: Formula }
    | { ok: false; error: ParseError };
