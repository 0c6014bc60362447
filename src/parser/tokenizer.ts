import type { Token, TokenType } from '../types/parser.js';
import { createParseError } from '../types/errors.js';

const LETTER = /[A-Za-z]/;
const ALPHANUMERIC = /[A-Za-z0-9]/;

/**
 * Tokenizer for propositional formulas.
 *
 * Whitespace is discarded before classification, so `a b` lexes as the single
 * variable `ab`. Token positions still refer to the original input.
 */
export class Tokenizer {
    // Keep original input for error reporting
    private originalInput: string;
    private chars: string[] = [];
    private offsets: number[] = [];
    private pos: number = 0;
    private tokens: Token[] = [];

    constructor(input: string) {
        this.originalInput = input;
        for (let i = 0; i < input.length; i++) {
            if (!/\s/.test(input[i])) {
                this.chars.push(input[i]);
                this.offsets.push(i);
            }
        }
    }

    tokenize(): Token[] {
        while (this.pos < this.chars.length) {
            const char = this.chars[this.pos];

            // Multi-character operators, longest first
            if (this.match('<->')) {
                this.addToken('IFF', '<->');
                continue;
            }
            if (this.match('->')) {
                this.addToken('IMPLIES', '->');
                continue;
            }

            switch (char) {
                case '(': this.addToken('LPAREN', '('); this.pos++; continue;
                case ')': this.addToken('RPAREN', ')'); this.pos++; continue;
                case '^': this.addToken('AND', '^'); this.pos++; continue;
                case '|': this.addToken('OR', '|'); this.pos++; continue;
                case '-': this.addToken('NOT', '-'); this.pos++; continue;
                case '<':
                case '>':
                    throw createParseError(
                        'UnknownOperator',
                        `Unknown operator starting with '${char}'`,
                        this.originalInput,
                        this.offset(this.pos)
                    );
            }

            if (LETTER.test(char)) {
                const start = this.pos;
                while (this.pos < this.chars.length && ALPHANUMERIC.test(this.chars[this.pos])) {
                    this.pos++;
                }
                const value = this.chars.slice(start, this.pos).join('');
                this.tokens.push({ type: 'VARIABLE', value, position: this.offset(start) });
                continue;
            }

            throw createParseError(
                'UnexpectedCharacter',
                `Unexpected character '${char}'`,
                this.originalInput,
                this.offset(this.pos)
            );
        }

        this.tokens.push({ type: 'EOF', value: '', position: this.originalInput.length });
        return this.tokens;
    }

    private offset(index: number): number {
        return this.offsets[index];
    }

    private match(str: string): boolean {
        if (this.chars.slice(this.pos, this.pos + str.length).join('') === str) {
            this.pos += str.length;
            return true;
        }
        return false;
    }

    private addToken(type: TokenType, value: string): void {
        const start = this.pos - (type === 'IFF' || type === 'IMPLIES' ? value.length : 0);
        this.tokens.push({ type, value, position: this.offset(start) });
    }
}
