import type { BinaryConnective, Formula } from '../types/index.js';
import type { Token, TokenType } from '../types/parser.js';
import { createParseError } from '../types/errors.js';

const BINARY_OPERATORS: Partial<Record<TokenType, BinaryConnective>> = {
    AND: 'and',
    OR: 'or',
    IMPLIES: 'implies',
    IFF: 'iff',
};

/**
 * An open parenthesis awaiting its operator, right operand and ')'
 */
interface Frame {
    open: Token;
    /** '-' signs read before the '(' */
    negations: number;
    lhs?: { left: Formula; connective: BinaryConnective };
}

/**
 * Parser for propositional formulas
 *
 * Grammar (whitespace already removed by the tokenizer):
 *   formula  = variable | '-' formula | '(' formula binop formula ')'
 *   variable = [A-Za-z][A-Za-z0-9]*
 *   binop    = '^' | '|' | '->' | '<->'
 *
 * Every binary connective must be parenthesized, so there is no precedence.
 */
export class Parser {
    private tokens: Token[];
    private originalInput: string;
    private pos: number = 0;

    constructor(tokens: Token[], originalInput: string) {
        this.tokens = tokens;
        this.originalInput = originalInput;
    }

    parse(): Formula {
        if (this.current().type === 'EOF') {
            throw createParseError(
                'UnexpectedEndOfInput',
                'Empty formula',
                this.originalInput,
                this.current().position
            );
        }

        const result = this.parseFormula();
        if (this.current().type !== 'EOF') {
            throw createParseError(
                'TrailingInput',
                `Unexpected input '${this.current().value}' after complete formula`,
                this.originalInput,
                this.current().position
            );
        }
        return result;
    }

    private current(): Token {
        return this.tokens[this.pos] ?? { type: 'EOF', value: '', position: this.originalInput.length };
    }

    private advance(): Token {
        const token = this.current();
        this.pos++;
        return token;
    }

    /**
     * Read one formula. Open parentheses are kept on an explicit stack of
     * frames, so nesting depth is bounded by memory rather than the call stack.
     */
    private parseFormula(): Formula {
        const frames: Frame[] = [];
        let negations = this.readNegations();

        for (;;) {
            const token = this.current();
            if (token.type === 'LPAREN') {
                this.advance();
                frames.push({ open: token, negations });
                negations = this.readNegations();
                continue;
            }

            let formula = negate(this.parseVariable(token), negations);

            // Fold completed operands into their enclosing frames
            for (;;) {
                const frame = frames[frames.length - 1];
                if (frame === undefined) {
                    return formula;
                }
                if (frame.lhs === undefined) {
                    frame.lhs = { left: formula, connective: this.readConnective(frame.open) };
                    break;
                }
                this.expectClose(frame.open);
                frames.pop();
                formula = negate({ type: frame.lhs.connective, left: frame.lhs.left, right: formula }, frame.negations);
            }

            negations = this.readNegations();
        }
    }

    private readNegations(): number {
        let count = 0;
        while (this.current().type === 'NOT') {
            this.advance();
            count++;
        }
        return count;
    }

    private parseVariable(token: Token): Formula {
        switch (token.type) {
            case 'VARIABLE':
                this.advance();
                return { type: 'variable', name: token.value };
            case 'EOF':
                throw createParseError(
                    'UnexpectedEndOfInput',
                    'Expected a formula but reached end of input',
                    this.originalInput,
                    token.position
                );
            default:
                throw createParseError(
                    'EmptyVariableName',
                    `Expected a formula but found '${token.value}'`,
                    this.originalInput,
                    token.position
                );
        }
    }

    private readConnective(open: Token): BinaryConnective {
        const operatorToken = this.current();
        if (operatorToken.type === 'EOF') {
            throw createParseError(
                'UnterminatedExpression',
                `Expression opened at position ${open.position} is missing its operator`,
                this.originalInput,
                operatorToken.position
            );
        }
        const connective = BINARY_OPERATORS[operatorToken.type];
        if (connective === undefined) {
            throw createParseError(
                'UnknownOperator',
                `Expected one of '^', '|', '->', '<->' but found '${operatorToken.value}'`,
                this.originalInput,
                operatorToken.position
            );
        }
        this.advance();
        return connective;
    }

    private expectClose(open: Token): void {
        const close = this.current();
        if (close.type !== 'RPAREN') {
            throw createParseError(
                'UnterminatedExpression',
                `Expected ')' to close expression opened at position ${open.position}`,
                this.originalInput,
                close.position
            );
        }
        this.advance();
    }
}

function negate(formula: Formula, count: number): Formula {
    let result = formula;
    for (let i = 0; i < count; i++) {
        result = { type: 'not', operand: result };
    }
    return result;
}
