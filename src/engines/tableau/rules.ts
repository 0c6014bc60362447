/**
 * Signed tableau expansion rules.
 *
 * | Signed formula  | Kind     | Effect                                |
 * | --------------- | -------- | ------------------------------------- |
 * | T -A            | linear   | F A                                   |
 * | F -A            | linear   | T A                                   |
 * | T (A^B)         | linear   | T A, T B                              |
 * | F (A^B)         | branch   | F A  /  F B                           |
 * | T (A|B)         | branch   | T A  /  T B                           |
 * | F (A|B)         | linear   | F A, F B                              |
 * | T (A->B)        | branch   | F A  /  T B                           |
 * | F (A->B)        | linear   | T A, F B                              |
 * | T (A<->B)       | branch   | T A, T B  /  F A, F B                 |
 * | F (A<->B)       | branch   | T A, F B  /  F A, T B                 |
 * | T a, F a        | terminal | literal                               |
 *
 * Rules only ever produce existing sub-formulas, never new nodes.
 */

import type { Expansion, Formula, SignedFormula } from '../../types/index.js';

export function signed(formula: Formula, sign: boolean): SignedFormula {
    return { formula, sign };
}

export function expand(entry: SignedFormula): Expansion {
    const { formula, sign } = entry;

    switch (formula.type) {
        case 'variable':
            return { kind: 'terminal' };

        case 'not':
            return { kind: 'linear', add: [signed(formula.operand, !sign)] };

        case 'and':
            return sign
                ? { kind: 'linear', add: [signed(formula.left, true), signed(formula.right, true)] }
                : { kind: 'branch', left: [signed(formula.left, false)], right: [signed(formula.right, false)] };

        case 'or':
            return sign
                ? { kind: 'branch', left: [signed(formula.left, true)], right: [signed(formula.right, true)] }
                : { kind: 'linear', add: [signed(formula.left, false), signed(formula.right, false)] };

        case 'implies':
            return sign
                ? { kind: 'branch', left: [signed(formula.left, false)], right: [signed(formula.right, true)] }
                : { kind: 'linear', add: [signed(formula.left, true), signed(formula.right, false)] };

        case 'iff':
            return sign
                ? {
                    kind: 'branch',
                    left: [signed(formula.left, true), signed(formula.right, true)],
                    right: [signed(formula.left, false), signed(formula.right, false)],
                }
                : {
                    kind: 'branch',
                    left: [signed(formula.left, true), signed(formula.right, false)],
                    right: [signed(formula.left, false), signed(formula.right, true)],
                };
    }
}
