import type { BinaryConnective, Formula } from '../../types/index.js';

export const CONNECTIVE_SYMBOLS: Record<BinaryConnective, string> = {
    and: '^',
    or: '|',
    implies: '->',
    iff: '<->',
};

/**
 * Print a formula in the canonical, fully parenthesized input syntax.
 * `parse(formulaToString(f))` is structurally equal to `f`.
 */
export function formulaToString(node: Formula): string {
    switch (node.type) {
        case 'variable':
            return node.name;
        case 'not':
            return `-${formulaToString(node.operand)}`;
        default:
            return `(${formulaToString(node.left)}${CONNECTIVE_SYMBOLS[node.type]}${formulaToString(node.right)})`;
    }
}
