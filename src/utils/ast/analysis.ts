import type { Formula } from '../../types/index.js';
import { traverse } from '../../ast/visitor.js';

/**
 * Variable names in order of first (left-most) appearance
 */
export function collectVariables(formula: Formula): string[] {
    const seen = new Set<string>();
    traverse(formula, node => {
        if (node.type === 'variable') {
            seen.add(node.name);
        }
    });
    return Array.from(seen);
}

/**
 * Number of nodes in the formula tree
 */
export function formulaSize(formula: Formula): number {
    let size = 0;
    traverse(formula, () => {
        size++;
    });
    return size;
}
