/**
 * Formula Evaluation Utilities
 *
 * Ordinary propositional semantics, used to check models and in truth tables.
 */

import type { Formula } from '../types/index.js';

/**
 * Evaluate a formula under an assignment. Variables missing from the
 * assignment are false.
 */
export function evaluate(
    node: Formula,
    assignment: ReadonlyMap<string, boolean>
): boolean {
    switch (node.type) {
        case 'variable':
            return assignment.get(node.name) ?? false;

        case 'not':
            return !evaluate(node.operand, assignment);

        case 'and':
            return evaluate(node.left, assignment) &&
                evaluate(node.right, assignment);

        case 'or':
            return evaluate(node.left, assignment) ||
                evaluate(node.right, assignment);

        case 'implies':
            return !evaluate(node.left, assignment) ||
                evaluate(node.right, assignment);

        case 'iff':
            return evaluate(node.left, assignment) ===
                evaluate(node.right, assignment);
    }
}
