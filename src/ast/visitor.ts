import type { Formula } from '../types/index.js';

/**
 * Direct sub-formulas of a node, left to right
 */
export function children(node: Formula): Formula[] {
    switch (node.type) {
        case 'variable':
            return [];
        case 'not':
            return [node.operand];
        default:
            return [node.left, node.right];
    }
}

/**
 * Pre-order, left-to-right traversal. Uses an explicit stack so nesting depth
 * is bounded by memory rather than the call stack.
 */
export function traverse(root: Formula, visitor: (node: Formula) => void): void {
    const stack: Formula[] = [root];
    while (stack.length > 0) {
        const node = stack.pop();
        if (node === undefined) break;
        visitor(node);
        const kids = children(node);
        for (let i = kids.length - 1; i >= 0; i--) {
            stack.push(kids[i]);
        }
    }
}
