import type { Formula } from '../../types/index.js';
import { createEngineError } from '../../types/errors.js';
import { children } from '../../ast/visitor.js';

/**
 * Hash-consing table giving every formula node a structural identity.
 *
 * Two nodes receive the same id iff they have the same tag, the same variable
 * name, and children with the same ids, so ids compare formulas structurally
 * however the nodes were constructed.
 */
export class FormulaInterner {
    private ids = new WeakMap<Formula, number>();
    private table = new Map<string, number>();

    /**
     * Intern a formula and all of its sub-formulas, returning the root's id.
     */
    intern(root: Formula): number {
        const known = this.ids.get(root);
        if (known !== undefined) return known;

        // Post-order without recursion: a frame is revisited once its children have ids
        const stack: Array<{ node: Formula; visited: boolean }> = [{ node: root, visited: false }];
        while (stack.length > 0) {
            const frame = stack[stack.length - 1];
            if (this.ids.has(frame.node)) {
                stack.pop();
                continue;
            }
            if (!frame.visited) {
                frame.visited = true;
                for (const child of children(frame.node)) {
                    if (!this.ids.has(child)) {
                        stack.push({ node: child, visited: false });
                    }
                }
                continue;
            }
            stack.pop();
            this.ids.set(frame.node, this.assign(this.signature(frame.node)));
        }

        return this.idOf(root);
    }

    /**
     * Id of a node that has already been interned (directly or as a sub-formula).
     */
    idOf(node: Formula): number {
        const id = this.ids.get(node);
        if (id === undefined) {
            throw createEngineError('formula node was not interned');
        }
        return id;
    }

    /** Number of distinct structures seen */
    get size(): number {
        return this.table.size;
    }

    private signature(node: Formula): string {
        switch (node.type) {
            case 'variable':
                return `v:${node.name}`;
            case 'not':
                return `not:${this.idOf(node.operand)}`;
            default:
                return `${node.type}:${this.idOf(node.left)}:${this.idOf(node.right)}`;
        }
    }

    private assign(signature: string): number {
        let id = this.table.get(signature);
        if (id === undefined) {
            id = this.table.size;
            this.table.set(signature, id);
        }
        return id;
    }
}

/**
 * Structural equality of two formulas
 */
export function formulasEqual(a: Formula, b: Formula): boolean {
    const interner = new FormulaInterner();
    return interner.intern(a) === interner.intern(b);
}
