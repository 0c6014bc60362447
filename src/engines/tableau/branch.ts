import type { SignedFormula } from '../../types/index.js';
import type { FormulaInterner } from '../../utils/ast/index.js';

/**
 * One root-to-frontier path of the tableau.
 *
 * Holds the signed formulas asserted so far (keyed by structural id), the
 * literals read off them, and a FIFO worklist of compound entries still to be
 * expanded. Contradictions are detected as entries are added; once closed the
 * branch ignores further additions.
 */
export class Branch {
    readonly id: number;
    private readonly interner: FormulaInterner;
    private readonly signs: Map<number, boolean>;
    private readonly literals: Map<string, boolean>;
    private readonly pending: SignedFormula[];
    private head = 0;
    private closedBy?: SignedFormula;

    constructor(
        id: number,
        interner: FormulaInterner,
        state?: { signs: Map<number, boolean>; literals: Map<string, boolean>; pending: SignedFormula[] }
    ) {
        this.id = id;
        this.interner = interner;
        this.signs = state?.signs ?? new Map();
        this.literals = state?.literals ?? new Map();
        this.pending = state?.pending ?? [];
    }

    get closed(): boolean {
        return this.closedBy !== undefined;
    }

    /** The entry whose opposite was already on the branch */
    get contradiction(): SignedFormula | undefined {
        return this.closedBy;
    }

    /** Literal assignments, in the order they were asserted */
    get assignments(): ReadonlyMap<string, boolean> {
        return this.literals;
    }

    get pendingCount(): number {
        return this.pending.length - this.head;
    }

    add(entry: SignedFormula): void {
        if (this.closed) return;

        const id = this.interner.idOf(entry.formula);
        const existing = this.signs.get(id);
        if (existing === entry.sign) return;
        if (existing !== undefined) {
            this.closedBy = entry;
            return;
        }

        this.signs.set(id, entry.sign);
        if (entry.formula.type === 'variable') {
            this.literals.set(entry.formula.name, entry.sign);
        } else {
            this.pending.push(entry);
        }
    }

    addAll(entries: SignedFormula[]): void {
        for (const entry of entries) {
            this.add(entry);
        }
    }

    /**
     * Take the earliest-inserted entry not yet expanded.
     */
    next(): SignedFormula | undefined {
        if (this.closed || this.head >= this.pending.length) return undefined;
        return this.pending[this.head++];
    }

    /**
     * Copy the accumulated state into an independent branch.
     */
    fork(id: number): Branch {
        return new Branch(id, this.interner, {
            signs: new Map(this.signs),
            literals: new Map(this.literals),
            pending: this.pending.slice(this.head),
        });
    }
}
