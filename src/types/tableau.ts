/**
 * Tableau and verdict types
 */

import type { Formula } from './ast.js';

/**
 * A formula asserted true (`sign: true`) or false on a branch.
 */
export interface SignedFormula {
    readonly formula: Formula;
    readonly sign: boolean;
}

/**
 * Result of applying one expansion rule to a signed formula.
 */
export type Expansion =
    | { kind: 'linear'; add: SignedFormula[] }
    | { kind: 'branch'; left: SignedFormula[]; right: SignedFormula[] }
    | { kind: 'terminal' };

export interface EngineStatistics {
    timeMs: number;
    /** Branches created, the root included */
    branches?: number;
    closedBranches?: number;
    openBranches?: number;
    /** Rule applications */
    expansions?: number;
    variables?: number;
}

export type Verdict =
    | {
        sat: true;
        /** Total assignment over the formula's variables, in order of first appearance */
        model: Map<string, boolean>;
        statistics: EngineStatistics;
        trace?: string[];
    }
    | {
        sat: false;
        statistics: EngineStatistics;
        trace?: string[];
    };

/**
 * Validity by refutation: `negation` is the verdict on the negated formula.
 */
export type ValidityResult =
    | { valid: true; negation: Verdict }
    | { valid: false; counterModel: Map<string, boolean>; negation: Verdict };

export interface VerificationReport {
    /** Both engines agree on satisfiability */
    consistent: boolean;
    /** Whether the reported model evaluates the formula to true (sat verdicts only) */
    modelHolds?: boolean;
    reference: Verdict;
    referenceEngine: string;
}
