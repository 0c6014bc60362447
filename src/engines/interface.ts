/**
 * Satisfiability Engine Interface
 *
 * Abstract interface for pluggable decision backends.
 * All engine implementations (tableau, MiniSat) implement this interface.
 */

import type { DecideOptions, Formula, Verdict } from '../types/index.js';

/**
 * Abstract satisfiability engine interface.
 */
export interface SatisfiabilityEngine {
    /** Unique name of the engine */
    readonly name: string;

    /**
     * Decide whether some assignment makes the formula true.
     * Total: every well-formed formula yields a verdict.
     */
    decide(formula: Formula, options?: DecideOptions): Verdict;
}
