/**
 * Logic Engine: entry point tying the parser to a satisfiability engine
 *
 * Satisfiability, validity by refutation, and cross-checking of verdicts.
 */

import type {
    DecideOptions,
    EngineName,
    Formula,
    SolverOptions,
    ValidityResult,
    Verdict,
    VerificationReport,
} from './types/index.js';
import { DEFAULTS } from './types/options.js';
import type { SatisfiabilityEngine } from './engines/interface.js';
import { createEngine } from './engines/registry.js';
import { TableauEngine } from './engines/tableau/index.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';
import { parse } from './parser/index.js';
import { createNot } from './utils/ast/index.js';
import { evaluate } from './utils/evaluation.js';

export class LogicEngine {
    private readonly engine: SatisfiabilityEngine;
    private readonly engineName: EngineName;
    private readonly logger: Logger;
    private readonly decideOptions: DecideOptions;

    constructor(options: SolverOptions = {}) {
        this.logger = options.logger ?? silentLogger;
        this.engineName = options.engine ?? DEFAULTS.engine;
        this.engine = createEngine(this.engineName, { logger: this.logger });
        this.decideOptions = {
            exhaustive: options.exhaustive,
            includeTrace: options.includeTrace,
        };
    }

    get name(): string {
        return this.engine.name;
    }

    /**
     * Parse and decide a formula string.
     * @throws ParseError when the input is not a formula
     */
    solve(input: string): Verdict {
        return this.checkSat(parse(input));
    }

    checkSat(formula: Formula): Verdict {
        return this.engine.decide(formula, this.decideOptions);
    }

    /**
     * A formula is valid iff its negation is unsatisfiable; a model of the
     * negation is a counter-model.
     */
    checkValidity(formula: Formula): ValidityResult {
        const negation = this.engine.decide(createNot(formula), this.decideOptions);
        if (negation.sat) {
            return { valid: false, counterModel: negation.model, negation };
        }
        return { valid: true, negation };
    }

    /**
     * Re-decide with the other engine and check the reported model.
     */
    verify(formula: Formula, verdict: Verdict): VerificationReport {
        const referenceName: EngineName = this.engineName === 'tableau' ? 'minisat' : 'tableau';
        const reference = createEngine(referenceName, { logger: this.logger }).decide(formula);
        const consistent = reference.sat === verdict.sat;
        const modelHolds = verdict.sat ? evaluate(formula, verdict.model) : undefined;

        if (!consistent) {
            this.logger.warn(`verify: ${this.engine.name} says ${verdict.sat ? 'SAT' : 'UNSAT'}, ${referenceName} disagrees`);
        }
        if (modelHolds === false) {
            this.logger.warn('verify: reported model does not satisfy the formula');
        }

        return {
            consistent,
            ...(modelHolds !== undefined ? { modelHolds } : {}),
            reference,
            referenceEngine: referenceName,
        };
    }
}

export function createLogicEngine(options?: SolverOptions): LogicEngine {
    return new LogicEngine(options);
}

/**
 * Decide a formula with the tableau engine.
 */
export function decide(formula: Formula, options?: DecideOptions): Verdict {
    return new TableauEngine().decide(formula, options);
}
