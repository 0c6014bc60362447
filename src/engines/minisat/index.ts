/**
 * MiniSat Engine
 *
 * Reference backend using the logic-solver package (MiniSat compiled to JS).
 * Used to cross-check tableau verdicts.
 */

import Logic from 'logic-solver';
import type { DecideOptions, EngineOptions, Formula, Verdict } from '../../types/index.js';
import type { SatisfiabilityEngine } from '../interface.js';
import type { Logger } from '../../logger.js';
import { silentLogger } from '../../logger.js';
import { collectVariables } from '../../utils/ast/index.js';

/**
 * Translate a formula to logic-solver terms.
 */
export function toLogicFormula(node: Formula): Logic.Formula {
    switch (node.type) {
        case 'variable':
            return node.name;
        case 'not':
            return Logic.not(toLogicFormula(node.operand));
        case 'and':
            return Logic.and(toLogicFormula(node.left), toLogicFormula(node.right));
        case 'or':
            return Logic.or(toLogicFormula(node.left), toLogicFormula(node.right));
        case 'implies':
            return Logic.implies(toLogicFormula(node.left), toLogicFormula(node.right));
        case 'iff':
            return Logic.equiv(toLogicFormula(node.left), toLogicFormula(node.right));
    }
}

export class MiniSatEngine implements SatisfiabilityEngine {
    readonly name = 'minisat';
    private readonly logger: Logger;

    constructor(options: EngineOptions = {}) {
        this.logger = options.logger ?? silentLogger;
    }

    decide(formula: Formula, options: DecideOptions = {}): Verdict {
        const startTime = Date.now();
        const variables = collectVariables(formula);

        if (options.exhaustive || options.includeTrace) {
            this.logger.warn('minisat: exhaustive search and traces are not supported; ignoring');
        }

        const solver = new Logic.Solver();
        solver.require(toLogicFormula(formula));
        const solution = solver.solve();

        const statistics = {
            timeMs: Date.now() - startTime,
            variables: variables.length,
        };

        if (!solution) {
            this.logger.debug('minisat: UNSAT');
            return { sat: false, statistics };
        }

        const assignment = solution.getMap();
        const model = new Map(variables.map(name => [name, assignment[name] ?? false] as const));
        this.logger.debug('minisat: SAT');
        return { sat: true, model, statistics };
    }
}

export function createMiniSatEngine(options?: EngineOptions): MiniSatEngine {
    return new MiniSatEngine(options);
}
