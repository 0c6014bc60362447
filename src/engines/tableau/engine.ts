/**
 * Tableau Engine
 *
 * Decides satisfiability by signed semantic tableaux: assume the formula true,
 * expand until every branch closes (unsatisfiable) or some branch is fully
 * expanded without contradiction (its literals are a model).
 *
 * Branches are explored depth first with an explicit stack, left child before
 * right child, so deep formulas never grow the call stack.
 */

import type { DecideOptions, EngineOptions, Formula, SignedFormula, Verdict } from '../../types/index.js';
import type { SatisfiabilityEngine } from '../interface.js';
import type { Logger } from '../../logger.js';
import { silentLogger } from '../../logger.js';
import { FormulaInterner, collectVariables, formulaSize, formulaToString } from '../../utils/ast/index.js';
import { Branch } from './branch.js';
import { expand, signed } from './rules.js';

export function formatSigned(entry: SignedFormula): string {
    return `${entry.sign ? 'T' : 'F'} ${formulaToString(entry.formula)}`;
}

/**
 * State of one decision. Built per call and discarded with it.
 */
class TableauRun {
    branches = 1;
    closedBranches = 0;
    openBranches = 0;
    expansions = 0;
    readonly trace?: string[];
    private nextId = 1;
    private readonly recording: boolean;

    constructor(private readonly logger: Logger, includeTrace: boolean) {
        this.trace = includeTrace ? [] : undefined;
        this.recording = includeTrace || logger.isEnabled('trace');
    }

    note(line: () => string): void {
        if (!this.recording) return;
        const text = line();
        this.trace?.push(text);
        this.logger.trace(text);
    }

    /**
     * Apply rules to the branch until it closes, runs out of pending entries,
     * or splits. Returns the two children on a split.
     */
    develop(branch: Branch): [Branch, Branch] | undefined {
        for (let entry = branch.next(); entry !== undefined; entry = branch.next()) {
            const current = entry;
            const expansion = expand(current);

            switch (expansion.kind) {
                case 'terminal':
                    break;
                case 'linear':
                    this.expansions++;
                    branch.addAll(expansion.add);
                    this.note(() => `[b${branch.id}] ${formatSigned(current)} => ${expansion.add.map(formatSigned).join(', ')}`);
                    break;
                case 'branch': {
                    this.expansions++;
                    const left = branch.fork(this.nextId++);
                    const right = branch.fork(this.nextId++);
                    left.addAll(expansion.left);
                    right.addAll(expansion.right);
                    this.branches += 2;
                    this.note(() =>
                        `[b${branch.id}] ${formatSigned(current)} => ` +
                        `b${left.id}: ${expansion.left.map(formatSigned).join(', ')} | ` +
                        `b${right.id}: ${expansion.right.map(formatSigned).join(', ')}`
                    );
                    return [left, right];
                }
            }
        }
        return undefined;
    }
}

export class TableauEngine implements SatisfiabilityEngine {
    readonly name = 'tableau';
    private readonly logger: Logger;

    constructor(options: EngineOptions = {}) {
        this.logger = options.logger ?? silentLogger;
    }

    decide(formula: Formula, options: DecideOptions = {}): Verdict {
        const startTime = Date.now();
        const variables = collectVariables(formula);
        if (this.logger.isEnabled('debug')) {
            this.logger.debug(`tableau: ${formulaSize(formula)} nodes, ${variables.length} variables`);
        }

        const interner = new FormulaInterner();
        interner.intern(formula);

        const run = new TableauRun(this.logger, options.includeTrace ?? false);
        const root = new Branch(0, interner);
        root.add(signed(formula, true));

        const frontier: Branch[] = [root];
        let chosen: Branch | undefined;

        while (frontier.length > 0) {
            const branch = frontier.pop();
            if (branch === undefined) break;

            const split = run.develop(branch);
            if (split) {
                frontier.push(split[1], split[0]);
                continue;
            }

            const contradiction = branch.contradiction;
            if (contradiction) {
                run.closedBranches++;
                run.note(() => `[b${branch.id}] closed: ${formatSigned(contradiction)} contradicts ${formatSigned(signed(contradiction.formula, !contradiction.sign))}`);
                continue;
            }

            run.openBranches++;
            run.note(() => `[b${branch.id}] open: ${Array.from(branch.assignments, ([name, value]) => `${name} = ${value}`).join(', ')}`);
            if (chosen === undefined) chosen = branch;
            if (!options.exhaustive) break;
        }

        const statistics = {
            timeMs: Date.now() - startTime,
            branches: run.branches,
            closedBranches: run.closedBranches,
            openBranches: run.openBranches,
            expansions: run.expansions,
            variables: variables.length,
        };
        const trace = run.trace ? { trace: run.trace } : {};

        if (chosen === undefined) {
            this.logger.debug(`tableau: UNSAT after ${run.branches} branches`);
            return { sat: false, statistics, ...trace };
        }

        const assignments = chosen.assignments;
        const model = new Map(variables.map(name => [name, assignments.get(name) ?? false] as const));
        this.logger.debug(`tableau: SAT via branch b${chosen.id} after ${run.branches} branches`);
        return { sat: true, model, statistics, ...trace };
    }
}

export function createTableauEngine(options?: EngineOptions): TableauEngine {
    return new TableauEngine(options);
}
