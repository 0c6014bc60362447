/**
 * Shared test fixtures: named formulas and a seeded random formula generator.
 */
import type { BinaryConnective, Formula } from '../src/types/index.js';
import { createBinary, createNot, createVariable } from '../src/utils/ast/index.js';

// === Common Formulas ===
export const FORMULAS = {
    conjunction: { input: '(a^b)', sat: true },
    negatedVariable: { input: '-a', sat: true },
    biconditionalPair: { input: '((a->b)^(b->a))', sat: true },
    selfNegatingIff: { input: '(a<->-a)', sat: false },
    contradiction: { input: '(a^-a)', sat: false },
    excludedMiddle: { input: '(a|-a)', sat: true },
    doubleNegation: { input: '--a', sat: true },
    compoundContradiction: { input: '((a^b)^-(a^b))', sat: false },
    modusPonensFailure: { input: '((a^(a->b))^-b)', sat: false },
    resolutionUnsat: { input: '(((a|b)^(-a|b))^((a|-b)^(-a|-b)))', sat: false },
    longVariableNames: { input: '(Rain1->-Sun2)', sat: true },
} as const;

/**
 * Deterministic PRNG (mulberry32) so generated cases are reproducible.
 */
export function createRandom(seed: number): () => number {
    let state = seed >>> 0;
    return () => {
        state = (state + 0x6D2B79F5) >>> 0;
        let r = Math.imul(state ^ (state >>> 15), 1 | state);
        r ^= r + Math.imul(r ^ (r >>> 7), 61 | r);
        return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
    };
}

const CONNECTIVES: BinaryConnective[] = ['and', 'or', 'implies', 'iff'];

export function randomFormula(random: () => number, depth: number, variables: string[]): Formula {
    const pick = <T>(items: T[]): T => items[Math.floor(random() * items.length)];

    if (depth <= 0 || random() < 0.2) {
        return createVariable(pick(variables));
    }
    if (random() < 0.25) {
        return createNot(randomFormula(random, depth - 1, variables));
    }
    return createBinary(
        pick(CONNECTIVES),
        randomFormula(random, depth - 1, variables),
        randomFormula(random, depth - 1, variables)
    );
}

export function randomFormulas(seed: number, count: number, depth: number, variables: string[]): Formula[] {
    const random = createRandom(seed);
    return Array.from({ length: count }, () => randomFormula(random, depth, variables));
}
