/**
 * Logic engine facade and engine registry tests
 */

import { LogicEngine, createLogicEngine, decide } from '../src/logicEngine.js';
import { createEngine, isEngineName, listEngines } from '../src/engines/registry.js';
import { parse } from '../src/parser/index.js';
import { LogicException, ParseError } from '../src/types/errors.js';
import type { Verdict } from '../src/types/index.js';

describe('engine registry', () => {
    test('creates engines by name', () => {
        expect(createEngine('tableau').name).toBe('tableau');
        expect(createEngine('minisat').name).toBe('minisat');
    });

    test('rejects unknown engines', () => {
        expect(() => createEngine('z3')).toThrow(LogicException);
        try {
            createEngine('z3');
        } catch (e) {
            expect(e instanceof LogicException && e.error.code).toBe('INVALID_ARGUMENT');
            expect(e instanceof LogicException && e.message).toBe("Unknown engine 'z3'. Valid options are: tableau, minisat");
        }
    });

    test('recognizes engine names', () => {
        expect(isEngineName('tableau')).toBe(true);
        expect(isEngineName('prolog')).toBe(false);
        expect(listEngines().map(e => e.name)).toEqual(['tableau', 'minisat']);
    });
});

describe('LogicEngine', () => {
    let engine: LogicEngine;

    beforeEach(() => {
        engine = createLogicEngine();
    });

    test('uses the tableau engine by default', () => {
        expect(engine.name).toBe('tableau');
        expect(createLogicEngine({ engine: 'minisat' }).name).toBe('minisat');
    });

    test('solve parses and decides', () => {
        const verdict = engine.solve('(a^b)');
        expect(verdict.sat && Object.fromEntries(verdict.model)).toEqual({ a: true, b: true });
        expect(engine.solve('(a<->-a)').sat).toBe(false);
    });

    test('solve propagates parse errors', () => {
        expect(() => engine.solve('1a')).toThrow(ParseError);
    });

    test('passes decide options to the engine', () => {
        const tracing = createLogicEngine({ includeTrace: true });
        expect(tracing.checkSat(parse('-a')).trace).toEqual(['[b0] T -a => F a', '[b0] open: a = false']);
    });

    describe('checkValidity', () => {
        test('excluded middle is valid', () => {
            const result = engine.checkValidity(parse('(a|-a)'));
            expect(result.valid).toBe(true);
            expect(result.negation.sat).toBe(false);
        });

        test('implication is not valid and has a counter-model', () => {
            const result = engine.checkValidity(parse('(a->b)'));
            expect(result.valid).toBe(false);
            if (!result.valid) {
                expect(Object.fromEntries(result.counterModel)).toEqual({ a: true, b: false });
            }
        });
    });

    describe('verify', () => {
        test('confirms a correct verdict', () => {
            const formula = parse('((a->b)^(b->a))');
            const report = engine.verify(formula, engine.checkSat(formula));
            expect(report).toMatchObject({ consistent: true, modelHolds: true, referenceEngine: 'minisat' });
            expect(report.reference.sat).toBe(true);
        });

        test('omits modelHolds for unsatisfiable verdicts', () => {
            const formula = parse('(a^-a)');
            const report = engine.verify(formula, engine.checkSat(formula));
            expect(report.consistent).toBe(true);
            expect(report.modelHolds).toBeUndefined();
        });

        test('flags a wrong verdict', () => {
            const formula = parse('(a^-a)');
            const wrong: Verdict = { sat: true, model: new Map([['a', true]]), statistics: { timeMs: 0 } };
            const report = engine.verify(formula, wrong);
            expect(report.consistent).toBe(false);
            expect(report.modelHolds).toBe(false);
        });

        test('uses the tableau as reference for MiniSat', () => {
            const minisat = createLogicEngine({ engine: 'minisat' });
            const formula = parse('(a|b)');
            expect(minisat.verify(formula, minisat.checkSat(formula)).referenceEngine).toBe('tableau');
        });
    });

    test('decide runs the tableau directly', () => {
        expect(decide(parse('(a^b)')).sat).toBe(true);
        expect(decide(parse('(a<->-a)')).sat).toBe(false);
    });
});
