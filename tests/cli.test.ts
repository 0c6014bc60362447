/**
 * CLI Tests
 */

import { EXIT_CODES, VERSION, parseArgs, runCli } from '../src/cli.js';
import type { CliIO } from '../src/cli.js';
import { LogicException } from '../src/types/errors.js';

interface Captured {
    io: CliIO;
    stdout: string[];
    stderr: string[];
}

function captureIO(stdin = '', env: Record<string, string | undefined> = {}): Captured {
    const stdout: string[] = [];
    const stderr: string[] = [];
    return {
        io: {
            stdout: line => { stdout.push(line); },
            stderr: line => { stderr.push(line); },
            readStdin: async () => stdin,
            env,
            color: false,
        },
        stdout,
        stderr,
    };
}

describe('parseArgs', () => {
    test('reads flags and values', () => {
        expect(parseArgs(['-f', '(a^b)', '--engine', 'minisat', '--valid', '--trace'])).toMatchObject({
            formula: '(a^b)',
            engine: 'minisat',
            valid: true,
            trace: true,
            json: false,
        });
        expect(parseArgs(['--formula=-a', '--engine=tableau'])).toMatchObject({ formula: '-a', engine: 'tableau' });
    });

    test('rejects unknown options and stray arguments', () => {
        expect(() => parseArgs(['--fast'])).toThrow("Unknown option '--fast'");
        expect(() => parseArgs(['(a^b)'])).toThrow("Unexpected argument '(a^b)' (use -f to pass a formula)");
        expect(() => parseArgs(['-f'])).toThrow('Missing value for -f');
        expect(() => parseArgs(['--engine', 'z3'])).toThrow(LogicException);
    });
});

describe('runCli', () => {
    test('prints a model for a satisfiable formula', async () => {
        const { io, stdout } = captureIO();
        expect(await runCli(['-f', '(a^b)'], io)).toBe(EXIT_CODES.ok);
        expect(stdout).toEqual(['SAT', 'a = true', 'b = true']);
    });

    test('prints UNSAT for an unsatisfiable formula', async () => {
        const { io, stdout } = captureIO();
        expect(await runCli(['-f', '(a<->-a)'], io)).toBe(0);
        expect(stdout).toEqual(['UNSAT']);
    });

    test('reads the formula from stdin', async () => {
        const { io, stdout } = captureIO('-a\n');
        expect(await runCli([], io)).toBe(0);
        expect(stdout).toEqual(['SAT', 'a = false']);
    });

    test('reports parse errors with a caret and suggestion', async () => {
        const { io, stdout, stderr } = captureIO();
        expect(await runCli(['-f', '(a^b'], io)).toBe(EXIT_CODES.parseError);
        expect(stdout).toEqual([]);
        expect(stderr).toEqual([
            "Parse error (UnterminatedExpression) at position 4: Expected ')' to close expression opened at position 0",
            '  (a^b',
            '      ^',
            "Suggestion: Unbalanced parentheses - missing closing ')'",
        ]);
    });

    test('reports parse errors in piped input with a caret', async () => {
        const { io, stderr } = captureIO('(a^b\n');
        expect(await runCli([], io)).toBe(EXIT_CODES.parseError);
        expect(stderr).toEqual([
            "Parse error (UnterminatedExpression) at position 4: Expected ')' to close expression opened at position 0",
            '  (a^b',
            '      ^',
            "Suggestion: Unbalanced parentheses - missing closing ')'",
        ]);
    });

    test('reports parse errors as JSON', async () => {
        const { io, stdout } = captureIO();
        expect(await runCli(['--json', '-f', '1a'], io)).toBe(2);
        const output = JSON.parse(stdout[0]);
        expect(output.error).toMatchObject({ code: 'PARSE_ERROR', kind: 'UnexpectedCharacter', span: { start: 0 } });
    });

    describe('validity', () => {
        test('excluded middle is valid', async () => {
            const { io, stdout } = captureIO();
            expect(await runCli(['--valid', '-f', '(a|-a)'], io)).toBe(0);
            expect(stdout).toEqual(['VALID']);
        });

        test('prints a counter-model', async () => {
            const { io, stdout } = captureIO();
            await runCli(['--valid', '-f', '(a->b)'], io);
            expect(stdout).toEqual(['NOT VALID', 'Counter-model:', 'a = true', 'b = false']);
        });

        test('prints JSON', async () => {
            const { io, stdout } = captureIO();
            await runCli(['--valid', '--json', '-f', '(a->b)'], io);
            const output = JSON.parse(stdout[0]);
            expect(output).toMatchObject({ engine: 'tableau', valid: false, counterModel: { a: true, b: false } });
        });
    });

    test('prints JSON verdicts', async () => {
        const { io, stdout } = captureIO();
        await runCli(['--json', '-f', '(a^b)'], io);
        expect(stdout).toHaveLength(1);
        const output = JSON.parse(stdout[0]);
        expect(output).toMatchObject({ engine: 'tableau', sat: true, model: { a: true, b: true } });
        expect(output.statistics).toMatchObject({ branches: 1, closedBranches: 0, openBranches: 1 });
        expect(output.trace).toBeUndefined();
    });

    test('prints the trace', async () => {
        const { io, stdout } = captureIO();
        await runCli(['--trace', '-f', '(a|b)'], io);
        expect(stdout).toEqual([
            'SAT',
            'a = true',
            'b = false',
            '',
            'Trace:',
            '  [b0] T (a|b) => b1: T a | b2: T b',
            '  [b1] open: a = true',
        ]);
    });

    test('verifies against the other engine', async () => {
        const { io, stdout } = captureIO();
        expect(await runCli(['--verify', '-f', '(a^b)'], io)).toBe(0);
        expect(stdout).toEqual(['SAT', 'a = true', 'b = true', '', 'Verified against minisat']);
    });

    test('selects the engine from the environment', async () => {
        const { io, stdout } = captureIO('', { TABLEAU_ENGINE: 'minisat' });
        await runCli(['--json', '-f', '(a^-b)'], io);
        expect(JSON.parse(stdout[0])).toMatchObject({ engine: 'minisat', sat: true, model: { a: true, b: false } });
    });

    test('rejects an unknown engine', async () => {
        const { io, stdout, stderr } = captureIO();
        expect(await runCli(['--engine', 'z3', '-f', 'a'], io)).toBe(EXIT_CODES.usage);
        expect(stdout).toEqual([]);
        expect(stderr).toEqual(["Error: Invalid engine 'z3'. Valid options are: tableau, minisat"]);
    });

    test('rejects invalid environment settings', async () => {
        const { io, stderr } = captureIO('', { LOG_LEVEL: 'loud' });
        expect(await runCli(['-f', 'a'], io)).toBe(1);
        expect(stderr[0]).toMatch(/^Error: Invalid configuration: logLevel: /);
    });

    test('logs settings with --debug', async () => {
        const { io, stderr } = captureIO();
        await runCli(['--debug', '-f', 'a'], io);
        expect(stderr[0]).toBe('DEBUG engine=tableau trace=false exhaustive=false');
    });

    test('prints help and version', async () => {
        const help = captureIO();
        expect(await runCli(['--help'], help.io)).toBe(0);
        expect(help.stdout[0]).toContain('Usage:');

        const version = captureIO();
        await runCli(['--version'], version.io);
        expect(version.stdout).toEqual([VERSION]);
    });
});
