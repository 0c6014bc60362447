/**
 * Command-line driver: obtains the formula, invokes parser and engine,
 * renders the verdict.
 */

import chalk from 'chalk';
import { loadConfig } from './config.js';
import type { SolverConfig } from './config.js';
import { createLogicEngine } from './logicEngine.js';
import { createLogger } from './logger.js';
import { tryParse } from './parser/index.js';
import { LogicException, ParseError, serializeLogicError } from './types/errors.js';
import type { EngineName, Verdict, VerificationReport } from './types/index.js';
import { isEngineName, listEngines } from './engines/registry.js';
import { createNot } from './utils/ast/index.js';

export const VERSION = '1.0.0';

export const EXIT_CODES = {
    ok: 0,
    usage: 1,
    parseError: 2,
    verificationFailed: 3,
} as const;

const HELP = `
Propositional Tableau Solver v${VERSION}

Usage:
  prop-tableau -f "<formula>"     Decide the given formula
  echo "<formula>" | prop-tableau  Decide the formula read from stdin

Grammar:
  formula  := variable | -formula | (formula op formula)
  variable := letter followed by letters or digits
  op       := ^ (and)  | (or)  -> (implies)  <-> (iff)

Options:
  -f, --formula <text>  Formula to decide (otherwise read from stdin)
  --valid               Check validity instead of satisfiability
  --engine <name>       Decision engine (${listEngines().map(e => e.name).join(', ')})
  --exhaustive          Complete the tableau instead of stopping at the first open branch
  --verify              Cross-check the verdict with the other engine
  --trace               Print the expansion trace
  --json                Print machine-readable JSON
  --debug               Enable debug logging (or set LOG_LEVEL)
  --help, -h            Show this help
  --version, -v         Show version

Examples:
  prop-tableau -f "((a->b)^(b->a))"
  prop-tableau --valid -f "(a|-a)"
`;

export interface CliIO {
    stdout: (line: string) => void;
    stderr: (line: string) => void;
    readStdin: () => Promise<string>;
    env: Record<string, string | undefined>;
    /** Colourize output */
    color?: boolean;
}

export interface CliArgs {
    formula?: string;
    engine?: EngineName;
    valid: boolean;
    exhaustive: boolean;
    verify: boolean;
    trace: boolean;
    json: boolean;
    debug: boolean;
    help: boolean;
    version: boolean;
}

/**
 * @throws LogicException (INVALID_ARGUMENT) on unknown flags or missing values
 */
export function parseArgs(argv: string[]): CliArgs {
    const args: CliArgs = {
        valid: false,
        exhaustive: false,
        verify: false,
        trace: false,
        json: false,
        debug: false,
        help: false,
        version: false,
    };

    const valueOf = (flag: string, i: number): string => {
        if (i + 1 >= argv.length) {
            throw new LogicException({ code: 'INVALID_ARGUMENT', message: `Missing value for ${flag}` });
        }
        return argv[i + 1];
    };

    const setEngine = (name: string): void => {
        if (!isEngineName(name)) {
            throw new LogicException({
                code: 'INVALID_ARGUMENT',
                message: `Invalid engine '${name}'. Valid options are: ${listEngines().map(e => e.name).join(', ')}`,
            });
        }
        args.engine = name;
    };

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        if (arg.startsWith('--formula=')) {
            args.formula = arg.slice('--formula='.length);
        } else if (arg === '--formula' || arg === '-f') {
            args.formula = valueOf(arg, i);
            i++;
        } else if (arg.startsWith('--engine=')) {
            setEngine(arg.slice('--engine='.length));
        } else if (arg === '--engine') {
            setEngine(valueOf(arg, i));
            i++;
        } else if (arg === '--valid') {
            args.valid = true;
        } else if (arg === '--exhaustive') {
            args.exhaustive = true;
        } else if (arg === '--verify') {
            args.verify = true;
        } else if (arg === '--trace') {
            args.trace = true;
        } else if (arg === '--json') {
            args.json = true;
        } else if (arg === '--debug') {
            args.debug = true;
        } else if (arg === '--help' || arg === '-h') {
            args.help = true;
        } else if (arg === '--version' || arg === '-v') {
            args.version = true;
        } else {
            throw new LogicException({
                code: 'INVALID_ARGUMENT',
                message: arg.startsWith('-') ? `Unknown option '${arg}'` : `Unexpected argument '${arg}' (use -f to pass a formula)`,
            });
        }
    }

    return args;
}

function modelToJSON(model: Map<string, boolean>): Record<string, boolean> {
    return Object.fromEntries(model);
}

export async function runCli(argv: string[], io: CliIO): Promise<number> {
    const paint = new chalk.Instance({ level: io.color ? 1 : 0 });

    let args: CliArgs;
    let config: SolverConfig;
    try {
        args = parseArgs(argv);
        config = loadConfig(io.env, {
            ...(args.engine ? { engine: args.engine } : {}),
            ...(args.trace ? { trace: true } : {}),
            ...(args.debug ? { logLevel: 'debug' as const } : {}),
        });
    } catch (e) {
        if (e instanceof LogicException) {
            io.stderr(`${paint.red('Error:')} ${e.message}`);
            return EXIT_CODES.usage;
        }
        throw e;
    }

    if (args.help) {
        io.stdout(HELP);
        return EXIT_CODES.ok;
    }
    if (args.version) {
        io.stdout(VERSION);
        return EXIT_CODES.ok;
    }

    const logger = createLogger({
        level: config.logLevel,
        color: io.color ?? false,
        sink: (line, ...details) => io.stderr([line, ...details.map(String)].join(' ')),
    });
    logger.debug(`engine=${config.engine} trace=${config.trace} exhaustive=${args.exhaustive}`);

    const input = args.formula ?? stripLineTerminator(await io.readStdin());
    const parsed = tryParse(input);
    if (!parsed.ok) {
        reportParseError(parsed.error, args.json, io, paint);
        return EXIT_CODES.parseError;
    }
    const formula = parsed.formula;

    const engine = createLogicEngine({
        engine: config.engine,
        logger,
        exhaustive: args.exhaustive,
        includeTrace: config.trace,
    });

    let verdict: Verdict;
    let report: VerificationReport | undefined;

    if (args.valid) {
        const result = engine.checkValidity(formula);
        verdict = result.negation;
        if (args.verify) report = engine.verify(createNot(formula), verdict);

        if (args.json) {
            io.stdout(JSON.stringify({
                engine: engine.name,
                valid: result.valid,
                ...(result.valid ? {} : { counterModel: modelToJSON(result.counterModel) }),
                statistics: verdict.statistics,
                ...(verdict.trace ? { trace: verdict.trace } : {}),
                ...(report ? { verification: verificationToJSON(report) } : {}),
            }));
        } else {
            if (result.valid) {
                io.stdout(paint.green.bold('VALID'));
            } else {
                io.stdout(paint.yellow.bold('NOT VALID'));
                io.stdout('Counter-model:');
                printModel(result.counterModel, io);
            }
            printDetails(verdict, report, io, paint);
        }
    } else {
        verdict = engine.checkSat(formula);
        if (args.verify) report = engine.verify(formula, verdict);

        if (args.json) {
            io.stdout(JSON.stringify({
                engine: engine.name,
                sat: verdict.sat,
                ...(verdict.sat ? { model: modelToJSON(verdict.model) } : {}),
                statistics: verdict.statistics,
                ...(verdict.trace ? { trace: verdict.trace } : {}),
                ...(report ? { verification: verificationToJSON(report) } : {}),
            }));
        } else {
            if (verdict.sat) {
                io.stdout(paint.green.bold('SAT'));
                printModel(verdict.model, io);
            } else {
                io.stdout(paint.red.bold('UNSAT'));
            }
            printDetails(verdict, report, io, paint);
        }
    }

    if (report && (!report.consistent || report.modelHolds === false)) {
        return EXIT_CODES.verificationFailed;
    }
    return EXIT_CODES.ok;
}

/**
 * Drop the newline that ends piped input, so positions and the caret line
 * refer to the formula as typed.
 */
function stripLineTerminator(text: string): string {
    return text.replace(/\r?\n$/, '');
}

function printModel(model: Map<string, boolean>, io: CliIO): void {
    for (const [name, value] of model) {
        io.stdout(`${name} = ${value}`);
    }
}

function printDetails(
    verdict: Verdict,
    report: VerificationReport | undefined,
    io: CliIO,
    paint: chalk.Chalk
): void {
    if (verdict.trace) {
        io.stdout('');
        io.stdout(paint.dim('Trace:'));
        for (const line of verdict.trace) {
            io.stdout(`  ${line}`);
        }
    }
    if (report) {
        io.stdout('');
        if (report.consistent && report.modelHolds !== false) {
            io.stdout(paint.green(`Verified against ${report.referenceEngine}`));
        } else if (!report.consistent) {
            io.stdout(paint.red(`Verification failed: ${report.referenceEngine} reports ${report.reference.sat ? 'SAT' : 'UNSAT'}`));
        } else {
            io.stdout(paint.red('Verification failed: model does not satisfy the formula'));
        }
    }
}

function verificationToJSON(report: VerificationReport): object {
    return {
        referenceEngine: report.referenceEngine,
        consistent: report.consistent,
        ...(report.modelHolds !== undefined ? { modelHolds: report.modelHolds } : {}),
    };
}

function reportParseError(error: ParseError, json: boolean, io: CliIO, paint: chalk.Chalk): void {
    if (json) {
        io.stdout(JSON.stringify({ error: serializeLogicError(error.error) }));
        return;
    }

    const where = error.position !== undefined ? ` at position ${error.position}` : '';
    io.stderr(`${paint.red(`Parse error (${error.kind})${where}:`)} ${error.message}`);
    const input = error.error.context ?? '';
    if (error.position !== undefined && !input.includes('\n')) {
        io.stderr(`  ${input}`);
        io.stderr(`  ${' '.repeat(error.position)}^`);
    }
    if (error.error.suggestion) {
        io.stderr(`Suggestion: ${error.error.suggestion}`);
    }
}
