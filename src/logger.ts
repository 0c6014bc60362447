/**
 * Levelled logger writing to stderr, so stdout stays reserved for verdicts.
 */

import chalk from 'chalk';
import type { LogLevel } from './types/options.js';

export interface Logger {
    readonly level: LogLevel;
    error(message: string, ...details: unknown[]): void;
    warn(message: string, ...details: unknown[]): void;
    info(message: string, ...details: unknown[]): void;
    debug(message: string, ...details: unknown[]): void;
    trace(message: string, ...details: unknown[]): void;
    isEnabled(level: Exclude<LogLevel, 'silent'>): boolean;
}

const SEVERITY: Record<LogLevel, number> = {
    silent: 0,
    error: 1,
    warn: 2,
    info: 3,
    debug: 4,
    trace: 5,
};

function labels(paint: chalk.Chalk): Record<Exclude<LogLevel, 'silent'>, (text: string) => string> {
    return {
        error: text => paint.red.bold(text),
        warn: text => paint.yellow(text),
        info: text => paint.blue(text),
        debug: text => paint.cyan(text),
        trace: text => paint.gray(text),
    };
}

export interface LoggerOptions {
    level: LogLevel;
    /** Defaults to console.error */
    sink?: (line: string, ...details: unknown[]) => void;
    /** Colour the level labels; follows terminal support when omitted */
    color?: boolean;
}

export function createLogger(options: LoggerOptions): Logger {
    const sink = options.sink ?? ((line: string, ...details: unknown[]) => console.error(line, ...details));
    const threshold = SEVERITY[options.level];
    const paint = options.color === undefined ? chalk : new chalk.Instance({ level: options.color ? 1 : 0 });
    const label = labels(paint);

    const isEnabled = (level: Exclude<LogLevel, 'silent'>): boolean => SEVERITY[level] <= threshold;

    const write = (level: Exclude<LogLevel, 'silent'>) =>
        (message: string, ...details: unknown[]): void => {
            if (!isEnabled(level)) return;
            sink(`${label[level](level.toUpperCase().padEnd(5))} ${message}`, ...details);
        };

    return {
        level: options.level,
        error: write('error'),
        warn: write('warn'),
        info: write('info'),
        debug: write('debug'),
        trace: write('trace'),
        isEnabled,
    };
}

export const silentLogger: Logger = createLogger({ level: 'silent' });
