import type { Logger } from '../logger.js';

export type EngineName = 'tableau' | 'minisat';

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

export interface DecideOptions {
    /** Complete the tableau instead of stopping at the first open leaf */
    exhaustive?: boolean;
    /** Record one line per rule application, split, closure and open leaf */
    includeTrace?: boolean;
}

export interface EngineOptions {
    logger?: Logger;
}

export interface SolverOptions extends DecideOptions {
    engine?: EngineName;
    logger?: Logger;
}

export const ENGINE_NAMES: readonly EngineName[] = ['tableau', 'minisat'];

export const LOG_LEVELS: readonly LogLevel[] = ['silent', 'error', 'warn', 'info', 'debug', 'trace'];

export const DEFAULTS = {
    engine: 'tableau',
    logLevel: 'warn',
    trace: false,
} as const;
