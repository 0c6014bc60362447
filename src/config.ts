/**
 * Runtime configuration
 *
 * Read from the environment (LOG_LEVEL, TABLEAU_ENGINE, TABLEAU_TRACE) and
 * overridden by command-line flags.
 */

import { z } from 'zod';
import { DEFAULTS } from './types/options.js';
import { createInvalidArgumentError } from './types/errors.js';

const ConfigSchema = z.object({
    logLevel: z.enum(['silent', 'error', 'warn', 'info', 'debug', 'trace']).default(DEFAULTS.logLevel),
    engine: z.enum(['tableau', 'minisat']).default(DEFAULTS.engine),
    trace: z.union([z.boolean(), z.enum(['true', 'false', '1', '0'])])
        .default(DEFAULTS.trace)
        .transform(value => value === true || value === 'true' || value === '1'),
});

export type SolverConfig = z.infer<typeof ConfigSchema>;

function fromEnv(value: string | undefined): string | undefined {
    const trimmed = value?.trim().toLowerCase();
    return trimmed ? trimmed : undefined;
}

/**
 * Resolve configuration. Overrides win over the environment, which wins over defaults.
 * @throws LogicException (INVALID_ARGUMENT) naming every invalid setting
 */
export function loadConfig(
    env: Record<string, string | undefined> = process.env,
    overrides: Partial<SolverConfig> = {}
): SolverConfig {
    const result = ConfigSchema.safeParse({
        logLevel: overrides.logLevel ?? fromEnv(env.LOG_LEVEL),
        engine: overrides.engine ?? fromEnv(env.TABLEAU_ENGINE),
        trace: overrides.trace ?? fromEnv(env.TABLEAU_TRACE),
    });

    if (!result.success) {
        const problems = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
        throw createInvalidArgumentError(`Invalid configuration: ${problems.join('; ')}`, { problems });
    }
    return result.data;
}
