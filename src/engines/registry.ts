import type { EngineName, EngineOptions } from '../types/index.js';
import { ENGINE_NAMES } from '../types/options.js';
import { createInvalidArgumentError } from '../types/errors.js';
import type { SatisfiabilityEngine } from './interface.js';
import { createTableauEngine } from './tableau/index.js';
import { createMiniSatEngine } from './minisat/index.js';

export interface EngineEntry {
    factory: (options: EngineOptions) => SatisfiabilityEngine;
    description: string;
}

const REGISTRY: Record<EngineName, EngineEntry> = {
    tableau: {
        factory: createTableauEngine,
        description: 'Signed semantic tableaux (default)',
    },
    minisat: {
        factory: createMiniSatEngine,
        description: 'MiniSat via logic-solver, used as a reference',
    },
};

export function isEngineName(name: string): name is EngineName {
    return ENGINE_NAMES.some(candidate => candidate === name);
}

export function createEngine(name: string, options: EngineOptions = {}): SatisfiabilityEngine {
    if (!isEngineName(name)) {
        throw createInvalidArgumentError(
            `Unknown engine '${name}'. Valid options are: ${ENGINE_NAMES.join(', ')}`,
            { engine: name }
        );
    }
    return REGISTRY[name].factory(options);
}

export function listEngines(): Array<{ name: EngineName; description: string }> {
    return ENGINE_NAMES.map(name => ({ name, description: REGISTRY[name].description }));
}
