/**
 * Engine Module Exports
 */

export type { SatisfiabilityEngine } from './interface.js';

export {
    TableauEngine,
    createTableauEngine,
} from './tableau/index.js';

export {
    MiniSatEngine,
    createMiniSatEngine,
} from './minisat/index.js';

export {
    createEngine,
    isEngineName,
    listEngines,
} from './registry.js';
