export { TableauEngine, createTableauEngine, formatSigned } from './engine.js';
export { Branch } from './branch.js';
export { expand, signed } from './rules.js';
