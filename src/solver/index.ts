/**
 * Solver module exports
 */

export * from './search-node.js';
export * from './heuristics.js';
export * from './action-generator.js';
export * from './astar.js';
export * from './solver.js';
