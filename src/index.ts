/**
 * Gate Maze
 *
 * Turn-based grid maze with walls, toggleable gates, keys, traps and
 * pursuers, plus an A* solver for shortest winning plans.
 */

// Domain exports
export * from './domain/types.js';
export * from './domain/constants.js';
export * from './domain/errors.js';

// Board and state exports
export * from './board/topology.js';
export * from './state/world-state.js';
export * from './state/state-hash.js';
export * from './constraints/legality.js';

// Engine exports
export * from './engine/gates.js';
export * from './engine/pursuer-policy.js';
export * from './engine/collision.js';
export * from './engine/phases.js';
export * from './engine/game.js';

// Session exports
export * from './session/session-store.js';

// Solver exports
export * from './solver/index.js';

// I/O exports
export * from './io/level-parser.js';
export * from './io/board-text.js';
export * from './io/solution-formatter.js';
