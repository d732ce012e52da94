/**
 * Main Solver Interface
 */

import { PursuerType, Solution, SolverOptions } from '../domain/types.js';
import { Topology } from '../board/topology.js';
import { WorldState, countPursuers } from '../state/world-state.js';
import { Level, createLevel } from '../io/level-parser.js';
import { astarSolve } from './astar.js';
import { distanceToExit } from './heuristics.js';
import { generateValidActions } from './action-generator.js';

/**
 * Main Maze Solver class
 */
export class MazeSolver {
  private readonly options: Partial<SolverOptions>;

  constructor(options: Partial<SolverOptions> = {}) {
    this.options = options;
  }

  /**
   * Solve a maze from the given world; per-call options override the solver's own
   */
  solve(topology: Topology, world: WorldState, options: Partial<SolverOptions> = {}): Solution {
    return astarSolve(topology, world, { ...this.options, ...options });
  }

  solveLevel(level: Level, options: Partial<SolverOptions> = {}): Solution {
    return this.solve(level.topology, level.world, options);
  }
}

/**
 * Solve a raw level description within an expansion budget.
 * Throws MazeError('invalid_level') for malformed descriptions.
 */
export function solveLevel(description: unknown, maxExpansions?: number): Solution {
  const level = createLevel(description);
  const solver = new MazeSolver();
  return solver.solveLevel(level, maxExpansions === undefined ? {} : { maxExpansions });
}

/**
 * Analyze a level without solving
 */
export function analyzeLevel(level: Level): {
  rows: number;
  cols: number;
  gates: number;
  openGates: number;
  pursuerCounts: Record<PursuerType, number>;
  traps: number;
  keys: number;
  exitDistance: number | null;
  availableActions: string[];
  suggestions: string[];
} {
  const { topology, world } = level;

  const pursuerCounts: Record<PursuerType, number> = {
    FAST_HORIZONTAL: countPursuers(world, 'FAST_HORIZONTAL'),
    FAST_VERTICAL: countPursuers(world, 'FAST_VERTICAL'),
    SLOW: countPursuers(world, 'SLOW'),
  };

  let traps = 0;
  let keys = 0;
  for (const kind of topology.tiles.values()) {
    if (kind === 'trap') traps++;
    if (kind === 'key') keys++;
  }

  const suggestions: string[] = [];

  if (topology.exits.length === 0) {
    suggestions.push('Level has no exit; it cannot be won');
  }
  if (topology.gateIds.length > 0 && keys === 0) {
    suggestions.push('Gates can never change state: the level has no keys');
  }
  if (keys > 0 && topology.gateIds.length === 0) {
    suggestions.push('Keys have no effect: the level has no gates');
  }

  const availableActions = generateValidActions(topology, world);
  if (availableActions.length === 1) {
    suggestions.push('Explorer can only wait from the starting position');
  }

  return {
    rows: topology.rows,
    cols: topology.cols,
    gates: topology.gateIds.length,
    openGates: world.openGates.length,
    pursuerCounts,
    traps,
    keys,
    exitDistance: topology.exits.length > 0 ? distanceToExit(topology, world.explorer) : null,
    availableActions,
    suggestions,
  };
}
