/**
 * Heuristic functions for A* search
 */

import { Coord, manhattanDistance } from '../domain/types.js';
import { Topology } from '../board/topology.js';

/**
 * Manhattan distance to the nearest exit, ignoring every obstacle.
 * Admissible and consistent: each turn moves the explorer at most one cell.
 * Levels without an exit score 0.
 */
export function distanceToExit(topology: Topology, position: Coord): number {
  if (topology.exits.length === 0) {
    return 0;
  }

  return Math.min(...topology.exits.map((exit) => manhattanDistance(position, exit)));
}
