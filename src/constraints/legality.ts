/**
 * Movement legality between adjacent cells
 */

import { Coord, EdgeId } from '../domain/types.js';
import { Topology, edgeBetween, edgeId, inBounds, isGateEdge, isWallEdge } from '../board/topology.js';
import { WorldState } from '../state/world-state.js';

/**
 * Check if moving between two cells is currently blocked.
 * Only the four orthogonal neighbours are ever reachable.
 */
export function isBlocked(topology: Topology, world: WorldState, from: Coord, to: Coord): boolean {
  return isBlockedWithGates(topology, world.openGates, from, to);
}

/**
 * Same as isBlocked, against an explicit open-gate set.
 * Pursuer phases use this while gates change mid-phase.
 */
export function isBlockedWithGates(
  topology: Topology,
  openGates: readonly EdgeId[],
  from: Coord,
  to: Coord
): boolean {
  if (!inBounds(topology, to)) {
    return true;
  }

  const edge = edgeBetween(from, to);
  if (edge === null) {
    return true;
  }

  if (isWallEdge(topology, edge)) {
    return true;
  }

  return isGateEdge(topology, edge) && !openGates.includes(edgeId(edge));
}
