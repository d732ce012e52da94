/**
 * Generate explorer actions and their consequences from a search state
 */

import { Coord, MoveAction, isDirection, moveCoord } from '../domain/types.js';
import { SOLVER_ACTIONS } from '../domain/constants.js';
import { Topology, isExit, isTrap } from '../board/topology.js';
import { isBlocked } from '../constraints/legality.js';
import { WorldState, isOccupiedByPursuer } from '../state/world-state.js';
import { simulateTurn } from '../engine/phases.js';

export type Successor =
  | { action: MoveAction; kind: 'win'; destination: Coord }
  | { action: MoveAction; kind: 'state'; destination: Coord; world: WorldState };

/**
 * Get the explorer actions worth trying: no walls, closed gates, traps or
 * pursuer-occupied cells
 */
export function generateValidActions(topology: Topology, world: WorldState): MoveAction[] {
  return SOLVER_ACTIONS.filter((action) => {
    if (!isDirection(action)) {
      return true;
    }

    const destination = moveCoord(world.explorer, action);
    return (
      !isBlocked(topology, world, world.explorer, destination) &&
      !isTrap(topology, destination) &&
      !isOccupiedByPursuer(world, destination)
    );
  });
}

/**
 * Expand a state into its surviving successors.
 * A step onto the exit wins outright; anything else runs one full turn and
 * is dropped if the explorer is captured.
 */
export function generateSuccessors(topology: Topology, world: WorldState): Successor[] {
  const successors: Successor[] = [];

  for (const action of generateValidActions(topology, world)) {
    const destination = isDirection(action) ? moveCoord(world.explorer, action) : world.explorer;

    if (isDirection(action) && isExit(topology, destination)) {
      successors.push({ action, kind: 'win', destination });
      continue;
    }

    const turn = simulateTurn(topology, world, action);
    if (turn.status === 'lost') {
      continue;
    }

    successors.push({ action, kind: 'state', destination, world: turn.world });
  }

  return successors;
}
