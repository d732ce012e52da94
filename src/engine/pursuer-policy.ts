/**
 * Pursuer movement policy
 */

import { Coord, EdgeId, PursuerType } from '../domain/types.js';
import { Topology } from '../board/topology.js';
import { isBlockedWithGates } from '../constraints/legality.js';

type Axis = 'horizontal' | 'vertical';

// Axis tried first by each pursuer type; slow pursuers follow the horizontal rule
const AXIS_PRIORITY: Record<PursuerType, readonly [Axis, Axis]> = {
  FAST_HORIZONTAL: ['horizontal', 'vertical'],
  FAST_VERTICAL: ['vertical', 'horizontal'],
  SLOW: ['horizontal', 'vertical'],
};

/**
 * Choose a single step from `from` toward `target`, or null to stay.
 * Pure: reads the gate set, never changes it.
 */
export function choosePursuerStep(
  topology: Topology,
  openGates: readonly EdgeId[],
  type: PursuerType,
  from: Coord,
  target: Coord
): Coord | null {
  for (const axis of AXIS_PRIORITY[type]) {
    const next = stepAlong(axis, from, target);
    if (next !== null && !isBlockedWithGates(topology, openGates, from, next)) {
      return next;
    }
  }

  return null;
}

function stepAlong(axis: Axis, from: Coord, target: Coord): Coord | null {
  if (axis === 'horizontal') {
    const dc = Math.sign(target.col - from.col);
    return dc === 0 ? null : { row: from.row, col: from.col + dc };
  }

  const dr = Math.sign(target.row - from.row);
  return dr === 0 ? null : { row: from.row + dr, col: from.col };
}
