/**
 * Global gate toggle triggered by key tiles
 */

import { EdgeId } from '../domain/types.js';
import { Topology } from '../board/topology.js';

/**
 * Flip every gate: the new open set is all gates minus the previous open set.
 * Applying it twice restores the original set.
 */
export function toggleGates(topology: Topology, openGates: readonly EdgeId[]): EdgeId[] {
  const open = new Set(openGates);
  return topology.gateIds.filter((id) => !open.has(id));
}
