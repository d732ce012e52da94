/**
 * State hashing for duplicate detection during search and repetition tracking
 */

import { Coord, Pursuer, compareCoords, coordKey } from '../domain/types.js';
import { WorldState, comparePursuers } from './world-state.js';

/**
 * Create a canonical key for a world state.
 * Pursuers of the same type are interchangeable. Worlds already hold them in
 * canonical order; sorting again keeps the key independent of how the world was built.
 */
export function canonicalKey(world: WorldState): string {
  const pursuers = [...world.pursuers].sort(comparePursuers);
  const slow = world.pursuers
    .filter((p) => p.type === 'SLOW')
    .map((p) => p.position)
    .sort(compareCoords);
  const gates = [...world.openGates].sort();

  return [
    `E${coordKey(world.explorer)}`,
    `M${pursuers.map((p) => `${typeCode(p)}@${coordKey(p.position)}`).join(';')}`,
    `S${slow.map((c: Coord) => coordKey(c)).join(';')}`,
    `G${gates.join(';')}`,
  ].join('|');
}

function typeCode(p: Pursuer): string {
  switch (p.type) {
    case 'FAST_HORIZONTAL':
      return 'h';
    case 'FAST_VERTICAL':
      return 'v';
    case 'SLOW':
      return 's';
  }
}
