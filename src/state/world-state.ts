/**
 * World state representation
 *
 * A world is an immutable snapshot: every transition builds a new one, so
 * snapshots can be kept in undo history or search nodes without copying.
 */

import { Coord, EdgeId, Pursuer, PursuerType, compareCoords, coordsEqual } from '../domain/types.js';
import { PURSUER_ORDER } from '../domain/constants.js';

export interface WorldState {
  readonly explorer: Coord;
  // Canonical processing order: by type (fast-horizontal, fast-vertical, slow), then row-major position
  readonly pursuers: readonly Pursuer[];
  // Currently open gates, sorted; closed is the complement within the topology's gates
  readonly openGates: readonly EdgeId[];
}

export interface WorldInput {
  explorer: Coord;
  pursuers: { type: PursuerType; position: Coord }[];
  openGates: EdgeId[];
}

/**
 * Create a world with pursuers in canonical order
 */
export function createWorld(input: WorldInput): WorldState {
  return Object.freeze({
    explorer: freezeCoord(input.explorer),
    pursuers: canonicalPursuers(input.pursuers),
    openGates: Object.freeze([...new Set(input.openGates)].sort()),
  });
}

/**
 * Build a new world with some fields replaced
 */
export function updateWorld(
  world: WorldState,
  changes: Partial<{ explorer: Coord; pursuers: readonly Pursuer[]; openGates: readonly EdgeId[] }>
): WorldState {
  return Object.freeze({
    explorer: changes.explorer ? freezeCoord(changes.explorer) : world.explorer,
    pursuers: changes.pursuers ? canonicalPursuers(changes.pursuers) : world.pursuers,
    openGates: changes.openGates ? Object.freeze([...changes.openGates]) : world.openGates,
  });
}

/**
 * Get the first pursuer standing on a cell, if any
 */
export function pursuerAt(world: WorldState, c: Coord): Pursuer | null {
  return world.pursuers.find((p) => coordsEqual(p.position, c)) ?? null;
}

export function isOccupiedByPursuer(world: WorldState, c: Coord): boolean {
  return pursuerAt(world, c) !== null;
}

export function countPursuers(world: WorldState, type: PursuerType): number {
  let count = 0;
  for (const p of world.pursuers) {
    if (p.type === type) count++;
  }
  return count;
}

export function worldsEqual(a: WorldState, b: WorldState): boolean {
  if (!coordsEqual(a.explorer, b.explorer)) return false;
  if (a.pursuers.length !== b.pursuers.length) return false;
  if (a.openGates.length !== b.openGates.length) return false;

  for (let i = 0; i < a.pursuers.length; i++) {
    if (a.pursuers[i].type !== b.pursuers[i].type) return false;
    if (!coordsEqual(a.pursuers[i].position, b.pursuers[i].position)) return false;
  }

  return a.openGates.every((id, i) => id === b.openGates[i]);
}

/**
 * Order pursuers by type, then by position. Processing follows this order,
 * so two worlds with the same canonical key always evolve the same way.
 */
export function comparePursuers(a: Pursuer, b: Pursuer): number {
  return PURSUER_ORDER.indexOf(a.type) - PURSUER_ORDER.indexOf(b.type) || compareCoords(a.position, b.position);
}

function canonicalPursuers(pursuers: readonly Pursuer[]): readonly Pursuer[] {
  return Object.freeze(
    [...pursuers]
      .sort(comparePursuers)
      .map((p) => Object.freeze({ type: p.type, position: freezeCoord(p.position) }))
  );
}

function freezeCoord(c: Coord): Coord {
  return Object.freeze({ row: c.row, col: c.col });
}
