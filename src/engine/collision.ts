/**
 * Collision resolution between pursuers within one sub-step
 *
 * Moves are applied one at a time in canonical pursuer order against the
 * live occupancy, so a cell claimed earlier in the sub-step is visible to
 * later movers. A mover always survives and removes whoever it lands on.
 */

import { Coord, Pursuer, PursuerType, coordsEqual } from '../domain/types.js';

export interface PursuerSlot {
  type: PursuerType;
  position: Coord;
  alive: boolean;
}

export interface Collision {
  winner: PursuerType;
  loser: PursuerType;
  at: Coord;
}

export function createSlots(pursuers: readonly Pursuer[]): PursuerSlot[] {
  return pursuers.map((p) => ({ type: p.type, position: p.position, alive: true }));
}

/**
 * Move a pursuer onto a cell, removing any live pursuer already there
 */
export function claimCell(slots: PursuerSlot[], moverIndex: number, to: Coord): Collision[] {
  const mover = slots[moverIndex];
  const collisions: Collision[] = [];

  slots.forEach((slot, index) => {
    if (index !== moverIndex && slot.alive && coordsEqual(slot.position, to)) {
      slot.alive = false;
      collisions.push({ winner: mover.type, loser: slot.type, at: to });
    }
  });

  mover.position = to;
  return collisions;
}

export function survivors(slots: readonly PursuerSlot[]): Pursuer[] {
  return slots
    .filter((slot) => slot.alive)
    .map((slot) => ({ type: slot.type, position: slot.position }));
}
