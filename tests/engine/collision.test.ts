/**
 * Tests for pursuer collisions
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { claimCell, createSlots, survivors } from '../../src/engine/collision.js';
import { PURSUER_ORDER } from '../../src/domain/constants.js';

describe('Collision resolution', () => {
  for (const mover of PURSUER_ORDER) {
    for (const resident of PURSUER_ORDER) {
      it(`should let a moving ${mover} remove a ${resident}`, () => {
        const slots = createSlots([
          { type: mover, position: { row: 0, col: 0 } },
          { type: resident, position: { row: 0, col: 1 } },
        ]);

        const collisions = claimCell(slots, 0, { row: 0, col: 1 });

        assert.deepStrictEqual(collisions, [{ winner: mover, loser: resident, at: { row: 0, col: 1 } }]);
        assert.deepStrictEqual(survivors(slots), [{ type: mover, position: { row: 0, col: 1 } }]);
      });
    }
  }

  it('should not collide with pursuers already removed', () => {
    const slots = createSlots([
      { type: 'FAST_HORIZONTAL', position: { row: 0, col: 0 } },
      { type: 'FAST_VERTICAL', position: { row: 0, col: 1 } },
    ]);
    slots[1].alive = false;

    assert.deepStrictEqual(claimCell(slots, 0, { row: 0, col: 1 }), []);
    assert.strictEqual(survivors(slots).length, 1);
  });

  it('should move without collisions onto an empty cell', () => {
    const slots = createSlots([{ type: 'SLOW', position: { row: 1, col: 1 } }]);

    assert.deepStrictEqual(claimCell(slots, 0, { row: 1, col: 2 }), []);
    assert.deepStrictEqual(survivors(slots), [{ type: 'SLOW', position: { row: 1, col: 2 } }]);
  });
});
