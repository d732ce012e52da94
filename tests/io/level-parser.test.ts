/**
 * Tests for level description parsing
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { createLevel, exportLevel, parseLevelFromJSON } from '../../src/io/level-parser.js';
import { isMazeError } from '../../src/domain/errors.js';
import { canonicalKey } from '../../src/state/state-hash.js';

function isInvalidLevel(err: unknown): boolean {
  return isMazeError(err) && err.code === 'invalid_level';
}

describe('Level parser', () => {
  it('should build a minimal level', () => {
    const level = createLevel({ rows: 1, cols: 2, explorer: { row: 0, col: 0 }, exit: { row: 0, col: 1 } });

    assert.strictEqual(level.topology.rows, 1);
    assert.strictEqual(level.topology.cols, 2);
    assert.deepStrictEqual(level.topology.exits, [{ row: 0, col: 1 }]);
    assert.deepStrictEqual(level.world.explorer, { row: 0, col: 0 });
    assert.deepStrictEqual(level.world.openGates, []);
  });

  it('should read initially open gates', () => {
    const level = createLevel({
      rows: 1,
      cols: 2,
      gates: { vertical: [[false, true, false]] },
      openGates: { vertical: [[false, true, false]] },
      explorer: { row: 0, col: 0 },
    });

    assert.deepStrictEqual(level.topology.gateIds, ['v0,1']);
    assert.deepStrictEqual(level.world.openGates, ['v0,1']);
  });

  it('should place pursuers by type', () => {
    const level = createLevel({
      rows: 2,
      cols: 2,
      explorer: { row: 0, col: 0 },
      pursuers: { slow: [{ row: 1, col: 1 }], horizontal: [{ row: 1, col: 0 }] },
    });

    assert.deepStrictEqual(level.world.pursuers, [
      { type: 'FAST_HORIZONTAL', position: { row: 1, col: 0 } },
      { type: 'SLOW', position: { row: 1, col: 1 } },
    ]);
  });

  it('should reject schema violations', () => {
    assert.throws(() => createLevel({ rows: 0, cols: 2, explorer: { row: 0, col: 0 } }), isInvalidLevel);
    assert.throws(() => createLevel({ rows: 1, cols: 2 }), isInvalidLevel);
    assert.throws(() => createLevel({ rows: 1, cols: 2, explorer: { row: 0, col: 0 }, lava: [] }), isInvalidLevel);
    assert.throws(() => createLevel('not a level'), isInvalidLevel);
  });

  it('should reject malformed matrices', () => {
    assert.throws(
      () => createLevel({ rows: 1, cols: 2, walls: { vertical: [[false]] }, explorer: { row: 0, col: 0 } }),
      /walls\.vertical must be a 1x3 matrix/
    );
  });

  it('should reject positions outside the grid', () => {
    assert.throws(() => createLevel({ rows: 1, cols: 2, explorer: { row: 0, col: 2 } }), isInvalidLevel);
    assert.throws(
      () => createLevel({ rows: 1, cols: 2, explorer: { row: 0, col: 0 }, traps: [{ row: -1, col: 0 }] }),
      isInvalidLevel
    );
  });

  it('should reject inconsistent gates', () => {
    assert.throws(
      () => createLevel({ rows: 1, cols: 2, gates: { vertical: [[true, false, false]] }, explorer: { row: 0, col: 0 } }),
      /Gate v0,0 lies on the perimeter/
    );
    assert.throws(
      () =>
        createLevel({
          rows: 1,
          cols: 2,
          walls: { vertical: [[false, true, false]] },
          gates: { vertical: [[false, true, false]] },
          explorer: { row: 0, col: 0 },
        }),
      /Edge v0,1 is both a wall and a gate/
    );
    assert.throws(
      () =>
        createLevel({ rows: 1, cols: 2, openGates: { vertical: [[false, true, false]] }, explorer: { row: 0, col: 0 } }),
      /Edge v0,1 is marked open but has no gate/
    );
  });

  it('should reject two special tiles on one cell', () => {
    assert.throws(
      () =>
        createLevel({
          rows: 1,
          cols: 2,
          explorer: { row: 0, col: 0 },
          exit: { row: 0, col: 1 },
          keys: [{ row: 0, col: 1 }],
        }),
      /marked both exit and key/
    );
  });

  it('should reject invalid JSON', () => {
    assert.throws(() => parseLevelFromJSON('{'), isInvalidLevel);
  });

  it('should parse JSON input', () => {
    const level = parseLevelFromJSON('{"rows":1,"cols":3,"explorer":{"row":0,"col":0},"traps":[{"row":0,"col":2}]}');
    assert.strictEqual(level.topology.tiles.get('0,2'), 'trap');
  });

  it('should export a level that parses back to the same world', () => {
    const level = createLevel({
      rows: 2,
      cols: 2,
      gates: { horizontal: [[false, false], [true, false], [false, false]] },
      explorer: { row: 0, col: 0 },
      exit: { row: 1, col: 1 },
      keys: [{ row: 0, col: 1 }],
      pursuers: { vertical: [{ row: 1, col: 0 }] },
    });

    const again = createLevel(exportLevel(level));

    assert.strictEqual(canonicalKey(again.world), canonicalKey(level.world));
    assert.deepStrictEqual(again.topology.gateIds, level.topology.gateIds);
    assert.deepStrictEqual(again.topology.exits, level.topology.exits);
  });
});
