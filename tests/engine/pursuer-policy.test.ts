/**
 * Tests for pursuer step selection
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { choosePursuerStep } from '../../src/engine/pursuer-policy.js';
import { boardLevel } from '../helpers.js';

describe('Pursuer policy', () => {
  const open = boardLevel(
    '+-+-+-+',
    '|P....|',
    '+.+.+.+',
    '|.....|',
    '+.+.+.+',
    '|.....|',
    '+-+-+-+'
  ).topology;
  const origin = { row: 0, col: 0 };
  const corner = { row: 2, col: 2 };

  it('should prefer the horizontal axis for fast-horizontal and slow pursuers', () => {
    assert.deepStrictEqual(choosePursuerStep(open, [], 'FAST_HORIZONTAL', origin, corner), { row: 0, col: 1 });
    assert.deepStrictEqual(choosePursuerStep(open, [], 'SLOW', origin, corner), { row: 0, col: 1 });
  });

  it('should prefer the vertical axis for fast-vertical pursuers', () => {
    assert.deepStrictEqual(choosePursuerStep(open, [], 'FAST_VERTICAL', origin, corner), { row: 1, col: 0 });
  });

  it('should use the other axis when already aligned', () => {
    assert.deepStrictEqual(
      choosePursuerStep(open, [], 'FAST_HORIZONTAL', { row: 0, col: 1 }, { row: 2, col: 1 }),
      { row: 1, col: 1 }
    );
  });

  it('should stay put on the target', () => {
    assert.strictEqual(choosePursuerStep(open, [], 'SLOW', corner, corner), null);
  });

  it('should fall back to the second axis when the first is walled', () => {
    const walled = boardLevel(
      '+-+-+-+',
      '|P|...|',
      '+.+.+.+',
      '|.....|',
      '+.+.+.+',
      '|.....|',
      '+-+-+-+'
    ).topology;

    assert.deepStrictEqual(choosePursuerStep(walled, [], 'FAST_HORIZONTAL', origin, corner), { row: 1, col: 0 });
  });

  it('should stay put when both axes are blocked', () => {
    const boxed = boardLevel(
      '+-+-+-+',
      '|P|...|',
      '+-+.+.+',
      '|.....|',
      '+.+.+.+',
      '|.....|',
      '+-+-+-+'
    ).topology;

    assert.strictEqual(choosePursuerStep(boxed, [], 'FAST_HORIZONTAL', origin, corner), null);
  });

  it('should respect the current gate state', () => {
    const gated = boardLevel(
      '+-+-+-+',
      '|P:...|',
      '+.+.+.+',
      '|.....|',
      '+.+.+.+',
      '|.....|',
      '+-+-+-+'
    ).topology;

    assert.deepStrictEqual(choosePursuerStep(gated, [], 'SLOW', origin, corner), { row: 1, col: 0 });
    assert.deepStrictEqual(choosePursuerStep(gated, ['v0,1'], 'SLOW', origin, corner), { row: 0, col: 1 });
  });
});
