/**
 * Tests for solution and event formatting
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { formatEvent, formatSolution, formatSolutionJSON, formatStep } from '../../src/io/solution-formatter.js';
import { Solution } from '../../src/domain/types.js';

const stats = { nodesExpanded: 1200, nodesGenerated: 3400, timeTaken: 5 };

describe('Solution formatting', () => {
  it('should number and align steps', () => {
    assert.strictEqual(formatStep({ stepNumber: 1, action: 'RIGHT', position: { row: 0, col: 1 } }), '  1. RIGHT -> (0, 1)');
    assert.strictEqual(formatStep({ stepNumber: 12, action: 'UP', position: { row: 3, col: 4 } }), ' 12. UP    -> (3, 4)');
  });

  it('should list the plan and statistics', () => {
    const solution: Solution = {
      found: true,
      actions: ['RIGHT'],
      steps: [{ stepNumber: 1, action: 'RIGHT', position: { row: 0, col: 1 } }],
      stats,
    };

    const lines = formatSolution(solution).split('\n');
    assert.strictEqual(lines[0], '=== MAZE SOLUTION ===');
    assert.strictEqual(lines[2], 'Solution in 1 move:');
    assert.strictEqual(lines[3], '  1. RIGHT -> (0, 1)');
    assert.ok(lines.includes('Nodes Expanded: 1,200'));
    assert.ok(lines.includes('Nodes Generated: 3,400'));
  });

  it('should explain a failed search', () => {
    const budget = formatSolution({ found: false, reason: 'budget_exceeded', stats }).split('\n');
    const none = formatSolution({ found: false, reason: 'no_solution', stats }).split('\n');

    assert.strictEqual(budget[2], 'No solution found within the expansion budget.');
    assert.strictEqual(none[2], 'No solution exists: every reachable state was explored.');
  });

  it('should serialise to JSON', () => {
    const parsed: unknown = JSON.parse(formatSolutionJSON({ found: false, reason: 'no_solution', stats }));
    assert.deepStrictEqual(parsed, { found: false, reason: 'no_solution', stats });
  });
});

describe('Event formatting', () => {
  it('should describe each event kind', () => {
    assert.strictEqual(
      formatEvent({ type: 'move', entity: 'explorer', from: { row: 0, col: 0 }, to: { row: 0, col: 1 } }),
      'explorer moves (0, 0) -> (0, 1)'
    );
    assert.strictEqual(
      formatEvent({ type: 'collision', winner: 'FAST_HORIZONTAL', loser: 'SLOW', at: { row: 1, col: 2 } }),
      'FAST_HORIZONTAL crushes SLOW at (1, 2)'
    );
    assert.strictEqual(
      formatEvent({ type: 'toggle_gates', by: 'SLOW', at: { row: 2, col: 2 }, open: 3 }),
      'SLOW steps on key at (2, 2); 3 gate(s) now open'
    );
    assert.strictEqual(
      formatEvent({ type: 'capture', by: 'FAST_VERTICAL', at: { row: 4, col: 0 } }),
      'FAST_VERTICAL captures the explorer at (4, 0)'
    );
  });
});
