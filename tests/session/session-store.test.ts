/**
 * Tests for the session registry and repetition draws
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { SessionStore } from '../../src/session/session-store.js';
import { isMazeError } from '../../src/domain/errors.js';
import { boardLevel } from '../helpers.js';

const level = boardLevel('+-+-+-+', '|P...E|', '+-+-+-+');

function createStore(): SessionStore {
  let next = 0;
  return new SessionStore({ generateId: () => `session-${++next}` });
}

describe('Session store', () => {
  it('should register sessions under generated ids', () => {
    const store = createStore();
    const a = store.start(level);
    const b = store.start(level);

    assert.strictEqual(a.id, 'session-1');
    assert.strictEqual(b.id, 'session-2');
    assert.deepStrictEqual(store.ids(), ['session-1', 'session-2']);
    assert.strictEqual(store.size, 2);
  });

  it('should keep sessions independent', () => {
    const store = createStore();
    const a = store.start(level);
    const b = store.start(level);

    store.step(a.id, 'RIGHT');

    assert.deepStrictEqual(a.game.state.explorer, { row: 0, col: 1 });
    assert.deepStrictEqual(b.game.state.explorer, { row: 0, col: 0 });
  });

  it('should refuse duplicate and unknown ids', () => {
    const store = createStore();
    store.start(level, 'fixed');

    assert.throws(
      () => store.start(level, 'fixed'),
      (err: unknown) => isMazeError(err) && err.code === 'invalid_session' && err.message.startsWith('Session already exists')
    );
    assert.throws(
      () => store.step('missing', 'WAIT'),
      (err: unknown) => isMazeError(err) && err.code === 'invalid_session' && err.context?.sessionId === 'missing'
    );
  });

  it('should delete sessions', () => {
    const store = createStore();
    const session = store.start(level);

    assert.strictEqual(store.delete(session.id), true);
    assert.strictEqual(store.has(session.id), false);
  });
});

describe('Repetition', () => {
  it('should count the initial position', () => {
    const store = createStore();
    const session = store.start(level);

    assert.strictEqual(store.repeatCount(session.id), 1);
    const result = store.step(session.id, 'WAIT');
    assert.strictEqual(result.repeatCount, 2);
    assert.strictEqual(result.drawn, false);
  });

  it('should draw on the third occurrence of a position', () => {
    const store = createStore();
    const session = store.start(level);

    store.step(session.id, 'WAIT');
    const result = store.step(session.id, 'WAIT');

    assert.strictEqual(result.drawn, true);
    assert.strictEqual(result.done, true);
    assert.strictEqual(result.outcome, 'repetition');
    assert.strictEqual(result.repeatCount, 3);
  });

  it('should only accept undo and reset once drawn', () => {
    const store = createStore();
    const session = store.start(level);
    store.step(session.id, 'WAIT');
    store.step(session.id, 'WAIT');

    const refused = store.step(session.id, 'RIGHT');
    assert.strictEqual(refused.ok, false);
    assert.strictEqual(refused.reason, 'game_over');
    assert.deepStrictEqual(session.game.state.explorer, { row: 0, col: 0 });

    const undo = store.step(session.id, 'UNDO');
    assert.strictEqual(undo.ok, true);
    assert.strictEqual(undo.drawn, false);
    assert.strictEqual(undo.repeatCount, 2);

    const reset = store.step(session.id, 'RESET');
    assert.strictEqual(reset.repeatCount, 1);
    assert.strictEqual(reset.done, false);
  });

  it('should count a micro-stepped turn once it completes', () => {
    const store = createStore();
    const session = store.start(level);

    store.stepMicro(session.id, 'WAIT');
    store.stepMicro(session.id);
    const fast2 = store.stepMicro(session.id);
    assert.strictEqual(fast2.repeatCount, 1);

    const slow = store.stepMicro(session.id);
    assert.strictEqual(slow.phase, 'slow');
    assert.strictEqual(slow.repeatCount, 2);
  });

  it('should honour a custom limit', () => {
    const store = new SessionStore({ repetitionLimit: 2, generateId: () => 'only' });
    store.start(level);

    assert.strictEqual(store.step('only', 'WAIT').drawn, true);
  });
});
