/**
 * Caller-owned registry of live game sessions
 *
 * The store is injected wherever sessions are needed; the simulation core
 * keeps no process-wide state. Each session also tracks how often every
 * canonical state has occurred and ends in a draw once a state repeats
 * `repetitionLimit` times.
 */

import { randomUUID } from 'node:crypto';

import { DEFAULT_SESSION_OPTIONS } from '../domain/constants.js';
import { MazeError } from '../domain/errors.js';
import { Level } from '../io/level-parser.js';
import { canonicalKey } from '../state/state-hash.js';
import { Game, MicroStepResult, StepResult, parseAction } from '../engine/game.js';

export interface SessionOptions {
  repetitionLimit: number;
  generateId: () => string;
}

export interface Session {
  readonly id: string;
  readonly game: Game;
  // Canonical key of every position reached at the start of a turn, initial position included
  positions: string[];
  drawn: boolean;
}

export interface SessionStepResult extends StepResult {
  sessionId: string;
  repeatCount: number;
  drawn: boolean;
}

export interface SessionMicroStepResult extends MicroStepResult {
  sessionId: string;
  repeatCount: number;
  drawn: boolean;
}

export class SessionStore {
  private readonly sessions = new Map<string, Session>();
  private readonly options: SessionOptions;

  constructor(options: Partial<SessionOptions> = {}) {
    this.options = {
      ...DEFAULT_SESSION_OPTIONS,
      generateId: () => randomUUID(),
      ...options,
    };
  }

  /**
   * Start a new session on a level
   */
  start(level: Level, id: string = this.options.generateId()): Session {
    if (this.sessions.has(id)) {
      throw new MazeError('invalid_session', 'Session already exists', { sessionId: id });
    }

    const game = new Game(level);
    const session: Session = {
      id,
      game,
      positions: [canonicalKey(game.state)],
      drawn: false,
    };
    this.sessions.set(id, session);
    return session;
  }

  get(id: string): Session | undefined {
    return this.sessions.get(id);
  }

  has(id: string): boolean {
    return this.sessions.has(id);
  }

  delete(id: string): boolean {
    return this.sessions.delete(id);
  }

  ids(): string[] {
    return [...this.sessions.keys()];
  }

  get size(): number {
    return this.sessions.size;
  }

  /**
   * Apply a full-turn action to a session
   */
  step(id: string, action: string): SessionStepResult {
    const session = this.require(id);
    const blocked = this.rejectIfDrawn(session, action);
    if (blocked) {
      return this.decorate(session, blocked);
    }

    const result = session.game.step(action);
    this.track(session, result, result.ok && result.action !== 'UNDO' && result.action !== 'RESET');
    return this.decorate(session, result);
  }

  /**
   * Advance a session by a single phase
   */
  stepMicro(id: string, action?: string): SessionMicroStepResult {
    const session = this.require(id);
    const blocked = this.rejectIfDrawn(session, action ?? 'WAIT');
    if (blocked) {
      return this.decorate(session, { ...blocked, phase: null, nextPhase: session.game.currentPhase });
    }

    const result = session.game.stepMicro(action);
    const completedTurn = result.ok && result.phase !== null && result.nextPhase === 'explorer';
    this.track(session, result, completedTurn);
    return this.decorate(session, result);
  }

  /**
   * How often the session's current position has occurred
   */
  repeatCount(id: string): number {
    const session = this.require(id);
    const current = canonicalKey(session.game.state);
    return session.positions.filter((key) => key === current).length;
  }

  private require(id: string): Session {
    const session = this.sessions.get(id);
    if (session === undefined) {
      throw new MazeError('invalid_session', 'Unknown session', { sessionId: id });
    }
    return session;
  }

  /**
   * A drawn session only accepts UNDO and RESET
   */
  private rejectIfDrawn(session: Session, action: string): StepResult | null {
    if (!session.drawn) {
      return null;
    }

    const token = parseAction(action);
    if (token === 'UNDO' || token === 'RESET') {
      return null;
    }

    const game = session.game;
    return {
      ok: false,
      action,
      moved: false,
      blocked: false,
      toggled: false,
      position: game.state.explorer,
      won: false,
      lost: false,
      done: true,
      outcome: 'repetition',
      events: [],
      turn: game.turnCount,
      reason: 'game_over',
    };
  }

  private track(session: Session, result: StepResult, completedTurn: boolean): void {
    if (result.ok && result.action === 'RESET') {
      session.positions = [canonicalKey(session.game.state)];
      session.drawn = false;
      return;
    }

    if (result.ok && result.action === 'UNDO') {
      session.positions = session.positions.slice(0, session.game.historyDepth + 1);
      session.drawn = false;
      return;
    }

    if (!completedTurn || result.done) {
      return;
    }

    const key = canonicalKey(session.game.state);
    session.positions.push(key);
    const count = session.positions.filter((k) => k === key).length;
    if (count >= this.options.repetitionLimit) {
      session.drawn = true;
    }
  }

  private decorate<T extends StepResult>(
    session: Session,
    result: T
  ): T & { sessionId: string; repeatCount: number; drawn: boolean } {
    const drawn = session.drawn;
    return {
      ...result,
      done: result.done || drawn,
      outcome: drawn ? 'repetition' : result.outcome,
      sessionId: session.id,
      repeatCount: this.repeatCount(session.id),
      drawn,
    };
  }
}
