/**
 * Interactive game session: one live world advanced by player actions
 */

import {
  Action,
  Coord,
  GameEvent,
  GameStatus,
  MoveAction,
  Outcome,
  Phase,
} from '../domain/types.js';
import { DIRECTIONS } from '../domain/constants.js';
import { MazeErrorCode } from '../domain/errors.js';
import { Topology } from '../board/topology.js';
import { WorldState } from '../state/world-state.js';
import { Level } from '../io/level-parser.js';
import { formatBoard } from '../io/board-text.js';
import { ExplorerPhaseResult, advancePhase, nextPhase, simulateTurn } from './phases.js';

export interface StepResult {
  ok: boolean;
  // Normalised action token, or the raw input when it could not be parsed
  action: string;
  moved: boolean;
  blocked: boolean;
  toggled: boolean;
  position: Coord;
  won: boolean;
  lost: boolean;
  done: boolean;
  outcome: Outcome | null;
  events: GameEvent[];
  turn: number;
  reason?: MazeErrorCode;
}

export interface MicroStepResult extends StepResult {
  // Phase that was executed (null when nothing was simulated)
  phase: Phase | null;
  // Phase that the next micro step will execute
  nextPhase: Phase;
}

interface Snapshot {
  readonly world: WorldState;
  readonly status: GameStatus;
  readonly outcome: Outcome | null;
  readonly turn: number;
}

const ACTIONS: readonly Action[] = [...DIRECTIONS, 'WAIT', 'UNDO', 'RESET'];

/**
 * Parse an action token: case-insensitive, optional "Action:" style prefix
 */
export function parseAction(input: string): Action | null {
  let token = input.trim();
  const colon = token.indexOf(':');
  if (colon >= 0) {
    token = token.slice(colon + 1).trim();
  }
  token = token.toUpperCase();

  return ACTIONS.find((a) => a === token) ?? null;
}

export class Game {
  readonly topology: Topology;
  readonly initialWorld: WorldState;

  private world: WorldState;
  private status: GameStatus = 'playing';
  private outcome: Outcome | null = null;
  private turn = 0;
  private phase: Phase = 'explorer';
  private history: Snapshot[] = [];

  constructor(level: Level) {
    this.topology = level.topology;
    this.initialWorld = level.world;
    this.world = level.world;
  }

  get state(): WorldState {
    return this.world;
  }

  get currentPhase(): Phase {
    return this.phase;
  }

  get isDone(): boolean {
    return this.status !== 'playing';
  }

  get gameStatus(): GameStatus {
    return this.status;
  }

  get turnCount(): number {
    return this.turn;
  }

  get historyDepth(): number {
    return this.history.length;
  }

  /**
   * Apply one action as a full turn (explorer phase plus all pursuer phases)
   */
  step(input: string): StepResult {
    const action = parseAction(input);
    if (action === null) {
      return this.result(input, { reason: 'invalid_action' });
    }

    if (action === 'RESET' || action === 'UNDO') {
      return this.control(action);
    }

    if (this.isDone) {
      return this.result(action, { reason: 'game_over' });
    }
    if (this.phase !== 'explorer') {
      return this.result(action, { reason: 'turn_in_progress' });
    }

    this.pushSnapshot();
    const turn = simulateTurn(this.topology, this.world, action);
    this.apply(turn);
    this.turn++;

    return this.result(action, {
      moved: turn.moved,
      blocked: turn.blocked,
      toggled: turn.toggled,
      events: turn.events,
    });
  }

  /**
   * Advance exactly one phase. Pursuer phases ignore the action, except
   * UNDO and RESET which are honoured in any phase.
   */
  stepMicro(input = 'WAIT'): MicroStepResult {
    const action = parseAction(input);

    if (action === 'RESET' || action === 'UNDO') {
      return { ...this.control(action), phase: null, nextPhase: this.phase };
    }
    if (this.isDone) {
      return { ...this.result(action ?? input, { reason: 'game_over' }), phase: null, nextPhase: this.phase };
    }

    const phase = this.phase;
    let move: MoveAction = 'WAIT';

    if (phase === 'explorer') {
      if (action === null) {
        return { ...this.result(input, { reason: 'invalid_action' }), phase: null, nextPhase: phase };
      }
      move = action;
      this.pushSnapshot();
    }

    const outcome = advancePhase(this.topology, this.world, phase, move);
    this.apply(outcome);

    if (phase === 'explorer') {
      this.turn++;
    }
    this.phase = this.isDone ? 'explorer' : nextPhase(phase);

    const explorerFlags = isExplorerResult(outcome)
      ? { moved: outcome.moved, blocked: outcome.blocked, toggled: outcome.toggled }
      : {};

    return {
      ...this.result(phase === 'explorer' ? move : action ?? input, { ...explorerFlags, events: outcome.events }),
      phase,
      nextPhase: this.phase,
    };
  }

  /**
   * Render the current world as board text
   */
  toText(): string {
    return formatBoard(this.topology, this.world);
  }

  private control(action: 'UNDO' | 'RESET'): StepResult {
    if (action === 'RESET') {
      this.world = this.initialWorld;
      this.status = 'playing';
      this.outcome = null;
      this.turn = 0;
      this.phase = 'explorer';
      this.history = [];
      return this.result(action, {});
    }

    const snapshot = this.history.pop();
    if (snapshot === undefined) {
      return this.result(action, { reason: 'no_history' });
    }

    this.world = snapshot.world;
    this.status = snapshot.status;
    this.outcome = snapshot.outcome;
    this.turn = snapshot.turn;
    this.phase = 'explorer';
    return this.result(action, {});
  }

  private pushSnapshot(): void {
    this.history.push({
      world: this.world,
      status: this.status,
      outcome: this.outcome,
      turn: this.turn,
    });
  }

  private apply(outcome: { world: WorldState; status: GameStatus; outcome: Outcome | null }): void {
    this.world = outcome.world;
    this.status = outcome.status;
    this.outcome = outcome.outcome;
  }

  private result(
    action: string,
    fields: Partial<Pick<StepResult, 'moved' | 'blocked' | 'toggled' | 'events' | 'reason'>>
  ): StepResult {
    return {
      ok: fields.reason === undefined,
      action,
      moved: fields.moved ?? false,
      blocked: fields.blocked ?? false,
      toggled: fields.toggled ?? false,
      position: this.world.explorer,
      won: this.status === 'won',
      lost: this.status === 'lost',
      done: this.isDone,
      outcome: this.outcome,
      events: fields.events ?? [],
      turn: this.turn,
      ...(fields.reason !== undefined ? { reason: fields.reason } : {}),
    };
  }
}

function isExplorerResult(value: object): value is ExplorerPhaseResult {
  return 'moved' in value;
}
