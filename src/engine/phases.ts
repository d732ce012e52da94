/**
 * Phase transition engine
 *
 * A turn cycles explorer -> fast1 -> fast2 -> slow. Every phase function is
 * pure: it takes a world snapshot and returns the next one with the events
 * it produced. The interactive Game and the solver both drive these.
 */

import {
  EdgeId,
  GameEvent,
  GameStatus,
  MoveAction,
  Outcome,
  Phase,
  PursuerType,
  coordsEqual,
  isDirection,
  isFastPursuer,
  moveCoord,
} from '../domain/types.js';
import { PHASE_ORDER } from '../domain/constants.js';
import { Topology, isExit, isKey, isTrap } from '../board/topology.js';
import { isBlocked } from '../constraints/legality.js';
import { WorldState, updateWorld } from '../state/world-state.js';
import { choosePursuerStep } from './pursuer-policy.js';
import { claimCell, createSlots, survivors } from './collision.js';
import { toggleGates } from './gates.js';

export type PursuerPhase = Exclude<Phase, 'explorer'>;

export interface PhaseResult {
  world: WorldState;
  status: GameStatus;
  outcome: Outcome | null;
  events: GameEvent[];
}

export interface ExplorerPhaseResult extends PhaseResult {
  moved: boolean;
  blocked: boolean;
  toggled: boolean;
}

export function nextPhase(phase: Phase): Phase {
  const index = PHASE_ORDER.indexOf(phase);
  return PHASE_ORDER[(index + 1) % PHASE_ORDER.length];
}

/**
 * Explorer phase: one step (or WAIT), then trap, exit and key checks
 */
export function runExplorerPhase(
  topology: Topology,
  world: WorldState,
  action: MoveAction
): ExplorerPhaseResult {
  const result: ExplorerPhaseResult = {
    world,
    status: 'playing',
    outcome: null,
    events: [],
    moved: false,
    blocked: false,
    toggled: false,
  };

  if (!isDirection(action)) {
    return result;
  }

  const from = world.explorer;
  const to = moveCoord(from, action);

  if (isBlocked(topology, world, from, to)) {
    result.blocked = true;
    return result;
  }

  result.moved = true;
  result.events.push({ type: 'move', entity: 'explorer', from, to });

  if (isTrap(topology, to)) {
    result.world = updateWorld(world, { explorer: to });
    result.status = 'lost';
    result.outcome = 'trap';
    result.events.push({ type: 'trap', at: to });
    return result;
  }

  if (isExit(topology, to)) {
    result.world = updateWorld(world, { explorer: to });
    result.status = 'won';
    result.outcome = 'exit';
    result.events.push({ type: 'exit', at: to });
    return result;
  }

  let openGates: readonly EdgeId[] = world.openGates;
  if (isKey(topology, to)) {
    openGates = toggleGates(topology, openGates);
    result.toggled = true;
    result.events.push({ type: 'toggle_gates', by: 'explorer', at: to, open: openGates.length });
  }

  result.world = updateWorld(world, { explorer: to, openGates });
  return result;
}

/**
 * One pursuer sub-step: move the phase's pursuers in order, resolve
 * collisions as they happen, then check for capture.
 */
export function runPursuerPhase(topology: Topology, world: WorldState, phase: PursuerPhase): PhaseResult {
  const participates = (type: PursuerType): boolean =>
    phase === 'slow' ? type === 'SLOW' : isFastPursuer(type);

  const events: GameEvent[] = [];
  const slots = createSlots(world.pursuers);
  const target = world.explorer;
  let openGates: readonly EdgeId[] = world.openGates;

  for (let i = 0; i < slots.length; i++) {
    const slot = slots[i];
    if (!slot.alive || !participates(slot.type)) continue;

    const from = slot.position;
    const to = choosePursuerStep(topology, openGates, slot.type, from, target);
    if (to === null) continue;

    events.push({ type: 'move', entity: slot.type, from, to });
    for (const collision of claimCell(slots, i, to)) {
      events.push({ type: 'collision', ...collision });
    }

    if (isKey(topology, to)) {
      openGates = toggleGates(topology, openGates);
      events.push({ type: 'toggle_gates', by: slot.type, at: to, open: openGates.length });
    }
  }

  const pursuers = survivors(slots);
  const next = updateWorld(world, { pursuers, openGates });

  const captor = pursuers.find((p) => coordsEqual(p.position, target));
  if (captor) {
    events.push({ type: 'capture', by: captor.type, at: target });
    return { world: next, status: 'lost', outcome: 'capture', events };
  }

  return { world: next, status: 'playing', outcome: null, events };
}

/**
 * Advance exactly one phase. The action only matters in the explorer phase.
 */
export function advancePhase(
  topology: Topology,
  world: WorldState,
  phase: Phase,
  action: MoveAction
): PhaseResult | ExplorerPhaseResult {
  if (phase === 'explorer') {
    return runExplorerPhase(topology, world, action);
  }
  return runPursuerPhase(topology, world, phase);
}

/**
 * A full turn: explorer phase then every pursuer phase, stopping at the
 * first terminal phase. No intermediate state is exposed.
 */
export function simulateTurn(topology: Topology, world: WorldState, action: MoveAction): ExplorerPhaseResult {
  const result = runExplorerPhase(topology, world, action);
  if (result.status !== 'playing') {
    return result;
  }

  for (const phase of PHASE_ORDER) {
    if (phase === 'explorer') continue;

    const step = runPursuerPhase(topology, result.world, phase);
    result.world = step.world;
    result.events.push(...step.events);

    if (step.status !== 'playing') {
      result.status = step.status;
      result.outcome = step.outcome;
      break;
    }
  }

  return result;
}
