/**
 * Constants for the gate maze simulator
 */

import { Direction, MoveAction, Phase, PursuerType } from './types.js';

// Phase cycle of one full turn
export const PHASE_ORDER: readonly Phase[] = ['explorer', 'fast1', 'fast2', 'slow'];

export const DIRECTIONS: readonly Direction[] = ['UP', 'DOWN', 'LEFT', 'RIGHT'];

// Actions the solver tries from every state, in this order
export const SOLVER_ACTIONS: readonly MoveAction[] = ['UP', 'DOWN', 'LEFT', 'RIGHT', 'WAIT'];

// Canonical processing order of pursuer types
export const PURSUER_ORDER: readonly PursuerType[] = ['FAST_HORIZONTAL', 'FAST_VERTICAL', 'SLOW'];

// Default solver options
export const DEFAULT_SOLVER_OPTIONS = {
  maxExpansions: 200000,
};

// Default session options
export const DEFAULT_SESSION_OPTIONS = {
  // A session ends in a draw once the same canonical state occurs this often
  repetitionLimit: 3,
};

// Plain-text board symbols
export const BOARD_SYMBOLS = {
  CORNER: '+',
  EMPTY: '.',
  H_WALL: '-',
  V_WALL: '|',
  H_GATE_CLOSED: '=',
  H_GATE_OPEN: '~',
  V_GATE_CLOSED: ':',
  V_GATE_OPEN: ';',
  EXPLORER: 'P',
  EXIT: 'E',
  TRAP: 'T',
  KEY: 'K',
  FAST_HORIZONTAL: 'H',
  FAST_VERTICAL: 'V',
  SLOW: 'S',
} as const;
