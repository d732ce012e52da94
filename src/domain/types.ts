/**
 * Core type definitions for the gate maze simulator
 */

// Cell coordinate on the grid (zero-based, row 0 is the top row)
export interface Coord {
  row: number;
  col: number;
}

// Movement directions available to every entity
export type Direction = 'UP' | 'DOWN' | 'LEFT' | 'RIGHT';

// Explorer actions that consume a turn
export type MoveAction = Direction | 'WAIT';

// Out-of-band actions that bypass simulation
export type ControlAction = 'UNDO' | 'RESET';

export type Action = MoveAction | ControlAction;

// Pursuer movement classes
export type PursuerType = 'FAST_HORIZONTAL' | 'FAST_VERTICAL' | 'SLOW';

// Special tile markings (at most one per cell)
export type TileKind = 'trap' | 'key' | 'exit';

// Edge orientation: a vertical edge separates horizontally adjacent cells
export type EdgeOrientation = 'v' | 'h';

// Edge identifier of the form `v<r>,<c>` or `h<r>,<c>`
export type EdgeId = string;

export interface Pursuer {
  readonly type: PursuerType;
  readonly position: Coord;
}

// Turn phases, in cycle order
export type Phase = 'explorer' | 'fast1' | 'fast2' | 'slow';

export type GameStatus = 'playing' | 'won' | 'lost';

// Why a game ended
export type Outcome = 'exit' | 'trap' | 'capture' | 'repetition';

export type Mover = 'explorer' | PursuerType;

// Discrete events emitted by phase transitions
export type GameEvent =
  | { type: 'move'; entity: Mover; from: Coord; to: Coord }
  | { type: 'collision'; winner: PursuerType; loser: PursuerType; at: Coord }
  | { type: 'toggle_gates'; by: Mover; at: Coord; open: number }
  | { type: 'trap'; at: Coord }
  | { type: 'exit'; at: Coord }
  | { type: 'capture'; by: PursuerType; at: Coord };

// Helper for coordinate keys
export function coordKey(c: Coord): string {
  return `${c.row},${c.col}`;
}

export function coordsEqual(a: Coord, b: Coord): boolean {
  return a.row === b.row && a.col === b.col;
}

export function manhattanDistance(a: Coord, b: Coord): number {
  return Math.abs(a.row - b.row) + Math.abs(a.col - b.col);
}

export const DIRECTION_DELTAS: Readonly<Record<Direction, Coord>> = {
  UP: { row: -1, col: 0 },
  DOWN: { row: 1, col: 0 },
  LEFT: { row: 0, col: -1 },
  RIGHT: { row: 0, col: 1 },
};

export function moveCoord(c: Coord, direction: Direction): Coord {
  const delta = DIRECTION_DELTAS[direction];
  return { row: c.row + delta.row, col: c.col + delta.col };
}

export function isDirection(action: Action): action is Direction {
  return action in DIRECTION_DELTAS;
}

export function isFastPursuer(type: PursuerType): boolean {
  return type !== 'SLOW';
}

/**
 * Compare coordinates in row-major order
 */
export function compareCoords(a: Coord, b: Coord): number {
  return a.row - b.row || a.col - b.col;
}

export function formatCoord(c: Coord): string {
  return `(${c.row}, ${c.col})`;
}

// Solver options
export interface SolverOptions {
  // Ceiling on node expansions; reaching it ends the search without a proof
  maxExpansions: number;
}

export type SolverFailureReason = 'no_solution' | 'budget_exceeded';

// Search statistics
export interface SearchStats {
  nodesExpanded: number;
  nodesGenerated: number;
  timeTaken: number;
}

// Solution step with the explorer's position after the action
export interface SolutionStep {
  stepNumber: number;
  action: MoveAction;
  position: Coord;
}

export type Solution =
  | { found: true; actions: MoveAction[]; steps: SolutionStep[]; stats: SearchStats }
  | { found: false; reason: SolverFailureReason; stats: SearchStats };
