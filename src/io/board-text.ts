/**
 * Plain-text board format
 *
 * Double-resolution layout: a board of R x C cells is written as 2R+1 lines
 * of 2C+1 characters. Cells sit at odd (line, column) pairs, edges between
 * them, junctions at even/even positions (ignored when parsing).
 *
 * ```
 * +-+-+-+-+
 * |P.K:..E|
 * +-+-+-+-+
 * ```
 *
 * Edges: `-` `|` walls, `=` `:` closed gates, `~` `;` open gates.
 * Cells: P explorer, E exit, T trap, K key, H/V fast pursuers, S slow pursuer.
 */

import { Coord, PursuerType } from '../domain/types.js';
import { BOARD_SYMBOLS } from '../domain/constants.js';
import { invalidLevelError } from '../domain/errors.js';
import { Topology, edgeId, tileAt } from '../board/topology.js';
import { WorldState } from '../state/world-state.js';
import { LevelDescription } from './level-parser.js';

const S = BOARD_SYMBOLS;

interface EdgeLayers {
  walls: boolean[][];
  gates: boolean[][];
  open: boolean[][];
}

/**
 * Parse a text board into a level description
 */
export function parseBoardText(text: string): LevelDescription {
  const lines = text
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  if (lines.length < 3 || lines.length % 2 === 0) {
    throw invalidLevelError(`Board text needs an odd number of lines (at least 3), got ${lines.length}`);
  }

  const width = Math.max(...lines.map((line) => line.length));
  if (width < 3 || width % 2 === 0) {
    throw invalidLevelError(`Board text needs an odd line width (at least 3), got ${width}`);
  }

  const rows = (lines.length - 1) / 2;
  const cols = (width - 1) / 2;
  const charAt = (r: number, c: number): string => lines[r][c] ?? S.EMPTY;

  const vertical: EdgeLayers = { walls: [], gates: [], open: [] };
  for (let r = 0; r < rows; r++) {
    const walls: boolean[] = [];
    const gates: boolean[] = [];
    const open: boolean[] = [];
    for (let c = 0; c <= cols; c++) {
      const ch = charAt(2 * r + 1, 2 * c);
      walls.push(ch === S.V_WALL);
      gates.push(ch === S.V_GATE_CLOSED || ch === S.V_GATE_OPEN);
      open.push(ch === S.V_GATE_OPEN);
    }
    vertical.walls.push(walls);
    vertical.gates.push(gates);
    vertical.open.push(open);
  }

  const horizontal: EdgeLayers = { walls: [], gates: [], open: [] };
  for (let r = 0; r <= rows; r++) {
    const walls: boolean[] = [];
    const gates: boolean[] = [];
    const open: boolean[] = [];
    for (let c = 0; c < cols; c++) {
      const ch = charAt(2 * r, 2 * c + 1);
      walls.push(ch === S.H_WALL);
      gates.push(ch === S.H_GATE_CLOSED || ch === S.H_GATE_OPEN);
      open.push(ch === S.H_GATE_OPEN);
    }
    horizontal.walls.push(walls);
    horizontal.gates.push(gates);
    horizontal.open.push(open);
  }

  let explorer: Coord | null = null;
  let exit: Coord | null = null;
  const traps: Coord[] = [];
  const keys: Coord[] = [];
  const pursuers: { horizontal: Coord[]; vertical: Coord[]; slow: Coord[] } = { horizontal: [], vertical: [], slow: [] };

  for (let r = 0; r < rows; r++) {
    for (let c = 0; c < cols; c++) {
      const ch = charAt(2 * r + 1, 2 * c + 1);
      const position = { row: r, col: c };

      switch (ch) {
        case S.EMPTY:
        case ' ':
          break;
        case S.EXPLORER:
          if (explorer) {
            throw invalidLevelError('Board text defines more than one explorer');
          }
          explorer = position;
          break;
        case S.EXIT:
          if (exit) {
            throw invalidLevelError('Board text defines more than one exit');
          }
          exit = position;
          break;
        case S.TRAP:
          traps.push(position);
          break;
        case S.KEY:
          keys.push(position);
          break;
        case S.FAST_HORIZONTAL:
          pursuers.horizontal.push(position);
          break;
        case S.FAST_VERTICAL:
          pursuers.vertical.push(position);
          break;
        case S.SLOW:
          pursuers.slow.push(position);
          break;
        default:
          throw invalidLevelError(`Unknown cell symbol '${ch}' at (${r}, ${c})`);
      }
    }
  }

  if (!explorer) {
    throw invalidLevelError(`Board text must place the explorer '${S.EXPLORER}'`);
  }

  return {
    rows,
    cols,
    walls: { vertical: vertical.walls, horizontal: horizontal.walls },
    gates: { vertical: vertical.gates, horizontal: horizontal.gates },
    openGates: { vertical: vertical.open, horizontal: horizontal.open },
    explorer,
    exit,
    pursuers,
    traps,
    keys,
  };
}

/**
 * Render a world on its board.
 * Later layers win: tiles, then pursuers, then the explorer.
 */
export function formatBoard(topology: Topology, world: WorldState): string {
  const { rows, cols } = topology;
  const open = new Set(world.openGates);
  const grid: string[][] = Array.from({ length: 2 * rows + 1 }, () =>
    new Array<string>(2 * cols + 1).fill(S.EMPTY)
  );

  for (let r = 0; r <= rows; r++) {
    for (let c = 0; c < cols; c++) {
      if (topology.horizontalWalls[r][c]) {
        grid[2 * r][2 * c + 1] = S.H_WALL;
      } else if (topology.horizontalGates[r][c]) {
        const isOpen = open.has(edgeId({ orientation: 'h', row: r, col: c }));
        grid[2 * r][2 * c + 1] = isOpen ? S.H_GATE_OPEN : S.H_GATE_CLOSED;
      }
    }
  }

  for (let r = 0; r < rows; r++) {
    for (let c = 0; c <= cols; c++) {
      if (topology.verticalWalls[r][c]) {
        grid[2 * r + 1][2 * c] = S.V_WALL;
      } else if (topology.verticalGates[r][c]) {
        const isOpen = open.has(edgeId({ orientation: 'v', row: r, col: c }));
        grid[2 * r + 1][2 * c] = isOpen ? S.V_GATE_OPEN : S.V_GATE_CLOSED;
      }
    }
  }

  // Junctions touching any edge
  for (let r = 0; r <= 2 * rows; r += 2) {
    for (let c = 0; c <= 2 * cols; c += 2) {
      const neighbours = [grid[r][c - 1], grid[r][c + 1], grid[r - 1]?.[c], grid[r + 1]?.[c]];
      if (neighbours.some((ch) => ch !== undefined && ch !== S.EMPTY)) {
        grid[r][c] = S.CORNER;
      }
    }
  }

  const put = (c: Coord, ch: string): void => {
    grid[2 * c.row + 1][2 * c.col + 1] = ch;
  };

  for (let r = 0; r < rows; r++) {
    for (let c = 0; c < cols; c++) {
      const tile = tileAt(topology, { row: r, col: c });
      if (tile === 'trap') put({ row: r, col: c }, S.TRAP);
      else if (tile === 'key') put({ row: r, col: c }, S.KEY);
      else if (tile === 'exit') put({ row: r, col: c }, S.EXIT);
    }
  }

  for (const p of world.pursuers) {
    put(p.position, pursuerSymbol(p.type));
  }
  put(world.explorer, S.EXPLORER);

  return grid.map((line) => line.join('')).join('\n');
}

export function pursuerSymbol(type: PursuerType): string {
  return S[type];
}
