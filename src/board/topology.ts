/**
 * Static board geometry: cells, walls, gates and special tiles
 */

import { Coord, EdgeId, EdgeOrientation, TileKind, coordKey } from '../domain/types.js';

type BoolMatrix = readonly (readonly boolean[])[];

export interface Topology {
  readonly rows: number;
  readonly cols: number;
  // rows x (cols + 1); entry [r][c] sits on the left side of cell (r, c)
  readonly verticalWalls: BoolMatrix;
  // (rows + 1) x cols; entry [r][c] sits on the top side of cell (r, c)
  readonly horizontalWalls: BoolMatrix;
  readonly verticalGates: BoolMatrix;
  readonly horizontalGates: BoolMatrix;
  // Every gate edge, sorted
  readonly gateIds: readonly EdgeId[];
  readonly tiles: ReadonlyMap<string, TileKind>;
  readonly exits: readonly Coord[];
}

export interface TopologyInput {
  rows: number;
  cols: number;
  verticalWalls: boolean[][];
  horizontalWalls: boolean[][];
  verticalGates: boolean[][];
  horizontalGates: boolean[][];
  tiles: { kind: TileKind; position: Coord }[];
}

export interface Edge {
  orientation: EdgeOrientation;
  row: number;
  col: number;
}

/**
 * Build an immutable topology. Perimeter edges become walls and never gates.
 */
export function createTopology(input: TopologyInput): Topology {
  const { rows, cols } = input;

  const verticalWalls = input.verticalWalls.map((row) => [...row]);
  const horizontalWalls = input.horizontalWalls.map((row) => [...row]);
  const verticalGates = input.verticalGates.map((row) => [...row]);
  const horizontalGates = input.horizontalGates.map((row) => [...row]);

  for (let r = 0; r < rows; r++) {
    verticalWalls[r][0] = true;
    verticalWalls[r][cols] = true;
    verticalGates[r][0] = false;
    verticalGates[r][cols] = false;
  }
  for (let c = 0; c < cols; c++) {
    horizontalWalls[0][c] = true;
    horizontalWalls[rows][c] = true;
    horizontalGates[0][c] = false;
    horizontalGates[rows][c] = false;
  }

  const gateIds: EdgeId[] = [];
  for (let r = 0; r < rows; r++) {
    for (let c = 1; c < cols; c++) {
      if (verticalGates[r][c]) gateIds.push(edgeId({ orientation: 'v', row: r, col: c }));
    }
  }
  for (let r = 1; r < rows; r++) {
    for (let c = 0; c < cols; c++) {
      if (horizontalGates[r][c]) gateIds.push(edgeId({ orientation: 'h', row: r, col: c }));
    }
  }
  gateIds.sort();

  const tiles = new Map<string, TileKind>();
  const exits: Coord[] = [];
  for (const tile of input.tiles) {
    tiles.set(coordKey(tile.position), tile.kind);
    if (tile.kind === 'exit') {
      exits.push({ ...tile.position });
    }
  }

  return {
    rows,
    cols,
    verticalWalls,
    horizontalWalls,
    verticalGates,
    horizontalGates,
    gateIds,
    tiles,
    exits,
  };
}

export function inBounds(topology: Topology, c: Coord): boolean {
  return c.row >= 0 && c.row < topology.rows && c.col >= 0 && c.col < topology.cols;
}

/**
 * Get the edge shared by two orthogonally adjacent cells, or null
 */
export function edgeBetween(from: Coord, to: Coord): Edge | null {
  const dr = to.row - from.row;
  const dc = to.col - from.col;

  if (dr === 0 && Math.abs(dc) === 1) {
    return { orientation: 'v', row: from.row, col: Math.max(from.col, to.col) };
  }
  if (dc === 0 && Math.abs(dr) === 1) {
    return { orientation: 'h', row: Math.max(from.row, to.row), col: from.col };
  }

  return null;
}

export function edgeId(edge: Edge): EdgeId {
  return `${edge.orientation}${edge.row},${edge.col}`;
}

export function isWallEdge(topology: Topology, edge: Edge): boolean {
  const matrix = edge.orientation === 'v' ? topology.verticalWalls : topology.horizontalWalls;
  return matrix[edge.row]?.[edge.col] ?? true;
}

export function isGateEdge(topology: Topology, edge: Edge): boolean {
  const matrix = edge.orientation === 'v' ? topology.verticalGates : topology.horizontalGates;
  return matrix[edge.row]?.[edge.col] ?? false;
}

export function tileAt(topology: Topology, c: Coord): TileKind | null {
  return topology.tiles.get(coordKey(c)) ?? null;
}

export function isTrap(topology: Topology, c: Coord): boolean {
  return tileAt(topology, c) === 'trap';
}

export function isKey(topology: Topology, c: Coord): boolean {
  return tileAt(topology, c) === 'key';
}

export function isExit(topology: Topology, c: Coord): boolean {
  return tileAt(topology, c) === 'exit';
}
