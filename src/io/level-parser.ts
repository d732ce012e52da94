/**
 * Parse level descriptions into a topology and an initial world
 */

import { z } from 'zod';

import { Coord, EdgeId, PursuerType, TileKind, coordKey, formatCoord } from '../domain/types.js';
import { invalidLevelError } from '../domain/errors.js';
import { Topology, createTopology, edgeId } from '../board/topology.js';
import { WorldState, createWorld } from '../state/world-state.js';

const CoordSchema = z.object({
  row: z.number().int(),
  col: z.number().int(),
});

const EdgeMatricesSchema = z
  .object({
    vertical: z.array(z.array(z.boolean())).optional(),
    horizontal: z.array(z.array(z.boolean())).optional(),
  })
  .strict();

export const LevelDescriptionSchema = z
  .object({
    rows: z.number().int().positive(),
    cols: z.number().int().positive(),
    walls: EdgeMatricesSchema.optional(),
    gates: EdgeMatricesSchema.optional(),
    openGates: EdgeMatricesSchema.optional(),
    explorer: CoordSchema,
    exit: CoordSchema.nullable().optional(),
    pursuers: z
      .object({
        horizontal: z.array(CoordSchema).optional(),
        vertical: z.array(CoordSchema).optional(),
        slow: z.array(CoordSchema).optional(),
      })
      .strict()
      .optional(),
    traps: z.array(CoordSchema).optional(),
    keys: z.array(CoordSchema).optional(),
  })
  .strict();

/**
 * Input format for a level
 */
export type LevelDescription = z.infer<typeof LevelDescriptionSchema>;

export interface Level {
  topology: Topology;
  world: WorldState;
}

/**
 * Parse JSON input into a level
 */
export function parseLevelFromJSON(json: string): Level {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err) {
    throw invalidLevelError('Level is not valid JSON', { cause: String(err) });
  }
  return createLevel(raw);
}

/**
 * Validate a level description and build its topology and initial world
 */
export function createLevel(input: unknown): Level {
  const parsed = LevelDescriptionSchema.safeParse(input);
  if (!parsed.success) {
    throw invalidLevelError('Level description does not match the schema', {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`),
    });
  }

  const level = parsed.data;
  const { rows, cols } = level;

  const verticalWalls = readMatrix(level.walls?.vertical, rows, cols + 1, 'walls.vertical');
  const horizontalWalls = readMatrix(level.walls?.horizontal, rows + 1, cols, 'walls.horizontal');
  const verticalGates = readMatrix(level.gates?.vertical, rows, cols + 1, 'gates.vertical');
  const horizontalGates = readMatrix(level.gates?.horizontal, rows + 1, cols, 'gates.horizontal');
  const verticalOpen = readMatrix(level.openGates?.vertical, rows, cols + 1, 'openGates.vertical');
  const horizontalOpen = readMatrix(level.openGates?.horizontal, rows + 1, cols, 'openGates.horizontal');

  // Gates: interior only, never on a wall, and open flags only where a gate exists
  const openGates: EdgeId[] = [];
  for (let r = 0; r < rows; r++) {
    for (let c = 0; c <= cols; c++) {
      const id = edgeId({ orientation: 'v', row: r, col: c });
      checkGate(id, verticalGates[r][c], verticalOpen[r][c], c === 0 || c === cols, verticalWalls[r][c]);
      if (verticalGates[r][c] && verticalOpen[r][c]) openGates.push(id);
    }
  }
  for (let r = 0; r <= rows; r++) {
    for (let c = 0; c < cols; c++) {
      const id = edgeId({ orientation: 'h', row: r, col: c });
      checkGate(id, horizontalGates[r][c], horizontalOpen[r][c], r === 0 || r === rows, horizontalWalls[r][c]);
      if (horizontalGates[r][c] && horizontalOpen[r][c]) openGates.push(id);
    }
  }

  const inBounds = (c: Coord, field: string): Coord => {
    if (c.row < 0 || c.row >= rows || c.col < 0 || c.col >= cols) {
      throw invalidLevelError(`${field} position ${formatCoord(c)} is outside the ${rows}x${cols} grid`);
    }
    return c;
  };

  // Special tiles are mutually exclusive per cell
  const tiles: { kind: TileKind; position: Coord }[] = [];
  const tiled = new Map<string, TileKind>();
  const addTile = (kind: TileKind, position: Coord): void => {
    const key = coordKey(inBounds(position, kind));
    const existing = tiled.get(key);
    if (existing !== undefined) {
      throw invalidLevelError(`Cell ${formatCoord(position)} is marked both ${existing} and ${kind}`);
    }
    tiled.set(key, kind);
    tiles.push({ kind, position });
  };

  if (level.exit) addTile('exit', level.exit);
  for (const trap of level.traps ?? []) addTile('trap', trap);
  for (const key of level.keys ?? []) addTile('key', key);

  const pursuers: { type: PursuerType; position: Coord }[] = [];
  const addPursuers = (type: PursuerType, list: Coord[] | undefined): void => {
    for (const position of list ?? []) {
      pursuers.push({ type, position: inBounds(position, type) });
    }
  };
  addPursuers('FAST_HORIZONTAL', level.pursuers?.horizontal);
  addPursuers('FAST_VERTICAL', level.pursuers?.vertical);
  addPursuers('SLOW', level.pursuers?.slow);

  const topology = createTopology({
    rows,
    cols,
    verticalWalls,
    horizontalWalls,
    verticalGates,
    horizontalGates,
    tiles,
  });

  const world = createWorld({
    explorer: inBounds(level.explorer, 'explorer'),
    pursuers,
    openGates,
  });

  return { topology, world };
}

/**
 * Export a level back to its description format
 */
export function exportLevel(level: Level): LevelDescription {
  const { topology, world } = level;
  const openGates = new Set(world.openGates);
  const coordsOf = (kind: TileKind): Coord[] =>
    [...topology.tiles.entries()]
      .filter(([, k]) => k === kind)
      .map(([key]) => {
        const [row, col] = key.split(',').map(Number);
        return { row, col };
      });
  const pursuersOf = (type: PursuerType): Coord[] =>
    world.pursuers.filter((p) => p.type === type).map((p) => ({ ...p.position }));

  return {
    rows: topology.rows,
    cols: topology.cols,
    walls: {
      vertical: topology.verticalWalls.map((row) => [...row]),
      horizontal: topology.horizontalWalls.map((row) => [...row]),
    },
    gates: {
      vertical: topology.verticalGates.map((row) => [...row]),
      horizontal: topology.horizontalGates.map((row) => [...row]),
    },
    openGates: {
      vertical: topology.verticalGates.map((row, r) =>
        row.map((_, c) => openGates.has(edgeId({ orientation: 'v', row: r, col: c })))
      ),
      horizontal: topology.horizontalGates.map((row, r) =>
        row.map((_, c) => openGates.has(edgeId({ orientation: 'h', row: r, col: c })))
      ),
    },
    explorer: { ...world.explorer },
    exit: topology.exits[0] ? { ...topology.exits[0] } : null,
    pursuers: {
      horizontal: pursuersOf('FAST_HORIZONTAL'),
      vertical: pursuersOf('FAST_VERTICAL'),
      slow: pursuersOf('SLOW'),
    },
    traps: coordsOf('trap'),
    keys: coordsOf('key'),
  };
}

function readMatrix(matrix: boolean[][] | undefined, height: number, width: number, field: string): boolean[][] {
  if (matrix === undefined) {
    return Array.from({ length: height }, () => new Array<boolean>(width).fill(false));
  }

  if (matrix.length !== height || matrix.some((row) => row.length !== width)) {
    throw invalidLevelError(`${field} must be a ${height}x${width} matrix`);
  }

  return matrix.map((row) => [...row]);
}

function checkGate(id: EdgeId, gate: boolean, open: boolean, perimeter: boolean, wall: boolean): void {
  if (gate && perimeter) {
    throw invalidLevelError(`Gate ${id} lies on the perimeter`);
  }
  if (gate && wall) {
    throw invalidLevelError(`Edge ${id} is both a wall and a gate`);
  }
  if (open && !gate) {
    throw invalidLevelError(`Edge ${id} is marked open but has no gate`);
  }
}
