/**
 * Shared data types for the snake puzzle: cell coordinates, colors and the
 * typed level records handed to the engine by the level loader.
 *
 * Coordinates use a bottom-left origin: x grows to the right, y grows up.
 */

export interface Cell {
  x: number;
  y: number;
}

export const SNAKE_COLORS = ['red', 'green', 'blue', 'yellow'] as const;

export type SnakeColor = (typeof SNAKE_COLORS)[number];

/** Colors shared by a pressure-plate group and the gates it drives. */
export const GROUP_COLORS = ['yellow', 'purple', 'orange'] as const;

export type GroupColor = (typeof GROUP_COLORS)[number];

export type SnakeEnd = 'head' | 'tail';

// ---------------------------------------------------------------------------
// Level records
// ---------------------------------------------------------------------------

export interface SnakeRecord {
  color: SnakeColor;
  /** Ordered head-first. */
  body: Cell[];
}

export interface FruitRecord {
  position: Cell;
  colors: SnakeColor[];
}

export interface ExitRecord {
  position: Cell;
  color: SnakeColor;
  minLength: number;
}

export interface GroupedCellRecord {
  position: Cell;
  color: GroupColor;
}

export interface PortalRecord {
  position: Cell;
  /** Both endpoints of a pair share this color. */
  color: string;
}

/**
 * Fully typed level description. The loader is responsible for producing
 * this shape (see `parseLevelData`); the engine never reads raw JSON.
 */
export interface LevelData {
  id: string;
  name?: string | undefined;
  width: number;
  height: number;
  walls: Cell[];
  holes: Cell[];
  /** One footprint per box. */
  boxes: Cell[][];
  /** One footprint per ice cube. */
  iceCubes: Cell[][];
  fruits: FruitRecord[];
  exits: ExitRecord[];
  pressurePlates: GroupedCellRecord[];
  liftGates: GroupedCellRecord[];
  laserGates: GroupedCellRecord[];
  portals: PortalRecord[];
  snakes: SnakeRecord[];
}

// ---------------------------------------------------------------------------
// Cell helpers
// ---------------------------------------------------------------------------

export const cellToString = (cell: Cell): string => `${cell.x},${cell.y}`;

export const cellsEqual = (a: Cell, b: Cell): boolean => a.x === b.x && a.y === b.y;

export const containsCell = (cells: readonly Cell[], cell: Cell): boolean =>
  cells.some((c) => cellsEqual(c, cell));

export const indexOfCell = (cells: readonly Cell[], cell: Cell): number =>
  cells.findIndex((c) => cellsEqual(c, cell));
