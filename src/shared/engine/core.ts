import type { Cell } from '../types/puzzle';

/**
 * Grid geometry shared by the validators and mutators. Pure functions over
 * cells; nothing here looks at board contents.
 */

export const UNIT_DIRECTIONS: readonly Cell[] = [
  { x: 0, y: 1 },
  { x: 1, y: 0 },
  { x: 0, y: -1 },
  { x: -1, y: 0 },
];

export function addCells(a: Cell, b: Cell): Cell {
  return { x: a.x + b.x, y: a.y + b.y };
}

export function subtractCells(a: Cell, b: Cell): Cell {
  return { x: a.x - b.x, y: a.y - b.y };
}

export function manhattanDistance(a: Cell, b: Cell): number {
  return Math.abs(a.x - b.x) + Math.abs(a.y - b.y);
}

function mod(value: number, size: number): number {
  return ((value % size) + size) % size;
}

/**
 * Map any cell onto the board as if its edges were glued (periodic
 * boundary).
 */
export function wrapCell(cell: Cell, width: number, height: number): Cell {
  return { x: mod(cell.x, width), y: mod(cell.y, height) };
}

/**
 * Shortest signed offset from `from` to `to` along one periodic axis.
 */
export function toroidalDelta(from: number, to: number, size: number): number {
  const d = mod(to - from, size);
  return d > size / 2 ? d - size : d;
}

/**
 * Unit step from `from` to an orthogonally adjacent `to`, or undefined when
 * the cells are not exactly one step apart.
 */
export function planarStep(from: Cell, to: Cell): Cell | undefined {
  const dx = to.x - from.x;
  const dy = to.y - from.y;
  return Math.abs(dx) + Math.abs(dy) === 1 ? { x: dx, y: dy } : undefined;
}

/**
 * Same as planarStep on a torus: a step across an edge counts as adjacent
 * and yields the direction of travel, not the raw coordinate difference.
 */
export function toroidalStep(
  from: Cell,
  to: Cell,
  width: number,
  height: number
): Cell | undefined {
  const dx = toroidalDelta(from.x, to.x, width);
  const dy = toroidalDelta(from.y, to.y, height);
  return Math.abs(dx) + Math.abs(dy) === 1 ? { x: dx, y: dy } : undefined;
}

export function translateCells(cells: readonly Cell[], offset: Cell): Cell[] {
  return cells.map((c) => addCells(c, offset));
}

/** True when both footprints hold the same cells, in any order. */
export function sameFootprint(a: readonly Cell[], b: readonly Cell[]): boolean {
  if (a.length !== b.length) return false;
  return a.every((c) => b.some((d) => d.x === c.x && d.y === c.y));
}

export function hasDuplicateCells(cells: readonly Cell[]): boolean {
  const seen = new Set<string>();
  for (const c of cells) {
    const key = `${c.x},${c.y}`;
    if (seen.has(key)) return true;
    seen.add(key);
  }
  return false;
}
