import type { Cell } from '../types/puzzle';
import { containsCell } from '../types/puzzle';
import { assertNever } from './entityCatalog';
import type { Entity, EntityKind, MoveRequest, MoveResolution, PuzzleState } from './types';

/**
 * Shared notation helpers.
 *
 * Compact, human-readable renderings of cells, requests, rejections and the
 * board itself, for debug logs and test failure output. Not a persistence
 * format.
 */

export function formatCell(cell: Cell): string {
  return `(${cell.x},${cell.y})`;
}

export function formatMoveRequest(request: MoveRequest): string {
  return `snake ${request.snakeId} ${request.end} -> ${formatCell(request.target)}`;
}

export function formatRejection(resolution: MoveResolution): string {
  if (resolution.accepted) {
    return 'accepted';
  }
  return `${resolution.code}: ${resolution.reason}`;
}

/** Highest first; the first kind present on a cell picks its glyph. */
const GLYPH_PRECEDENCE: readonly EntityKind[] = [
  'wall',
  'box',
  'ice_cube',
  'lift_gate',
  'hole',
  'laser_gate',
  'fruit',
  'exit',
  'portal',
  'pressure_plate',
];

function glyphFor(entity: Entity): string {
  switch (entity.kind) {
    case 'wall':
      return '#';
    case 'box':
      return 'X';
    case 'ice_cube':
      return 'I';
    case 'lift_gate':
      return entity.open ? '_' : '|';
    case 'hole':
      return 'O';
    case 'laser_gate':
      return entity.active ? '!' : ':';
    case 'fruit':
      return '*';
    case 'exit':
      return 'E';
    case 'portal':
      return entity.active ? 'P' : 'p';
    case 'pressure_plate':
      return entity.active ? '+' : '=';
    default:
      return assertNever(entity);
  }
}

/**
 * ASCII picture of the board, top row first. Snakes draw over everything:
 * the head as the uppercase initial of its color, the body in lowercase.
 *
 * @example
 * ```
 * #####
 * #rR.#
 * #####
 * ```
 */
export function renderBoard(state: PuzzleState): string {
  const { board } = state;
  const rows: string[] = [];
  for (let y = board.height - 1; y >= 0; y--) {
    let row = '';
    for (let x = 0; x < board.width; x++) {
      const cell = { x, y };
      row += glyphAt(state, cell);
    }
    rows.push(row);
  }
  return rows.join('\n');
}

function glyphAt(state: PuzzleState, cell: Cell): string {
  for (const snake of state.snakes.values()) {
    if (!containsCell(snake.body, cell)) continue;
    const initial = snake.color.charAt(0);
    const head = snake.body[0];
    return head && head.x === cell.x && head.y === cell.y ? initial.toUpperCase() : initial;
  }
  const entities = state.board.get(cell);
  for (const kind of GLYPH_PRECEDENCE) {
    const entity = entities.find((e) => e.kind === kind);
    if (entity) return glyphFor(entity);
  }
  return '.';
}
