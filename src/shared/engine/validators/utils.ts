import { containsCell, type Cell, type SnakeEnd } from '../../types/puzzle';
import { blocksObject, blocksPortalDestination, isPushable } from '../entityCatalog';
import type { EntityId, PuzzleState, Snake } from '../types';

/** Cell of the given snake end. Bodies are never empty while in play. */
export function endCell(snake: Snake, end: SnakeEnd): Cell | undefined {
  return end === 'head' ? snake.body[0] : snake.body[snake.body.length - 1];
}

/** First snake whose body covers the cell, in id order. */
export function snakeAt(state: PuzzleState, cell: Cell): Snake | undefined {
  for (const snake of state.snakes.values()) {
    if (containsCell(snake.body, cell)) return snake;
  }
  return undefined;
}

export function isCellBlockedBySnake(state: PuzzleState, cell: Cell): boolean {
  return snakeAt(state, cell) !== undefined;
}

/**
 * Something physical is standing on the cell: a snake segment, a box or an
 * ice cube. Drives plate activity and the lift-gate safety lock.
 */
export function isCellOccupied(state: PuzzleState, cell: Cell): boolean {
  if (isCellBlockedBySnake(state, cell)) return true;
  return state.board.get(cell).some((e) => isPushable(e));
}

/**
 * Whether a pushed or sliding object may end a step on the cell. The moving
 * object itself is ignored so its current footprint never blocks it.
 */
export function isLocationFreeForObject(
  state: PuzzleState,
  cell: Cell,
  ignoreId?: EntityId
): boolean {
  if (!state.board.inBounds(cell)) return false;
  if (isCellBlockedBySnake(state, cell)) return false;
  return !state.board.get(cell).some((e) => e.id !== ignoreId && blocksObject(e));
}

/** A portal whose linked cell holds this is switched off. */
export function isPortalDestinationBlocked(state: PuzzleState, cell: Cell): boolean {
  if (isCellBlockedBySnake(state, cell)) return true;
  return state.board.get(cell).some((e) => blocksPortalDestination(e));
}
