import { indexOfCell, type Cell, type SnakeColor } from '../../types/puzzle';
import type { ExitEntity, MutationContext, Snake, SnakeId } from '../types';

export function removeSnake(
  ctx: MutationContext,
  snakeId: SnakeId,
  reason: 'exited' | 'sliced'
): void {
  if (!ctx.state.snakes.delete(snakeId)) return;
  ctx.events.push({ type: 'SNAKE_REMOVED', snakeId, reason });
}

/**
 * Cut a snake at a cell. A cut at the head takes only the head; anywhere
 * else the body is severed from that cell to the tail. A snake left with no
 * segments is removed. Returns false when the snake does not cover the cell.
 */
export function sliceSnakeAt(ctx: MutationContext, snake: Snake, cell: Cell): boolean {
  const index = indexOfCell(snake.body, cell);
  if (index < 0) return false;

  snake.body = index === 0 ? snake.body.slice(1) : snake.body.slice(0, index);
  ctx.events.push({
    type: 'SNAKE_SLICED',
    snakeId: snake.id,
    at: { ...cell },
    body: snake.body.map((c) => ({ ...c })),
  });
  if (snake.body.length === 0) {
    removeSnake(ctx, snake.id, 'sliced');
  }
  return true;
}

/** Distinct colors of the snakes still in play, in snake id order. */
export function remainingSnakeColors(ctx: MutationContext): SnakeColor[] {
  const colors: SnakeColor[] = [];
  const ids = [...ctx.state.snakes.keys()].sort((a, b) => a - b);
  for (const id of ids) {
    const snake = ctx.state.snakes.get(id);
    if (snake && !colors.includes(snake.color)) colors.push(snake.color);
  }
  return colors;
}

/**
 * A snake head reached a matching exit. The exit is spent and the snake
 * leaves play; a fruit for the remaining colors appears on the exit cell, or
 * the level is won when no snakes are left.
 */
export function exitSnake(ctx: MutationContext, snake: Snake, exit: ExitEntity): void {
  const { state } = ctx;
  ctx.events.push({
    type: 'EXIT_CONSUMED',
    exitId: exit.id,
    position: { ...exit.position },
    snakeId: snake.id,
  });
  state.board.remove(exit.id);
  removeSnake(ctx, snake.id, 'exited');

  if (state.snakes.size > 0) {
    const colors = remainingSnakeColors(ctx);
    const fruitId = state.board.allocateId();
    state.board.add({ id: fruitId, kind: 'fruit', position: { ...exit.position }, colors });
    ctx.events.push({
      type: 'FRUIT_SPAWNED',
      fruitId,
      position: { ...exit.position },
      colors: [...colors],
    });
    return;
  }

  state.status = 'won';
  ctx.events.push({ type: 'LEVEL_WON', levelId: state.levelId, moveCount: state.moveCount });
}
