import { cellToString } from '../../types/puzzle';
import { debugLog, isResolverTraceEnabled } from '../../utils/envFlags';
import { hasDuplicateCells } from '../core';
import { devAssert, entityNotFound } from '../errors';
import type { MovePlan, MutationContext, Snake } from '../types';
import { applyDisplacement } from './ObjectMutator';
import { exitSnake, sliceSnakeAt } from './SnakeMutator';

/**
 * Entry effects of every entity on the cell the moved end landed on.
 * Stops as soon as the snake has left play.
 */
function applyEntryEffects(ctx: MutationContext, snake: Snake, plan: MovePlan): void {
  const { state } = ctx;
  for (const entity of state.board.get(plan.finalCell)) {
    if (!state.snakes.has(snake.id)) return;
    switch (entity.kind) {
      case 'fruit':
        if (entity.id !== plan.consumedFruitId) break;
        state.board.remove(entity.id);
        ctx.events.push({
          type: 'FRUIT_CONSUMED',
          fruitId: entity.id,
          position: { ...entity.position },
          snakeId: snake.id,
        });
        break;
      case 'exit':
        if (plan.end === 'head') exitSnake(ctx, snake, entity);
        break;
      case 'laser_gate':
        if (entity.active) sliceSnakeAt(ctx, snake, plan.finalCell);
        break;
      default:
        break;
    }
  }
}

/**
 * Commit a validated move plan. The pushed object moves first so the snake
 * lands on the final board; then the body shifts (or grows), the moved end
 * teleports when flagged, and entry effects run at the final cell.
 *
 * The caller runs the state refresher afterwards.
 */
export function applyMove(ctx: MutationContext, plan: MovePlan): void {
  const { state } = ctx;
  const snake = state.snakes.get(plan.snakeId);
  if (!snake) {
    throw entityNotFound('snake', { snakeId: plan.snakeId }, 'MoveMutator');
  }

  state.moveCount++;

  // 1. Object first
  if (plan.displacement) {
    applyDisplacement(ctx, plan.displacement);
  }

  // 2-3. Body update, landing on the portal exit when teleporting
  const landing = plan.teleportTo ?? plan.target;
  const grows = plan.consumedFruitId !== undefined;
  if (plan.end === 'head') {
    snake.body.unshift({ ...landing });
    if (!grows) snake.body.pop();
  } else {
    snake.body.push({ ...landing });
    snake.body.shift();
  }
  devAssert(
    !hasDuplicateCells(snake.body),
    `Snake ${snake.id} body repeats a cell after moving to ${cellToString(landing)}`,
    { snakeId: snake.id, body: snake.body },
    'MoveMutator'
  );

  // 4. Movement event, then entry effects
  const body = snake.body.map((c) => ({ ...c }));
  ctx.events.push(
    grows
      ? { type: 'SNAKE_GREW', snakeId: snake.id, body }
      : { type: 'SNAKE_MOVED', snakeId: snake.id, end: plan.end, body }
  );
  debugLog(isResolverTraceEnabled(), '[applyMove]', snake.id, plan.end, cellToString(landing));

  applyEntryEffects(ctx, snake, plan);
}
