import { cellsEqual, containsCell, type Cell } from '../../types/puzzle';
import { debugLog, isResolverTraceEnabled } from '../../utils/envFlags';
import type { Board } from '../board';
import { addCells, planarStep, toroidalStep, wrapCell } from '../core';
import { blocksSnake, canEnter, isPushable, type Mover } from '../entityCatalog';
import { linkedPortalOf } from '../linkRegistry';
import {
  Entity,
  EntityId,
  invalidOutcome,
  MovePlan,
  MoveRejectionCode,
  MoveRequest,
  ObjectDisplacement,
  PortalEntity,
  PuzzleState,
  ResolverContext,
  Snake,
  ValidationOutcome,
  validOutcome,
} from '../types';
import { planDisplacement } from './PushValidator';
import { endCell, snakeAt } from './utils';

function reject(
  code: MoveRejectionCode,
  reason: string,
  context?: Record<string, unknown>
): ValidationOutcome<MovePlan> {
  debugLog(isResolverTraceEnabled(), '[validateMove] rejected', code, reason, context ?? {});
  return invalidOutcome(code, reason, context);
}

/**
 * A snake segment on the cell blocks entry. The single exception is a tail
 * move onto the mover's own head, where the body just shifts.
 */
function collidesWithSnake(
  state: PuzzleState,
  snake: Snake,
  request: MoveRequest,
  cell: Cell
): boolean {
  const occupant = snakeAt(state, cell);
  if (!occupant) return false;
  const head = snake.body[0];
  const ownHead =
    request.end === 'tail' && occupant.id === snake.id && head !== undefined && cellsEqual(cell, head);
  return !ownHead;
}

function isHardObstacle(entity: Entity): boolean {
  return entity.kind === 'wall' || (entity.kind === 'lift_gate' && !entity.open);
}

function firstDenied(entities: readonly Entity[], mover: Mover): Entity | undefined {
  return entities.find((e) => !canEnter(e, mover));
}

function fruitIdAt(entities: readonly Entity[], request: MoveRequest): EntityId | undefined {
  if (request.end !== 'head') return undefined;
  return entities.find((e) => e.kind === 'fruit')?.id;
}

function isGridCell(cell: Cell): boolean {
  return Number.isInteger(cell.x) && Number.isInteger(cell.y);
}

/**
 * A wrapping snake may name either the on-board neighbour or the off-board
 * cell one step past the edge; any other raw coordinate is not adjacent.
 */
function wrappingStep(board: Board, start: Cell, raw: Cell): Cell | undefined {
  const wrapped = wrapCell(raw, board.width, board.height);
  const direction = toroidalStep(start, wrapped, board.width, board.height);
  if (!direction) return undefined;
  if (board.inBounds(raw) || cellsEqual(addCells(start, direction), raw)) return direction;
  return undefined;
}

/**
 * Validate a move request against the current state and compute the full
 * plan for committing it. Never mutates; rejections are returned, not
 * thrown.
 *
 * Check order: presentation lock, level status, snake lookup, end
 * eligibility, wrapping, adjacency, snake collision, walls and closed gates,
 * pushables, holes, portals, then every remaining entity's canEnter.
 */
export function validateMove(
  state: PuzzleState,
  request: MoveRequest,
  context: ResolverContext
): ValidationOutcome<MovePlan> {
  // 1. Presentation lock
  if (context.presentationBusy) {
    return reject(MoveRejectionCode.ANIMATION_IN_PROGRESS, 'An animation is still playing');
  }

  if (state.status !== 'playing') {
    return reject(MoveRejectionCode.LEVEL_NOT_ACTIVE, 'The level is already complete', {
      status: state.status,
    });
  }

  const snake = state.snakes.get(request.snakeId);
  const start = snake ? endCell(snake, request.end) : undefined;
  if (!snake || !start) {
    return reject(MoveRejectionCode.UNKNOWN_SNAKE, `No snake with id ${request.snakeId}`, {
      snakeId: request.snakeId,
    });
  }

  // 2. End eligibility
  if (request.end === 'tail' && snake.color !== state.rules.reversibleColor) {
    return reject(MoveRejectionCode.ILLEGAL_END, `A ${snake.color} snake cannot move its tail`, {
      snakeId: snake.id,
      color: snake.color,
    });
  }

  // 3-4. Wrapping and adjacency
  const { board } = state;
  const wraps = snake.color === state.rules.wrappingColor;
  const target = wraps ? wrapCell(request.target, board.width, board.height) : request.target;
  const direction = wraps
    ? wrappingStep(board, start, request.target)
    : planarStep(start, request.target);
  if (!isGridCell(request.target) || !direction) {
    return reject(MoveRejectionCode.NOT_ADJACENT, 'Target is not one step from the moving end', {
      start,
      target: request.target,
    });
  }

  // 5. Snake collision
  if (collidesWithSnake(state, snake, request, target)) {
    return reject(MoveRejectionCode.OBSTRUCTED, 'Target is occupied by a snake', { target });
  }

  // 6. Walls, closed lift gates and out-of-bounds cells
  const entities = board.get(target);
  if (entities.some(isHardObstacle)) {
    return reject(MoveRejectionCode.OBSTRUCTED, 'Target is blocked', { target });
  }

  // 7. Push / slide
  let displacement: ObjectDisplacement | undefined;
  const pushable = entities.find(isPushable);
  if (pushable) {
    if (request.end === 'tail') {
      return reject(MoveRejectionCode.OBSTRUCTED, 'Only a head can push', {
        entityId: pushable.id,
      });
    }
    const outcome = planDisplacement(state, pushable, direction);
    if (!outcome.valid) {
      return reject(outcome.code, outcome.reason, outcome.context);
    }
    if (containsCell(outcome.data.to, target)) {
      return reject(MoveRejectionCode.OBSTRUCTED, 'Pushed object would still cover the target', {
        entityId: pushable.id,
      });
    }
    displacement = outcome.data;
  }
  const remaining = pushable ? entities.filter((e) => e.id !== pushable.id) : entities;

  // 8. Holes
  if (remaining.some((e) => e.kind === 'hole')) {
    return reject(MoveRejectionCode.OBSTRUCTED, 'Snakes cannot enter holes', { target });
  }

  const mover: Mover = { color: snake.color, end: request.end, length: snake.body.length };
  const base = { snakeId: snake.id, end: request.end, start, target, direction, displacement };

  // 9. Portals: the linked cell must accept the mover
  const portal = remaining.find((e): e is PortalEntity => e.kind === 'portal');
  if (portal) {
    const linked = linkedPortalOf(state.links, board, portal);
    if (!linked) {
      return reject(MoveRejectionCode.OBSTRUCTED, 'Portal has no partner', {
        portalId: portal.id,
      });
    }
    const destination = linked.position;
    if (collidesWithSnake(state, snake, request, destination)) {
      return reject(MoveRejectionCode.OBSTRUCTED, 'Portal exit is occupied by a snake', {
        destination,
      });
    }
    if (displacement && containsCell(displacement.to, destination)) {
      return reject(MoveRejectionCode.OBSTRUCTED, 'Portal exit is blocked by the pushed object', {
        destination,
      });
    }
    const atDestination = board.get(destination).filter((e) => e.id !== linked.id);
    if (atDestination.some(blocksSnake)) {
      return reject(MoveRejectionCode.OBSTRUCTED, 'Portal exit is blocked', { destination });
    }
    const denied = firstDenied(atDestination, mover);
    if (denied) {
      return reject(MoveRejectionCode.INTERACTION_DENIED, `Portal exit ${denied.kind} refuses entry`, {
        destination,
        entityId: denied.id,
      });
    }
    return validOutcome({
      ...base,
      teleportTo: { ...destination },
      finalCell: { ...destination },
      consumedFruitId: fruitIdAt(atDestination, request),
    });
  }

  // 10. Everything else on the cell
  const denied = firstDenied(remaining, mover);
  if (denied) {
    return reject(MoveRejectionCode.INTERACTION_DENIED, `${denied.kind} refuses entry`, {
      target,
      entityId: denied.id,
    });
  }

  return validOutcome({
    ...base,
    finalCell: { ...target },
    consumedFruitId: fruitIdAt(remaining, request),
  });
}
