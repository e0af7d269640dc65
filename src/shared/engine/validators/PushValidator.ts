import { containsCell, type Cell } from '../../types/puzzle';
import { debugLog, isResolverTraceEnabled } from '../../utils/envFlags';
import { sameFootprint, subtractCells, translateCells } from '../core';
import { linkedPortalOf } from '../linkRegistry';
import {
  BoxEntity,
  IceCubeEntity,
  invalidOutcome,
  MoveRejectionCode,
  ObjectDisplacement,
  PushableEntity,
  PuzzleState,
  ValidationOutcome,
  validOutcome,
} from '../types';
import { isLocationFreeForObject } from './utils';

/**
 * Shift a footprint one step. When a leading cell (one the object does not
 * already cover) lands on an active, paired portal, the whole footprint is
 * offset so that cell sits on the linked portal instead. Returns undefined
 * when any newly covered cell is blocked for objects.
 */
export function stepFootprint(
  state: PuzzleState,
  entity: PushableEntity,
  cells: readonly Cell[],
  direction: Cell
): Cell[] | undefined {
  let next = translateCells(cells, direction);

  for (const cell of next) {
    if (containsCell(cells, cell)) continue;
    const portal = state.board.firstOfKind(cell, 'portal');
    if (!portal || !portal.active) continue;
    const linked = linkedPortalOf(state.links, state.board, portal);
    if (!linked) continue;
    next = translateCells(next, subtractCells(linked.position, cell));
    break;
  }

  for (const cell of next) {
    if (containsCell(cells, cell)) continue;
    if (!isLocationFreeForObject(state, cell, entity.id)) return undefined;
  }
  return next;
}

function fallsIntoHoles(state: PuzzleState, cells: readonly Cell[]): boolean {
  return cells.every((c) => state.board.hasKind(c, 'hole'));
}

/**
 * Box push: a single hop. Holes and lasers under the landing footprint are
 * legal; the mutator resolves them after relocation.
 */
export function planBoxPush(
  state: PuzzleState,
  box: BoxEntity,
  direction: Cell
): ValidationOutcome<ObjectDisplacement> {
  const to = stepFootprint(state, box, box.cells, direction);
  if (!to) {
    debugLog(isResolverTraceEnabled(), '[planBoxPush] blocked', box.id, direction);
    return invalidOutcome(MoveRejectionCode.OBSTRUCTED, 'Box cannot be pushed that way', {
      entityId: box.id,
    });
  }
  return validOutcome({
    entityId: box.id,
    kind: 'box',
    from: box.cells.map((c) => ({ ...c })),
    to,
    fallsIntoHoles: fallsIntoHoles(state, to),
  });
}

/**
 * Ice slide: repeat single steps until blocked, until the footprint is wholly
 * over holes, or until the slide bound is hit. Portals keep momentum.
 */
export function planIceSlide(
  state: PuzzleState,
  cube: IceCubeEntity,
  direction: Cell
): ValidationOutcome<ObjectDisplacement> {
  let cells: Cell[] = cube.cells.map((c) => ({ ...c }));
  let steps = 0;
  let falls = false;

  while (steps < state.rules.maxSlideSteps) {
    const next = stepFootprint(state, cube, cells, direction);
    if (!next) break;
    cells = next;
    steps++;
    if (fallsIntoHoles(state, cells)) {
      falls = true;
      break;
    }
  }

  if (steps === 0 || sameFootprint(cells, cube.cells)) {
    debugLog(isResolverTraceEnabled(), '[planIceSlide] no movement', cube.id, direction);
    return invalidOutcome(MoveRejectionCode.OBSTRUCTED, 'Ice cube cannot slide that way', {
      entityId: cube.id,
    });
  }

  return validOutcome({
    entityId: cube.id,
    kind: 'ice_cube',
    from: cube.cells.map((c) => ({ ...c })),
    to: cells,
    fallsIntoHoles: falls,
  });
}

/** Dispatch to the push or slide protocol by kind. */
export function planDisplacement(
  state: PuzzleState,
  entity: PushableEntity,
  direction: Cell
): ValidationOutcome<ObjectDisplacement> {
  return entity.kind === 'box'
    ? planBoxPush(state, entity, direction)
    : planIceSlide(state, entity, direction);
}
