import { debugLog, isResolverTraceEnabled } from '../../utils/envFlags';
import { EngineErrorCode, InvalidState, entityNotFound } from '../errors';
import { isPushable } from '../entityCatalog';
import type { MutationContext, ObjectDisplacement, PushableEntity } from '../types';

function requirePushable(ctx: MutationContext, displacement: ObjectDisplacement): PushableEntity {
  const entity = ctx.state.board.entity(displacement.entityId);
  if (!entity) {
    throw entityNotFound('entity', { entityId: displacement.entityId }, 'ObjectMutator');
  }
  if (!isPushable(entity)) {
    throw new InvalidState(
      EngineErrorCode.STATE_ENTITY_NOT_FOUND,
      `Entity ${entity.id} is a ${entity.kind}, not a pushable object`,
      { entityId: entity.id },
      'ObjectMutator'
    );
  }
  return entity;
}

/**
 * Destroy an object whose entire footprint stands on active laser gates.
 * Partial overlap leaves it alone. Returns true when it was destroyed.
 */
export function destroyIfOnActiveLasers(ctx: MutationContext, entity: PushableEntity): boolean {
  const { board } = ctx.state;
  const lethal = entity.cells.every((cell) => {
    const laser = board.firstOfKind(cell, 'laser_gate');
    return laser !== undefined && laser.active;
  });
  if (!lethal) return false;

  board.remove(entity.id);
  ctx.events.push({
    type: 'ENTITY_DESTROYED',
    entityId: entity.id,
    kind: entity.kind,
    cells: entity.cells.map((c) => ({ ...c })),
    cause: 'laser',
  });
  debugLog(isResolverTraceEnabled(), '[ObjectMutator] laser destroyed', entity.id);
  return true;
}

/**
 * Drop an object into the holes under its landing footprint. Each hole is
 * consumed and reported against the footprint cell that filled it; the
 * object itself leaves the board without a relocation event.
 */
function fillHoles(ctx: MutationContext, entity: PushableEntity, displacement: ObjectDisplacement): void {
  const { board } = ctx.state;
  displacement.to.forEach((cell, index) => {
    const hole = board.firstOfKind(cell, 'hole');
    if (!hole) return;
    ctx.events.push({
      type: 'HOLE_FILLED',
      holeId: hole.id,
      holePosition: { ...hole.position },
      fillerId: entity.id,
      fillerPosition: { ...(displacement.from[index] ?? cell) },
    });
    board.remove(hole.id);
  });
  board.remove(entity.id);
}

/**
 * Commit a planned push or slide: relocate the object (keeping its id), then
 * resolve hole and laser hazards under the new footprint.
 */
export function applyDisplacement(ctx: MutationContext, displacement: ObjectDisplacement): void {
  const entity = requirePushable(ctx, displacement);

  if (displacement.fallsIntoHoles) {
    fillHoles(ctx, entity, displacement);
    return;
  }

  ctx.state.board.relocate(entity.id, displacement.to);
  ctx.events.push({
    type: 'ENTITY_RELOCATED',
    entityId: entity.id,
    kind: entity.kind,
    from: displacement.from.map((c) => ({ ...c })),
    to: displacement.to.map((c) => ({ ...c })),
  });
  destroyIfOnActiveLasers(ctx, entity);
}
