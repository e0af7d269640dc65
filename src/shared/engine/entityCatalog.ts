import type { Cell, SnakeColor, SnakeEnd } from '../types/puzzle';
import type { Entity, EntityKind, EntityOfKind, PushableEntity } from './types';

/**
 * Entity Catalog
 *
 * The closed set of entity kinds and the interaction contract every kind
 * exposes to the move resolver. All dispatch is an exhaustive switch over
 * `kind`, so adding a kind without updating each site fails to compile.
 *
 * Entry precedence applied by the resolver (highest first):
 *   wall → lift gate → box / ice cube → hole → laser gate → fruit → exit
 *   → portal → pressure plate / floor
 */

/** What an entity sees of the snake end trying to enter its cell. */
export interface Mover {
  color: SnakeColor;
  end: SnakeEnd;
  /** Body length before the move. */
  length: number;
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled entity variant: ${JSON.stringify(value)}`);
}

export function isKind<K extends EntityKind>(entity: Entity, kind: K): entity is EntityOfKind<K> {
  return entity.kind === kind;
}

export function isPushable(entity: Entity): entity is PushableEntity {
  return entity.kind === 'box' || entity.kind === 'ice_cube';
}

/** Cells an entity occupies. Single-cell kinds report their position. */
export function footprintOf(entity: Entity): readonly Cell[] {
  switch (entity.kind) {
    case 'box':
    case 'ice_cube':
      return entity.cells;
    case 'wall':
    case 'fruit':
    case 'exit':
    case 'hole':
    case 'pressure_plate':
    case 'lift_gate':
    case 'laser_gate':
    case 'portal':
      return [entity.position];
    default:
      return assertNever(entity);
  }
}

/**
 * Pure entry predicate for a snake end stepping onto the entity's cell.
 *
 * Portals answer true here: whether the linked destination accepts the
 * mover is decided by the resolver, which re-runs its checks there.
 */
export function canEnter(entity: Entity, mover: Mover): boolean {
  switch (entity.kind) {
    case 'wall':
      return false;
    case 'lift_gate':
      return entity.open;
    case 'box':
    case 'ice_cube':
      return false;
    case 'hole':
      return false;
    case 'laser_gate':
      return true;
    case 'fruit':
      return mover.end === 'head' && entity.colors.includes(mover.color);
    case 'exit':
      return (
        mover.end === 'head' && mover.color === entity.color && mover.length >= entity.minLength
      );
    case 'portal':
      return true;
    case 'pressure_plate':
      return true;
    default:
      return assertNever(entity);
  }
}

/**
 * Whether the entity stops a snake outright (as opposed to refusing a
 * particular mover). Used for portal destinations and blocked-cell checks.
 */
export function blocksSnake(entity: Entity): boolean {
  switch (entity.kind) {
    case 'wall':
    case 'box':
    case 'ice_cube':
    case 'hole':
      return true;
    case 'lift_gate':
      return !entity.open;
    case 'fruit':
    case 'exit':
    case 'laser_gate':
    case 'portal':
    case 'pressure_plate':
      return false;
    default:
      return assertNever(entity);
  }
}

/**
 * Whether a pushed or sliding object may not move onto the entity's cell.
 * Holes and lasers never block objects: the object lands and the hazard
 * pass decides its fate.
 */
export function blocksObject(entity: Entity): boolean {
  switch (entity.kind) {
    case 'wall':
    case 'box':
    case 'ice_cube':
    case 'fruit':
    case 'exit':
      return true;
    case 'lift_gate':
      return !entity.open;
    case 'hole':
    case 'laser_gate':
    case 'portal':
    case 'pressure_plate':
      return false;
    default:
      return assertNever(entity);
  }
}

/**
 * Whether the entity makes a portal's linked cell unusable, which switches
 * the portal off.
 */
export function blocksPortalDestination(entity: Entity): boolean {
  switch (entity.kind) {
    case 'wall':
    case 'box':
    case 'ice_cube':
      return true;
    case 'lift_gate':
      return !entity.open;
    case 'fruit':
    case 'exit':
    case 'hole':
    case 'laser_gate':
    case 'portal':
    case 'pressure_plate':
      return false;
    default:
      return assertNever(entity);
  }
}
