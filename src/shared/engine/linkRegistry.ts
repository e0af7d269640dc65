import type { GroupColor } from '../types/puzzle';
import type { Board } from './board';
import { EngineErrorCode, InvalidState } from './errors';
import type {
  EntityId,
  LaserGateEntity,
  LiftGateEntity,
  PortalEntity,
  PressurePlateEntity,
} from './types';

/**
 * Link Registry
 *
 * Built once per level load. Portals pair up by color (exactly two per
 * color; a lone portal stays inert) and plates/gates are grouped by their
 * group color. The registry holds ids; entity records stay in the board
 * arena.
 */
export interface LinkRegistry {
  readonly portalLinks: ReadonlyMap<EntityId, EntityId>;
  readonly portalIds: readonly EntityId[];
  readonly platesByColor: ReadonlyMap<GroupColor, readonly EntityId[]>;
  readonly liftGatesByColor: ReadonlyMap<GroupColor, readonly EntityId[]>;
  readonly laserGatesByColor: ReadonlyMap<GroupColor, readonly EntityId[]>;
}

function groupIds<T extends { id: EntityId; color: GroupColor }>(
  entities: readonly T[]
): Map<GroupColor, EntityId[]> {
  const groups = new Map<GroupColor, EntityId[]>();
  for (const entity of entities) {
    const list = groups.get(entity.color) ?? [];
    list.push(entity.id);
    groups.set(entity.color, list);
  }
  return groups;
}

/**
 * Pair portals and group plates/gates. Also writes `linkedPortalId` on both
 * ends of every pair, so a portal is either fully linked or not at all.
 */
export function buildLinkRegistry(board: Board): LinkRegistry {
  const portals = board.entitiesOfKind('portal');
  const portalsByColor = new Map<string, PortalEntity[]>();
  for (const portal of portals) {
    const list = portalsByColor.get(portal.color) ?? [];
    list.push(portal);
    portalsByColor.set(portal.color, list);
  }

  const portalLinks = new Map<EntityId, EntityId>();
  for (const [color, group] of portalsByColor) {
    if (group.length > 2) {
      throw new InvalidState(
        EngineErrorCode.STATE_PORTAL_GROUP_OVERSIZED,
        `Portal color "${color}" has ${group.length} endpoints; a pair has exactly two`,
        { color, portalIds: group.map((p) => p.id) },
        'LinkRegistry'
      );
    }
    const [a, b] = group;
    if (a && b) {
      a.linkedPortalId = b.id;
      b.linkedPortalId = a.id;
      portalLinks.set(a.id, b.id);
      portalLinks.set(b.id, a.id);
    } else if (a) {
      a.linkedPortalId = undefined;
    }
  }

  return {
    portalLinks,
    portalIds: portals.map((p) => p.id),
    platesByColor: groupIds(board.entitiesOfKind('pressure_plate')),
    liftGatesByColor: groupIds(board.entitiesOfKind('lift_gate')),
    laserGatesByColor: groupIds(board.entitiesOfKind('laser_gate')),
  };
}

function resolveIds<T>(ids: readonly EntityId[] | undefined, lookup: (id: EntityId) => T | undefined): T[] {
  const result: T[] = [];
  for (const id of ids ?? []) {
    const entity = lookup(id);
    if (entity !== undefined) result.push(entity);
  }
  return result;
}

export function linkedPortalOf(
  registry: LinkRegistry,
  board: Board,
  portal: PortalEntity
): PortalEntity | undefined {
  const linkedId = registry.portalLinks.get(portal.id);
  if (linkedId === undefined) return undefined;
  const linked = board.entity(linkedId);
  return linked?.kind === 'portal' ? linked : undefined;
}

export function portalsOf(registry: LinkRegistry, board: Board): PortalEntity[] {
  return resolveIds(registry.portalIds, (id) => {
    const e = board.entity(id);
    return e?.kind === 'portal' ? e : undefined;
  });
}

export function platesOf(
  registry: LinkRegistry,
  board: Board,
  color: GroupColor
): PressurePlateEntity[] {
  return resolveIds(registry.platesByColor.get(color), (id) => {
    const e = board.entity(id);
    return e?.kind === 'pressure_plate' ? e : undefined;
  });
}

export function liftGatesOf(
  registry: LinkRegistry,
  board: Board,
  color: GroupColor
): LiftGateEntity[] {
  return resolveIds(registry.liftGatesByColor.get(color), (id) => {
    const e = board.entity(id);
    return e?.kind === 'lift_gate' ? e : undefined;
  });
}

export function laserGatesOf(
  registry: LinkRegistry,
  board: Board,
  color: GroupColor
): LaserGateEntity[] {
  return resolveIds(registry.laserGatesByColor.get(color), (id) => {
    const e = board.entity(id);
    return e?.kind === 'laser_gate' ? e : undefined;
  });
}

/** Group colors that drive at least one gate, in first-seen order. */
export function gateGroupColors(registry: LinkRegistry): GroupColor[] {
  const colors: GroupColor[] = [];
  for (const color of [...registry.liftGatesByColor.keys(), ...registry.laserGatesByColor.keys()]) {
    if (!colors.includes(color)) colors.push(color);
  }
  return colors;
}

/**
 * A group is satisfied when it has at least one plate and every plate is
 * pressed. Gates with no plates in their color never open / never disarm.
 */
export function isGroupSatisfied(
  registry: LinkRegistry,
  board: Board,
  color: GroupColor
): boolean {
  const plates = platesOf(registry, board, color);
  return plates.length > 0 && plates.every((p) => p.active);
}
