import { containsCell } from '../types/puzzle';
import { debugLog, isResolverTraceEnabled } from '../utils/envFlags';
import {
  gateGroupColors,
  isGroupSatisfied,
  laserGatesOf,
  liftGatesOf,
  linkedPortalOf,
  portalsOf,
} from './linkRegistry';
import { destroyIfOnActiveLasers } from './mutators/ObjectMutator';
import { sliceSnakeAt } from './mutators/SnakeMutator';
import { isPushable } from './entityCatalog';
import type { LaserGateEntity, MutationContext, PortalEntity, PuzzleState } from './types';
import { isCellOccupied, isPortalDestinationBlocked } from './validators/utils';

/**
 * State Refresher
 *
 * Re-derives every stateful fixture from board occupancy after a committed
 * move: plates, then the gates they drive, then portals. Only transitions
 * produce events.
 */

function updatePlates(ctx: MutationContext): void {
  for (const plate of ctx.state.board.entitiesOfKind('pressure_plate')) {
    const active = isCellOccupied(ctx.state, plate.position);
    if (active === plate.active) continue;
    plate.active = active;
    ctx.events.push({
      type: 'PLATE_STATE_CHANGED',
      plateId: plate.id,
      position: { ...plate.position },
      color: plate.color,
      active,
    });
  }
}

/**
 * Kill-on-arm: anything standing on a laser the moment it switches on is
 * cut or destroyed. Returns true when something was hit.
 */
function armLaser(ctx: MutationContext, laser: LaserGateEntity): boolean {
  const { state } = ctx;
  let hit = false;

  const snakes = [...state.snakes.values()].filter((s) => containsCell(s.body, laser.position));
  for (const snake of snakes) {
    hit = sliceSnakeAt(ctx, snake, laser.position) || hit;
  }
  for (const entity of state.board.get(laser.position)) {
    if (isPushable(entity)) {
      hit = destroyIfOnActiveLasers(ctx, entity) || hit;
    }
  }
  return hit;
}

/**
 * Lift gates open when their group is satisfied and otherwise close, unless
 * something stands in the doorway. Laser gates are the inverse. Returns true
 * when arming a laser changed occupancy, which can flip plates again.
 */
function updateGates(ctx: MutationContext): boolean {
  const { state } = ctx;
  const { board, links } = state;
  let occupancyChanged = false;

  for (const color of gateGroupColors(links)) {
    const satisfied = isGroupSatisfied(links, board, color);

    for (const gate of liftGatesOf(links, board, color)) {
      const open = satisfied || (gate.open && isCellOccupied(state, gate.position));
      if (open === gate.open) continue;
      gate.open = open;
      ctx.events.push({
        type: 'LIFT_GATE_STATE_CHANGED',
        gateId: gate.id,
        position: { ...gate.position },
        color,
        open,
      });
    }

    for (const laser of laserGatesOf(links, board, color)) {
      const active = !satisfied;
      if (active === laser.active) continue;
      laser.active = active;
      ctx.events.push({
        type: 'LASER_GATE_STATE_CHANGED',
        gateId: laser.id,
        position: { ...laser.position },
        color,
        active,
      });
      if (active) {
        occupancyChanged = armLaser(ctx, laser) || occupancyChanged;
      }
    }
  }
  return occupancyChanged;
}

function portalShouldBeActive(state: PuzzleState, portal: PortalEntity): boolean {
  const linked = linkedPortalOf(state.links, state.board, portal);
  return linked !== undefined && !isPortalDestinationBlocked(state, linked.position);
}

function updatePortals(ctx: MutationContext): void {
  for (const portal of portalsOf(ctx.state.links, ctx.state.board)) {
    const active = portalShouldBeActive(ctx.state, portal);
    if (active === portal.active) continue;
    portal.active = active;
    ctx.events.push({
      type: 'PORTAL_STATE_CHANGED',
      portalId: portal.id,
      position: { ...portal.position },
      active,
    });
  }
}

/**
 * Bring every plate, gate and portal in line with the board. Plates and
 * gates re-run while arming lasers keeps changing occupancy, bounded by
 * `rules.maxRefreshPasses`.
 */
export function refreshState(ctx: MutationContext): void {
  const { maxRefreshPasses } = ctx.state.rules;
  for (let pass = 0; pass < maxRefreshPasses; pass++) {
    updatePlates(ctx);
    if (!updateGates(ctx)) break;
    debugLog(isResolverTraceEnabled(), '[refreshState] laser hit, re-running pass', pass + 1);
  }
  updatePortals(ctx);
}

/**
 * Derived state for a freshly loaded level, without events. Lift gates
 * standing on something start open; lasers start armed without cutting
 * what already stands on them.
 */
export function primeDerivedState(state: PuzzleState): void {
  const { board, links } = state;
  for (const plate of board.entitiesOfKind('pressure_plate')) {
    plate.active = isCellOccupied(state, plate.position);
  }
  for (const color of gateGroupColors(links)) {
    const satisfied = isGroupSatisfied(links, board, color);
    for (const gate of liftGatesOf(links, board, color)) {
      gate.open = satisfied || isCellOccupied(state, gate.position);
    }
    for (const laser of laserGatesOf(links, board, color)) {
      laser.active = !satisfied;
    }
  }
  for (const portal of portalsOf(links, board)) {
    portal.active = portalShouldBeActive(state, portal);
  }
}
