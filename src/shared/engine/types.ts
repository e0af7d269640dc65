import type { Cell, GroupColor, SnakeColor, SnakeEnd } from '../types/puzzle';
import type { Board } from './board';
import type { LinkRegistry } from './linkRegistry';
import type { PuzzleRules } from './rulesConfig';

// Re-export types used in the engine interface
export type { Cell, GroupColor, SnakeColor, SnakeEnd };

export type EntityId = number;
export type SnakeId = number;

// ═══════════════════════════════════════════════════════════════════════════
// ENTITIES
// ═══════════════════════════════════════════════════════════════════════════

interface PlacedEntity {
  readonly id: EntityId;
  readonly position: Cell;
}

export interface WallEntity extends PlacedEntity {
  readonly kind: 'wall';
}

export interface FruitEntity extends PlacedEntity {
  readonly kind: 'fruit';
  readonly colors: readonly SnakeColor[];
}

export interface ExitEntity extends PlacedEntity {
  readonly kind: 'exit';
  readonly color: SnakeColor;
  readonly minLength: number;
}

export interface HoleEntity extends PlacedEntity {
  readonly kind: 'hole';
}

export interface PressurePlateEntity extends PlacedEntity {
  readonly kind: 'pressure_plate';
  readonly color: GroupColor;
  active: boolean;
}

export interface LiftGateEntity extends PlacedEntity {
  readonly kind: 'lift_gate';
  readonly color: GroupColor;
  open: boolean;
}

export interface LaserGateEntity extends PlacedEntity {
  readonly kind: 'laser_gate';
  readonly color: GroupColor;
  active: boolean;
}

export interface PortalEntity extends PlacedEntity {
  readonly kind: 'portal';
  readonly color: string;
  /** Set once by the link registry; unpaired portals keep it undefined. */
  linkedPortalId: EntityId | undefined;
  active: boolean;
}

/**
 * Multi-cell pushables. The footprint is replaced in place on relocation so
 * the id stays stable for collaborators correlating events.
 */
export interface BoxEntity {
  readonly id: EntityId;
  readonly kind: 'box';
  cells: Cell[];
}

export interface IceCubeEntity {
  readonly id: EntityId;
  readonly kind: 'ice_cube';
  cells: Cell[];
}

export type Entity =
  | WallEntity
  | FruitEntity
  | ExitEntity
  | BoxEntity
  | IceCubeEntity
  | HoleEntity
  | PressurePlateEntity
  | LiftGateEntity
  | LaserGateEntity
  | PortalEntity;

export type EntityKind = Entity['kind'];

export type EntityOfKind<K extends EntityKind> = Extract<Entity, { kind: K }>;

export type PushableEntity = BoxEntity | IceCubeEntity;

export interface Snake {
  readonly id: SnakeId;
  readonly color: SnakeColor;
  /** Head first, tail last; never empty while the snake is in play. */
  body: Cell[];
}

// ═══════════════════════════════════════════════════════════════════════════
// STATE
// ═══════════════════════════════════════════════════════════════════════════

export type PuzzleStatus = 'playing' | 'won';

/**
 * Live simulation state. Owned by a single PuzzleEngine and mutated only by
 * the mutators and the state refresher.
 */
export interface PuzzleState {
  readonly levelId: string;
  readonly board: Board;
  readonly snakes: Map<SnakeId, Snake>;
  readonly links: LinkRegistry;
  readonly rules: PuzzleRules;
  status: PuzzleStatus;
  moveCount: number;
}

// ═══════════════════════════════════════════════════════════════════════════
// MOVE REQUESTS
// ═══════════════════════════════════════════════════════════════════════════

export interface MoveRequest {
  snakeId: SnakeId;
  end: SnakeEnd;
  /** Raw target cell; the wrapping color may pass out-of-bounds cells. */
  target: Cell;
}

/** Advisory signals supplied by the caller for one resolution. */
export interface ResolverContext {
  presentationBusy: boolean;
}

/**
 * Computed displacement of a pushed box or slid ice cube. `from` and `to`
 * are index-aligned footprints.
 */
export interface ObjectDisplacement {
  entityId: EntityId;
  kind: PushableEntity['kind'];
  from: Cell[];
  to: Cell[];
  /** The whole destination footprint lies over holes. */
  fallsIntoHoles: boolean;
}

/**
 * Everything the mutator needs to commit a validated move. Produced by
 * validateMove without touching state.
 */
export interface MovePlan {
  snakeId: SnakeId;
  end: SnakeEnd;
  start: Cell;
  /** Target after wrapping. */
  target: Cell;
  direction: Cell;
  displacement?: ObjectDisplacement | undefined;
  /** Linked portal cell the moved end jumps to on commit. */
  teleportTo?: Cell | undefined;
  /** Cell the moved end occupies after the move. */
  finalCell: Cell;
  consumedFruitId?: EntityId | undefined;
}

// ═══════════════════════════════════════════════════════════════════════════
// VALIDATION OUTCOME
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Move rejection codes. Rejections are ordinary results, never exceptions.
 */
export enum MoveRejectionCode {
  /** Presentation layer is animating; retry later. */
  ANIMATION_IN_PROGRESS = 'ANIMATION_IN_PROGRESS',
  /** Tail move attempted by a snake color that cannot reverse. */
  ILLEGAL_END = 'ILLEGAL_END',
  NOT_ADJACENT = 'NOT_ADJACENT',
  /** Wall, closed gate, hole, snake, or unsupported push/slide. */
  OBSTRUCTED = 'OBSTRUCTED',
  /** The target entity refused entry (wrong color, tail into fruit, short snake). */
  INTERACTION_DENIED = 'INTERACTION_DENIED',
  UNKNOWN_SNAKE = 'UNKNOWN_SNAKE',
  /** The level is already won. */
  LEVEL_NOT_ACTIVE = 'LEVEL_NOT_ACTIVE',
}

export type ValidationOutcome<T = void> =
  | { valid: true; data: T }
  | { valid: false; code: MoveRejectionCode; reason: string; context?: Record<string, unknown> };

/**
 * Type guard to check if a ValidationOutcome is successful.
 */
export function isValidOutcome<T>(
  outcome: ValidationOutcome<T>
): outcome is { valid: true; data: T } {
  return outcome.valid === true;
}

export function validOutcome<T>(data: T): ValidationOutcome<T> {
  return { valid: true, data };
}

export function invalidOutcome<T = void>(
  code: MoveRejectionCode,
  reason: string,
  context?: Record<string, unknown>
): ValidationOutcome<T> {
  return { valid: false, code, reason, context };
}

export type MoveResolution =
  | { accepted: true; plan: MovePlan }
  | {
      accepted: false;
      code: MoveRejectionCode;
      reason: string;
      context?: Record<string, unknown> | undefined;
    };

// ═══════════════════════════════════════════════════════════════════════════
// EVENTS
// ═══════════════════════════════════════════════════════════════════════════

export type PuzzleEvent =
  | {
      type: 'ENTITY_RELOCATED';
      entityId: EntityId;
      kind: PushableEntity['kind'];
      from: Cell[];
      to: Cell[];
    }
  | {
      type: 'ENTITY_DESTROYED';
      entityId: EntityId;
      kind: PushableEntity['kind'];
      cells: Cell[];
      cause: 'laser';
    }
  | { type: 'SNAKE_MOVED'; snakeId: SnakeId; end: SnakeEnd; body: Cell[] }
  | { type: 'SNAKE_GREW'; snakeId: SnakeId; body: Cell[] }
  | { type: 'SNAKE_SLICED'; snakeId: SnakeId; at: Cell; body: Cell[] }
  | { type: 'SNAKE_REMOVED'; snakeId: SnakeId; reason: 'exited' | 'sliced' }
  | { type: 'FRUIT_CONSUMED'; fruitId: EntityId; position: Cell; snakeId: SnakeId }
  | { type: 'FRUIT_SPAWNED'; fruitId: EntityId; position: Cell; colors: SnakeColor[] }
  | { type: 'EXIT_CONSUMED'; exitId: EntityId; position: Cell; snakeId: SnakeId }
  | {
      type: 'HOLE_FILLED';
      holeId: EntityId;
      holePosition: Cell;
      fillerId: EntityId;
      fillerPosition: Cell;
    }
  | {
      type: 'PLATE_STATE_CHANGED';
      plateId: EntityId;
      position: Cell;
      color: GroupColor;
      active: boolean;
    }
  | {
      type: 'LIFT_GATE_STATE_CHANGED';
      gateId: EntityId;
      position: Cell;
      color: GroupColor;
      open: boolean;
    }
  | {
      type: 'LASER_GATE_STATE_CHANGED';
      gateId: EntityId;
      position: Cell;
      color: GroupColor;
      active: boolean;
    }
  | { type: 'PORTAL_STATE_CHANGED'; portalId: EntityId; position: Cell; active: boolean }
  | { type: 'LEVEL_WON'; levelId: string; moveCount: number };

export type PuzzleEventType = PuzzleEvent['type'];

/**
 * Mutation context shared by mutators and the refresher: the state being
 * mutated and the ordered event buffer it appends to.
 */
export interface MutationContext {
  readonly state: PuzzleState;
  readonly events: PuzzleEvent[];
}
