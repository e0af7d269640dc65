// =============================================================================
// PUZZLE ENGINE - PUBLIC API
// =============================================================================
// Hosts (the server session, tools, tests) should import from this file only.
//
// - NARROW: only what a host needs to load a level, resolve moves and read
//   events back
// - SYNCHRONOUS: one move is validated, committed and refreshed per call
// =============================================================================

// =============================================================================
// CORE TYPES
// =============================================================================

export type {
  Cell,
  SnakeColor,
  GroupColor,
  SnakeEnd,
  LevelData,
  SnakeRecord,
  FruitRecord,
  ExitRecord,
  GroupedCellRecord,
  PortalRecord,
} from '../types/puzzle';
export {
  SNAKE_COLORS,
  GROUP_COLORS,
  cellToString,
  cellsEqual,
  containsCell,
} from '../types/puzzle';

export type {
  EntityId,
  SnakeId,
  Entity,
  EntityKind,
  EntityOfKind,
  PushableEntity,
  Snake,
  PuzzleState,
  PuzzleStatus,
  MoveRequest,
  ResolverContext,
  MovePlan,
  ObjectDisplacement,
  MoveResolution,
  ValidationOutcome,
  PuzzleEvent,
  PuzzleEventType,
} from './types';
export { MoveRejectionCode, isValidOutcome } from './types';

// =============================================================================
// ENGINE
// =============================================================================

export { PuzzleEngine } from './PuzzleEngine';
export type { PuzzleSnapshot, SnakeSnapshot } from './PuzzleEngine';
export { createInitialState } from './initialState';
export { validateMove } from './validators/MoveValidator';
export { planBoxPush, planIceSlide } from './validators/PushValidator';
export { applyMove } from './mutators/MoveMutator';
export { refreshState } from './stateRefresher';

// =============================================================================
// BUILDING BLOCKS
// =============================================================================

export { Board, OUT_OF_BOUNDS_WALL } from './board';
export { canEnter, blocksSnake, blocksObject, footprintOf } from './entityCatalog';
export type { Mover } from './entityCatalog';
export { buildLinkRegistry, isGroupSatisfied } from './linkRegistry';
export type { LinkRegistry } from './linkRegistry';
export { DEFAULT_RULES, resolveRules } from './rulesConfig';
export type { PuzzleRules } from './rulesConfig';

// =============================================================================
// DIAGNOSTICS
// =============================================================================

export { formatCell, formatMoveRequest, formatRejection, renderBoard } from './notation';

// =============================================================================
// ERRORS
// =============================================================================

export {
  EngineError,
  EngineErrorCode,
  InvalidState,
  BoardConstraintViolation,
  LevelDataError,
  isEngineError,
  isInvalidState,
  isBoardConstraintViolation,
  isLevelDataError,
  wrapEngineError,
} from './errors';
export type { EngineErrorJSON } from './errors';
