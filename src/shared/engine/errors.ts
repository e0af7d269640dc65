/**
 * Engine Domain Errors - Structured error types for the puzzle engine layer
 *
 * Move rejections are NOT errors: they are returned as ValidationOutcome /
 * MoveResolution values (see ./types). The classes here cover faults only:
 * level data the engine cannot be constructed from, broken invariants, and
 * misuse of the resolver state machine.
 *
 * Error Categories:
 * - **InvalidState**: Corrupted or inconsistent puzzle state (snake bodies, links)
 * - **BoardConstraintViolation**: Dimensions, bounds and footprint problems
 * - **LevelDataError**: Level records that fail schema validation or lookup
 *
 * Usage:
 * ```typescript
 * import { InvalidState, EngineErrorCode } from './errors';
 *
 * throw new InvalidState(
 *   EngineErrorCode.STATE_SNAKE_EMPTY_BODY,
 *   'Snake body must contain at least one cell',
 *   { snakeIndex: 2 }
 * );
 * ```
 *
 * @module EngineErrors
 */

import { areDevAssertionsEnabled } from '../utils/envFlags';

// =============================================================================
// ERROR CODES
// =============================================================================

/**
 * Enumeration of all engine domain error codes.
 *
 * Error codes are prefixed by category:
 * - STATE_*: Puzzle state corruption/inconsistency
 * - BOARD_*: Board geometry issues
 * - LEVEL_*: Level data problems
 * - FSM_*: Resolver state machine misuse
 * - INTERNAL_*: Bugs
 */
export enum EngineErrorCode {
  // State Errors
  /** A snake was defined with no body cells */
  STATE_SNAKE_EMPTY_BODY = 'STATE_SNAKE_EMPTY_BODY',
  /** A snake body lists the same cell twice */
  STATE_SNAKE_DUPLICATE_CELL = 'STATE_SNAKE_DUPLICATE_CELL',
  /** Two snakes share a cell, or a snake starts inside a wall */
  STATE_SNAKE_OVERLAP = 'STATE_SNAKE_OVERLAP',
  /** More than two portals share one portal color */
  STATE_PORTAL_GROUP_OVERSIZED = 'STATE_PORTAL_GROUP_OVERSIZED',
  /** Expected entity or snake id is not present */
  STATE_ENTITY_NOT_FOUND = 'STATE_ENTITY_NOT_FOUND',

  // Board Constraint Violations
  /** Width or height is not a positive integer */
  BOARD_INVALID_DIMENSIONS = 'BOARD_INVALID_DIMENSIONS',
  /** A referenced cell lies outside the board */
  BOARD_CELL_OUT_OF_BOUNDS = 'BOARD_CELL_OUT_OF_BOUNDS',
  /** A box or ice cube footprint is empty or repeats a cell */
  BOARD_INVALID_FOOTPRINT = 'BOARD_INVALID_FOOTPRINT',

  // Level Data Errors
  /** Raw level data failed schema validation */
  LEVEL_SCHEMA_INVALID = 'LEVEL_SCHEMA_INVALID',
  /** No level file exists for the requested id */
  LEVEL_NOT_FOUND = 'LEVEL_NOT_FOUND',

  // FSM Errors
  /** Resolver asked to start while a resolution is in progress */
  FSM_INVALID_TRANSITION = 'FSM_INVALID_TRANSITION',

  // Internal Errors - should never happen in correct code
  /** Assertion failed - indicates a bug */
  INTERNAL_ASSERTION_FAILED = 'INTERNAL_ASSERTION_FAILED',
}

/**
 * Maps error codes to human-readable category descriptions.
 */
export const ERROR_CATEGORY_DESCRIPTIONS: Record<string, string> = {
  STATE_: 'Corrupted or unexpected puzzle state',
  BOARD_: 'Board geometry constraint violation',
  LEVEL_: 'Invalid or missing level data',
  FSM_: 'Invalid resolver state transition',
  INTERNAL_: 'Internal engine error (bug)',
};

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

/**
 * Base class for all engine domain errors.
 *
 * Provides:
 * - Structured error code for programmatic handling
 * - Context for debugging
 * - Domain indicator for error routing
 */
export class EngineError extends Error {
  /** Error code for programmatic handling */
  readonly code: EngineErrorCode;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  /** Domain that generated the error (e.g., 'LevelLoader', 'MoveMutator') */
  readonly domain: string;

  readonly timestamp: Date;

  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Engine'
  ) {
    super(message);
    this.name = 'EngineError';
    this.code = code;
    this.context = context;
    this.domain = domain;
    this.timestamp = new Date();

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, EngineError.prototype);
  }

  /** Get error category from code prefix */
  get category(): string {
    const prefix = this.code.split('_')[0] + '_';
    return ERROR_CATEGORY_DESCRIPTIONS[prefix] ?? 'Unknown error category';
  }

  /** Serialize to a JSON-safe object for logging/debugging */
  toJSON(): EngineErrorJSON {
    return {
      error: true,
      type: this.name,
      code: this.code,
      message: this.message,
      domain: this.domain,
      context: this.context,
      category: this.category,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

/**
 * JSON representation of an EngineError.
 */
export interface EngineErrorJSON {
  error: true;
  type: string;
  code: string;
  message: string;
  domain: string;
  context: Record<string, unknown>;
  category: string;
  timestamp: string;
}

// =============================================================================
// SPECIFIC ERROR CLASSES
// =============================================================================

/**
 * Error for corrupted or unexpected puzzle state.
 *
 * Raised while constructing a level (overlapping snakes, oversized portal
 * groups) or when a mutator finds an id that should exist but does not.
 */
export class InvalidState extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'State'
  ) {
    super(code, message, context, domain);
    this.name = 'InvalidState';
    Object.setPrototypeOf(this, InvalidState.prototype);
  }
}

/**
 * Error for board geometry violations: bad dimensions, cells outside the
 * board, malformed footprints.
 */
export class BoardConstraintViolation extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Board'
  ) {
    super(code, message, context, domain);
    this.name = 'BoardConstraintViolation';
    Object.setPrototypeOf(this, BoardConstraintViolation.prototype);
  }
}

/**
 * Error for level records that cannot be turned into LevelData.
 */
export class LevelDataError extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Level'
  ) {
    super(code, message, context, domain);
    this.name = 'LevelDataError';
    Object.setPrototypeOf(this, LevelDataError.prototype);
  }
}

// =============================================================================
// TYPE GUARDS
// =============================================================================

export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}

export function isInvalidState(error: unknown): error is InvalidState {
  return error instanceof InvalidState;
}

export function isBoardConstraintViolation(error: unknown): error is BoardConstraintViolation {
  return error instanceof BoardConstraintViolation;
}

export function isLevelDataError(error: unknown): error is LevelDataError {
  return error instanceof LevelDataError;
}

// =============================================================================
// UTILITIES
// =============================================================================

/**
 * Wrap an unknown error in an EngineError.
 *
 * Useful for catching and normalizing errors at domain boundaries.
 */
export function wrapEngineError(
  error: unknown,
  domain: string = 'Engine',
  context: Record<string, unknown> = {}
): EngineError {
  if (isEngineError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  return new EngineError(
    EngineErrorCode.INTERNAL_ASSERTION_FAILED,
    message,
    {
      ...context,
      originalStack: stack,
    },
    domain
  );
}

/**
 * Create a standard "not found" InvalidState error.
 */
export function entityNotFound(
  entityType: 'entity' | 'snake',
  context: Record<string, unknown> = {},
  domain: string = 'State'
): InvalidState {
  return new InvalidState(
    EngineErrorCode.STATE_ENTITY_NOT_FOUND,
    `${entityType.charAt(0).toUpperCase() + entityType.slice(1)} not found`,
    context,
    domain
  );
}

/**
 * Development-build assertion. Throws INTERNAL_ASSERTION_FAILED when the
 * condition fails and assertions are enabled (everywhere except production,
 * unless SNAKE_PUZZLE_DEV_ASSERTIONS overrides it).
 */
export function devAssert(
  condition: boolean,
  message: string,
  context: Record<string, unknown> = {},
  domain: string = 'Engine'
): void {
  if (condition || !areDevAssertionsEnabled()) {
    return;
  }
  throw new EngineError(EngineErrorCode.INTERNAL_ASSERTION_FAILED, message, context, domain);
}
