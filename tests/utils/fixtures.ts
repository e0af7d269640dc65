/**
 * Test Fixtures and Utilities
 * Common level builders and helpers for the puzzle engine tests
 */

import type {
  Cell,
  LevelData,
  SnakeColor,
  SnakeRecord,
} from '../../src/shared/types/puzzle';
import type { PuzzleEvent, PuzzleEventType } from '../../src/shared/engine/types';
import { createInitialState } from '../../src/shared/engine/initialState';
import { DEFAULT_RULES, type PuzzleRules } from '../../src/shared/engine/rulesConfig';
import type { PuzzleState } from '../../src/shared/engine/types';

/**
 * Cell helper - creates a cell object
 */
export function pos(x: number, y: number): Cell {
  return { x, y };
}

/**
 * Snake record from head-first cells
 */
export function snake(color: SnakeColor, ...body: Cell[]): SnakeRecord {
  return { color, body };
}

/**
 * Creates a LevelData with every list empty. Defaults to an 8x8 board.
 */
export function createTestLevel(overrides: Partial<LevelData> = {}): LevelData {
  return {
    id: 'test-level',
    width: 8,
    height: 8,
    walls: [],
    holes: [],
    boxes: [],
    iceCubes: [],
    fruits: [],
    exits: [],
    pressurePlates: [],
    liftGates: [],
    laserGates: [],
    portals: [],
    snakes: [],
    ...overrides,
  };
}

export function createTestState(
  overrides: Partial<LevelData> = {},
  rules: PuzzleRules = DEFAULT_RULES
): PuzzleState {
  return createInitialState(createTestLevel(overrides), rules);
}

export function eventTypes(events: readonly PuzzleEvent[]): PuzzleEventType[] {
  return events.map((e) => e.type);
}

/** Current body of a snake, or undefined once it left play. */
export function bodyOf(state: PuzzleState, snakeId: number): Cell[] | undefined {
  return state.snakes.get(snakeId)?.body;
}
