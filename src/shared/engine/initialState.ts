import { cellToString, type Cell, type LevelData } from '../types/puzzle';
import { hasDuplicateCells } from './core';
import { Board } from './board';
import {
  BoardConstraintViolation,
  EngineErrorCode,
  InvalidState,
} from './errors';
import { buildLinkRegistry } from './linkRegistry';
import { DEFAULT_RULES, type PuzzleRules } from './rulesConfig';
import { primeDerivedState } from './stateRefresher';
import type { PuzzleState, Snake, SnakeId } from './types';

function copyCell(cell: Cell): Cell {
  return { x: cell.x, y: cell.y };
}

function buildBoard(level: LevelData): Board {
  const board = new Board(level.width, level.height);

  for (const position of level.walls) {
    board.add({ id: board.allocateId(), kind: 'wall', position: copyCell(position) });
  }
  for (const position of level.holes) {
    board.add({ id: board.allocateId(), kind: 'hole', position: copyCell(position) });
  }
  for (const cells of level.boxes) {
    board.add({ id: board.allocateId(), kind: 'box', cells: cells.map(copyCell) });
  }
  for (const cells of level.iceCubes) {
    board.add({ id: board.allocateId(), kind: 'ice_cube', cells: cells.map(copyCell) });
  }
  for (const fruit of level.fruits) {
    board.add({
      id: board.allocateId(),
      kind: 'fruit',
      position: copyCell(fruit.position),
      colors: [...fruit.colors],
    });
  }
  for (const exit of level.exits) {
    board.add({
      id: board.allocateId(),
      kind: 'exit',
      position: copyCell(exit.position),
      color: exit.color,
      minLength: exit.minLength,
    });
  }
  for (const plate of level.pressurePlates) {
    board.add({
      id: board.allocateId(),
      kind: 'pressure_plate',
      position: copyCell(plate.position),
      color: plate.color,
      active: false,
    });
  }
  for (const gate of level.liftGates) {
    board.add({
      id: board.allocateId(),
      kind: 'lift_gate',
      position: copyCell(gate.position),
      color: gate.color,
      open: false,
    });
  }
  for (const gate of level.laserGates) {
    board.add({
      id: board.allocateId(),
      kind: 'laser_gate',
      position: copyCell(gate.position),
      color: gate.color,
      active: false,
    });
  }
  for (const portal of level.portals) {
    board.add({
      id: board.allocateId(),
      kind: 'portal',
      position: copyCell(portal.position),
      color: portal.color,
      linkedPortalId: undefined,
      active: false,
    });
  }
  return board;
}

function buildSnakes(level: LevelData, board: Board): Map<SnakeId, Snake> {
  const snakes = new Map<SnakeId, Snake>();
  const claimed = new Map<string, SnakeId>();

  level.snakes.forEach((record, id) => {
    if (record.body.length === 0) {
      throw new InvalidState(
        EngineErrorCode.STATE_SNAKE_EMPTY_BODY,
        `Snake ${id} has no body cells`,
        { snakeId: id }
      );
    }
    if (hasDuplicateCells(record.body)) {
      throw new InvalidState(
        EngineErrorCode.STATE_SNAKE_DUPLICATE_CELL,
        `Snake ${id} lists a cell twice`,
        { snakeId: id }
      );
    }
    for (const cell of record.body) {
      const key = cellToString(cell);
      if (!board.inBounds(cell)) {
        throw new BoardConstraintViolation(
          EngineErrorCode.BOARD_CELL_OUT_OF_BOUNDS,
          `Snake ${id} cell ${key} is outside the board`,
          { snakeId: id, cell }
        );
      }
      const other = claimed.get(key);
      if (other !== undefined || board.hasKind(cell, 'wall')) {
        throw new InvalidState(
          EngineErrorCode.STATE_SNAKE_OVERLAP,
          `Snake ${id} overlaps ${other !== undefined ? `snake ${other}` : 'a wall'} at ${key}`,
          { snakeId: id, cell, otherSnakeId: other }
        );
      }
      claimed.set(key, id);
    }
    snakes.set(id, { id, color: record.color, body: record.body.map(copyCell) });
  });

  return snakes;
}

/**
 * Build the live state for a level: entities get sequential ids in record
 * order (walls, holes, boxes, ice cubes, fruits, exits, plates, lift gates,
 * lasers, portals), snakes are keyed by their index, portals are paired and
 * all derived fixture state is computed without emitting events.
 */
export function createInitialState(level: LevelData, rules: PuzzleRules = DEFAULT_RULES): PuzzleState {
  const board = buildBoard(level);
  const snakes = buildSnakes(level, board);
  const links = buildLinkRegistry(board);

  const state: PuzzleState = {
    levelId: level.id,
    board,
    snakes,
    links,
    rules,
    status: 'playing',
    moveCount: 0,
  };
  primeDerivedState(state);
  return state;
}
