import { cellToString, type Cell } from '../types/puzzle';
import { hasDuplicateCells } from './core';
import { footprintOf, isKind } from './entityCatalog';
import { BoardConstraintViolation, EngineErrorCode, entityNotFound } from './errors';
import type { Entity, EntityId, EntityKind, EntityOfKind, WallEntity } from './types';

/**
 * Returned for every out-of-bounds lookup so callers see a wall instead of
 * an exception.
 */
export const OUT_OF_BOUNDS_WALL: WallEntity = {
  id: -1,
  kind: 'wall',
  position: { x: -1, y: -1 },
};

/**
 * Board: a width×height grid of entity-id sets over an arena of entities.
 *
 * The grid stores ids only; the arena owns the entity records. A cell with
 * an empty set is open floor. Multi-cell entities are indexed under every
 * cell of their footprint.
 */
export class Board {
  readonly width: number;
  readonly height: number;

  private readonly grid: Array<Set<EntityId>>;
  private readonly arena = new Map<EntityId, Entity>();
  private nextId = 0;

  constructor(width: number, height: number) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1) {
      throw new BoardConstraintViolation(
        EngineErrorCode.BOARD_INVALID_DIMENSIONS,
        'Board dimensions must be positive integers',
        { width, height }
      );
    }
    this.width = width;
    this.height = height;
    this.grid = Array.from({ length: width * height }, () => new Set<EntityId>());
  }

  inBounds(cell: Cell): boolean {
    if (!Number.isInteger(cell.x) || !Number.isInteger(cell.y)) return false;
    return cell.x >= 0 && cell.y >= 0 && cell.x < this.width && cell.y < this.height;
  }

  /** Reserve the next arena id. */
  allocateId(): EntityId {
    return this.nextId++;
  }

  /**
   * Entities on a cell, in insertion order. Out of bounds reads as a single
   * wall.
   */
  get(cell: Cell): Entity[] {
    if (!this.inBounds(cell)) {
      return [OUT_OF_BOUNDS_WALL];
    }
    const result: Entity[] = [];
    for (const id of this.slot(cell)) {
      const entity = this.arena.get(id);
      if (entity) result.push(entity);
    }
    return result;
  }

  isEmpty(cell: Cell): boolean {
    return this.inBounds(cell) && this.slot(cell).size === 0;
  }

  /** Store the entity and index it under every footprint cell. */
  add(entity: Entity): void {
    if (this.arena.has(entity.id)) {
      throw new BoardConstraintViolation(
        EngineErrorCode.BOARD_INVALID_FOOTPRINT,
        `Entity id ${entity.id} is already on the board`,
        { entityId: entity.id, kind: entity.kind }
      );
    }
    const footprint = footprintOf(entity);
    this.assertFootprint(footprint, entity);
    this.arena.set(entity.id, entity);
    for (const cell of footprint) {
      this.slot(cell).add(entity.id);
    }
    if (entity.id >= this.nextId) {
      this.nextId = entity.id + 1;
    }
  }

  /** Drop the entity from the arena and from every cell it covered. */
  remove(id: EntityId): Entity | undefined {
    const entity = this.arena.get(id);
    if (!entity) return undefined;
    for (const cell of footprintOf(entity)) {
      this.slot(cell).delete(id);
    }
    this.arena.delete(id);
    return entity;
  }

  /**
   * Move a box or ice cube to a new footprint, keeping its id. The new
   * footprint is index-aligned with the old one.
   */
  relocate(id: EntityId, cells: readonly Cell[]): void {
    const entity = this.arena.get(id);
    if (!entity) {
      throw entityNotFound('entity', { entityId: id }, 'Board');
    }
    if (entity.kind !== 'box' && entity.kind !== 'ice_cube') {
      throw new BoardConstraintViolation(
        EngineErrorCode.BOARD_INVALID_FOOTPRINT,
        `Only boxes and ice cubes can be relocated, got ${entity.kind}`,
        { entityId: id }
      );
    }
    this.assertFootprint(cells, entity);
    for (const cell of entity.cells) {
      this.slot(cell).delete(id);
    }
    entity.cells = cells.map((c) => ({ x: c.x, y: c.y }));
    for (const cell of entity.cells) {
      this.slot(cell).add(id);
    }
  }

  entity(id: EntityId): Entity | undefined {
    return this.arena.get(id);
  }

  hasKind(cell: Cell, kind: EntityKind): boolean {
    return this.get(cell).some((e) => e.kind === kind);
  }

  firstOfKind<K extends EntityKind>(cell: Cell, kind: K): EntityOfKind<K> | undefined {
    for (const entity of this.get(cell)) {
      if (isKind(entity, kind)) return entity;
    }
    return undefined;
  }

  /** All entities of a kind, in id order. */
  entitiesOfKind<K extends EntityKind>(kind: K): EntityOfKind<K>[] {
    const result: EntityOfKind<K>[] = [];
    for (const entity of this.arena.values()) {
      if (isKind(entity, kind)) result.push(entity);
    }
    return result.sort((a, b) => a.id - b.id);
  }

  allEntities(): Entity[] {
    return [...this.arena.values()].sort((a, b) => a.id - b.id);
  }

  private slot(cell: Cell): Set<EntityId> {
    const set = this.grid[cell.y * this.width + cell.x];
    if (!set) {
      throw new BoardConstraintViolation(
        EngineErrorCode.BOARD_CELL_OUT_OF_BOUNDS,
        `Cell ${cellToString(cell)} is outside the board`,
        { cell, width: this.width, height: this.height }
      );
    }
    return set;
  }

  private assertFootprint(cells: readonly Cell[], entity: Entity): void {
    if (cells.length === 0 || hasDuplicateCells(cells)) {
      throw new BoardConstraintViolation(
        EngineErrorCode.BOARD_INVALID_FOOTPRINT,
        'Footprint must be non-empty and free of duplicates',
        { entityId: entity.id, kind: entity.kind, cells }
      );
    }
    for (const cell of cells) {
      if (!this.inBounds(cell)) {
        throw new BoardConstraintViolation(
          EngineErrorCode.BOARD_CELL_OUT_OF_BOUNDS,
          `Cell ${cellToString(cell)} is outside the board`,
          { entityId: entity.id, kind: entity.kind, cell, width: this.width, height: this.height }
        );
      }
    }
  }
}
