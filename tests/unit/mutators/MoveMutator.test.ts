/**
 * Mutator Unit Tests
 *
 * Drives applyMove with plans from validateMove, plus the snake and object
 * mutators it delegates to.
 */

import { applyMove } from '../../../src/shared/engine/mutators/MoveMutator';
import {
  applyDisplacement,
  destroyIfOnActiveLasers,
} from '../../../src/shared/engine/mutators/ObjectMutator';
import {
  remainingSnakeColors,
  sliceSnakeAt,
} from '../../../src/shared/engine/mutators/SnakeMutator';
import { validateMove } from '../../../src/shared/engine/validators/MoveValidator';
import type {
  MovePlan,
  MoveRequest,
  MutationContext,
  PuzzleState,
  Snake,
} from '../../../src/shared/engine/types';
import { EngineErrorCode } from '../../../src/shared/engine/errors';
import { createTestState, pos, snake } from '../../utils/fixtures';

function contextFor(state: PuzzleState): MutationContext {
  return { state, events: [] };
}

function planFor(state: PuzzleState, request: MoveRequest): MovePlan {
  const outcome = validateMove(state, request, { presentationBusy: false });
  if (!outcome.valid) throw new Error(`unexpected rejection: ${outcome.reason}`);
  return outcome.data;
}

function snakeOf(state: PuzzleState, id: number): Snake {
  const found = state.snakes.get(id);
  if (!found) throw new Error(`missing snake ${id}`);
  return found;
}

describe('MoveMutator', () => {
  it('counts the move before any effect runs', () => {
    const state = createTestState({
      exits: [{ position: pos(3, 1), color: 'red', minLength: 0 }],
      snakes: [snake('red', pos(2, 1), pos(1, 1))],
    });
    const ctx = contextFor(state);

    applyMove(ctx, planFor(state, { snakeId: 0, end: 'head', target: pos(3, 1) }));

    expect(state.moveCount).toBe(1);
    expect(ctx.events[ctx.events.length - 1]).toEqual({
      type: 'LEVEL_WON',
      levelId: 'test-level',
      moveCount: 1,
    });
  });

  it('lands the head on the linked portal', () => {
    const state = createTestState({
      portals: [
        { position: pos(2, 3), color: 'cyan' },
        { position: pos(7, 0), color: 'cyan' },
      ],
      snakes: [snake('red', pos(2, 2), pos(2, 1), pos(2, 0))],
    });
    const ctx = contextFor(state);

    applyMove(ctx, planFor(state, { snakeId: 0, end: 'head', target: pos(2, 3) }));

    expect(snakeOf(state, 0).body).toEqual([pos(7, 0), pos(2, 2), pos(2, 1)]);
  });

  it('fails loudly when the plan names a missing snake', () => {
    const state = createTestState({ snakes: [snake('red', pos(2, 2))] });
    const plan = planFor(state, { snakeId: 0, end: 'head', target: pos(3, 2) });
    state.snakes.clear();

    expect(() => applyMove(contextFor(state), plan)).toThrow(
      expect.objectContaining({ code: EngineErrorCode.STATE_ENTITY_NOT_FOUND })
    );
  });
});

describe('SnakeMutator', () => {
  const longRed = () =>
    createTestState({ snakes: [snake('red', pos(1, 1), pos(2, 1), pos(3, 1), pos(4, 1))] });

  it('severs everything from the cut cell to the tail', () => {
    const state = longRed();
    const ctx = contextFor(state);

    expect(sliceSnakeAt(ctx, snakeOf(state, 0), pos(3, 1))).toBe(true);

    expect(ctx.events).toEqual([
      { type: 'SNAKE_SLICED', snakeId: 0, at: pos(3, 1), body: [pos(1, 1), pos(2, 1)] },
    ]);
  });

  it('takes only the head when cut at the head', () => {
    const state = longRed();
    const ctx = contextFor(state);

    sliceSnakeAt(ctx, snakeOf(state, 0), pos(1, 1));

    expect(snakeOf(state, 0).body).toEqual([pos(2, 1), pos(3, 1), pos(4, 1)]);
  });

  it('removes a snake cut down to nothing', () => {
    const state = createTestState({ snakes: [snake('blue', pos(5, 5))] });
    const ctx = contextFor(state);

    sliceSnakeAt(ctx, snakeOf(state, 0), pos(5, 5));

    expect(ctx.events).toEqual([
      { type: 'SNAKE_SLICED', snakeId: 0, at: pos(5, 5), body: [] },
      { type: 'SNAKE_REMOVED', snakeId: 0, reason: 'sliced' },
    ]);
    expect(state.snakes.has(0)).toBe(false);
  });

  it('ignores a cell the snake does not cover', () => {
    const state = longRed();
    const ctx = contextFor(state);

    expect(sliceSnakeAt(ctx, snakeOf(state, 0), pos(6, 6))).toBe(false);
    expect(ctx.events).toEqual([]);
  });

  it('lists remaining colors once each, in snake order', () => {
    const state = createTestState({
      snakes: [snake('red', pos(0, 0)), snake('blue', pos(2, 2)), snake('red', pos(4, 4))],
    });

    expect(remainingSnakeColors(contextFor(state))).toEqual(['red', 'blue']);
  });
});

describe('ObjectMutator', () => {
  it('spares an object only partly over lasers', () => {
    const state = createTestState({
      boxes: [[pos(2, 2), pos(3, 2)]],
      laserGates: [{ position: pos(2, 2), color: 'orange' }],
      snakes: [snake('red', pos(0, 0))],
    });
    const box = state.board.firstOfKind(pos(2, 2), 'box');
    if (!box) throw new Error('missing box');

    expect(destroyIfOnActiveLasers(contextFor(state), box)).toBe(false);
  });

  it('destroys an object wholly over armed lasers', () => {
    const state = createTestState({
      boxes: [[pos(2, 2), pos(3, 2)]],
      laserGates: [
        { position: pos(2, 2), color: 'orange' },
        { position: pos(3, 2), color: 'orange' },
      ],
      snakes: [snake('red', pos(0, 0))],
    });
    const box = state.board.firstOfKind(pos(2, 2), 'box');
    if (!box) throw new Error('missing box');
    const ctx = contextFor(state);

    expect(destroyIfOnActiveLasers(ctx, box)).toBe(true);
    expect(ctx.events).toEqual([
      { type: 'ENTITY_DESTROYED', entityId: 0, kind: 'box', cells: [pos(2, 2), pos(3, 2)], cause: 'laser' },
    ]);
    expect(state.board.entity(0)).toBeUndefined();
  });

  it('fills one hole per covered cell when a footprint drops in', () => {
    const state = createTestState({
      holes: [pos(4, 2), pos(4, 3)],
      boxes: [[pos(3, 2), pos(3, 3)]],
      snakes: [snake('red', pos(0, 0))],
    });
    const ctx = contextFor(state);

    applyDisplacement(ctx, {
      entityId: 2,
      kind: 'box',
      from: [pos(3, 2), pos(3, 3)],
      to: [pos(4, 2), pos(4, 3)],
      fallsIntoHoles: true,
    });

    expect(ctx.events).toEqual([
      { type: 'HOLE_FILLED', holeId: 0, holePosition: pos(4, 2), fillerId: 2, fillerPosition: pos(3, 2) },
      { type: 'HOLE_FILLED', holeId: 1, holePosition: pos(4, 3), fillerId: 2, fillerPosition: pos(3, 3) },
    ]);
    expect(state.board.allEntities()).toEqual([]);
  });

  it('refuses to displace a fixture', () => {
    const state = createTestState({ walls: [pos(1, 1)], snakes: [snake('red', pos(0, 0))] });

    expect(() =>
      applyDisplacement(contextFor(state), {
        entityId: 0,
        kind: 'box',
        from: [pos(1, 1)],
        to: [pos(2, 1)],
        fallsIntoHoles: false,
      })
    ).toThrow('Entity 0 is a wall, not a pushable object');
  });
});
