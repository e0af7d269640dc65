import {
  planBoxPush,
  planDisplacement,
  planIceSlide,
  stepFootprint,
} from '../../../src/shared/engine/validators/PushValidator';
import {
  MoveRejectionCode,
  type BoxEntity,
  type IceCubeEntity,
  type PuzzleState,
} from '../../../src/shared/engine/types';
import { resolveRules } from '../../../src/shared/engine/rulesConfig';
import { createTestState, pos, snake } from '../../utils/fixtures';

const RIGHT = pos(1, 0);
const UP = pos(0, 1);

function boxAt(state: PuzzleState, x: number, y: number): BoxEntity {
  const box = state.board.firstOfKind(pos(x, y), 'box');
  if (!box) throw new Error(`no box at (${x},${y})`);
  return box;
}

function iceAt(state: PuzzleState, x: number, y: number): IceCubeEntity {
  const ice = state.board.firstOfKind(pos(x, y), 'ice_cube');
  if (!ice) throw new Error(`no ice cube at (${x},${y})`);
  return ice;
}

describe('PushValidator', () => {
  describe('stepFootprint', () => {
    it('shifts every cell by the direction', () => {
      const state = createTestState({ boxes: [[pos(2, 2), pos(2, 3)]], snakes: [snake('red', pos(0, 0))] });
      const box = boxAt(state, 2, 2);

      expect(stepFootprint(state, box, box.cells, UP)).toEqual([pos(2, 3), pos(2, 4)]);
    });

    it('carries the whole footprint through an active portal', () => {
      const state = createTestState({
        boxes: [[pos(3, 2), pos(3, 3)]],
        portals: [
          { position: pos(4, 2), color: 'cyan' },
          { position: pos(6, 6), color: 'cyan' },
        ],
        snakes: [snake('red', pos(0, 0))],
      });
      const box = boxAt(state, 3, 2);

      expect(stepFootprint(state, box, box.cells, RIGHT)).toEqual([pos(6, 6), pos(6, 7)]);
    });

    it('ignores a portal whose exit is blocked', () => {
      const state = createTestState({
        walls: [pos(6, 6)],
        boxes: [[pos(3, 2)]],
        portals: [
          { position: pos(4, 2), color: 'cyan' },
          { position: pos(6, 6), color: 'cyan' },
        ],
        snakes: [snake('red', pos(0, 0))],
      });
      const box = boxAt(state, 3, 2);

      expect(stepFootprint(state, box, box.cells, RIGHT)).toEqual([pos(4, 2)]);
    });

    it('returns undefined when a new cell is blocked', () => {
      const state = createTestState({
        boxes: [[pos(3, 2)]],
        exits: [{ position: pos(4, 2), color: 'red', minLength: 0 }],
        snakes: [snake('red', pos(0, 0))],
      });
      const box = boxAt(state, 3, 2);

      expect(stepFootprint(state, box, box.cells, RIGHT)).toBeUndefined();
    });
  });

  describe('planBoxPush', () => {
    it('moves a single hop', () => {
      const state = createTestState({ boxes: [[pos(3, 2)]], snakes: [snake('red', pos(2, 2))] });

      expect(planBoxPush(state, boxAt(state, 3, 2), RIGHT)).toEqual({
        valid: true,
        data: { entityId: 0, kind: 'box', from: [pos(3, 2)], to: [pos(4, 2)], fallsIntoHoles: false },
      });
    });

    it('is blocked by another snake', () => {
      const state = createTestState({
        boxes: [[pos(3, 2)]],
        snakes: [snake('red', pos(2, 2)), snake('blue', pos(4, 2))],
      });

      expect(planBoxPush(state, boxAt(state, 3, 2), RIGHT)).toEqual({
        valid: false,
        code: MoveRejectionCode.OBSTRUCTED,
        reason: 'Box cannot be pushed that way',
        context: { entityId: 0 },
      });
    });

    it('is blocked by the board edge', () => {
      const state = createTestState({ boxes: [[pos(7, 2)]], snakes: [snake('red', pos(6, 2))] });

      expect(planBoxPush(state, boxAt(state, 7, 2), RIGHT).valid).toBe(false);
    });

    it('falls only when the whole footprint lands on holes', () => {
      const partial = createTestState({
        holes: [pos(4, 2)],
        boxes: [[pos(3, 2), pos(3, 3)]],
        snakes: [snake('red', pos(2, 2))],
      });
      const full = createTestState({
        holes: [pos(4, 2), pos(4, 3)],
        boxes: [[pos(3, 2), pos(3, 3)]],
        snakes: [snake('red', pos(2, 2))],
      });

      expect(planBoxPush(partial, boxAt(partial, 3, 2), RIGHT)).toMatchObject({
        data: { fallsIntoHoles: false },
      });
      expect(planBoxPush(full, boxAt(full, 3, 2), RIGHT)).toMatchObject({
        data: { fallsIntoHoles: true },
      });
    });
  });

  describe('planIceSlide', () => {
    it('slides until the next cell is blocked', () => {
      const state = createTestState({
        walls: [pos(6, 2)],
        iceCubes: [[pos(3, 2)]],
        snakes: [snake('red', pos(2, 2))],
      });

      expect(planIceSlide(state, iceAt(state, 3, 2), RIGHT)).toMatchObject({
        valid: true,
        data: { kind: 'ice_cube', to: [pos(5, 2)], fallsIntoHoles: false },
      });
    });

    it('stops on the first step that lands over a hole', () => {
      const state = createTestState({
        holes: [pos(5, 2)],
        iceCubes: [[pos(3, 2)]],
        snakes: [snake('red', pos(2, 2))],
      });

      expect(planIceSlide(state, iceAt(state, 3, 2), RIGHT)).toMatchObject({
        data: { to: [pos(5, 2)], fallsIntoHoles: true },
      });
    });

    it('is invalid when blocked at the first step', () => {
      const state = createTestState({
        walls: [pos(4, 2)],
        iceCubes: [[pos(3, 2)]],
        snakes: [snake('red', pos(2, 2))],
      });

      expect(planIceSlide(state, iceAt(state, 3, 2), RIGHT)).toEqual({
        valid: false,
        code: MoveRejectionCode.OBSTRUCTED,
        reason: 'Ice cube cannot slide that way',
        context: { entityId: 1 },
      });
    });

    it('keeps momentum through a portal', () => {
      const state = createTestState({
        iceCubes: [[pos(3, 2)]],
        portals: [
          { position: pos(5, 2), color: 'cyan' },
          { position: pos(1, 5), color: 'cyan' },
        ],
        snakes: [snake('red', pos(2, 2))],
      });

      expect(planIceSlide(state, iceAt(state, 3, 2), RIGHT)).toMatchObject({
        data: { to: [pos(7, 5)] },
      });
    });

    it('honours the slide bound', () => {
      const state = createTestState(
        { iceCubes: [[pos(1, 0)]], snakes: [snake('red', pos(0, 0))] },
        resolveRules({ maxSlideSteps: 3 })
      );

      expect(planIceSlide(state, iceAt(state, 1, 0), RIGHT)).toMatchObject({
        data: { to: [pos(4, 0)] },
      });
    });
  });

  it('dispatches by kind', () => {
    const state = createTestState({
      boxes: [[pos(3, 2)]],
      iceCubes: [[pos(3, 4)]],
      snakes: [snake('red', pos(0, 0))],
    });

    expect(planDisplacement(state, boxAt(state, 3, 2), RIGHT)).toMatchObject({ data: { to: [pos(4, 2)] } });
    expect(planDisplacement(state, iceAt(state, 3, 4), RIGHT)).toMatchObject({ data: { to: [pos(7, 4)] } });
  });
});
