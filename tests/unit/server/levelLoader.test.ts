import fs from 'fs';
import os from 'os';
import path from 'path';
import { EngineErrorCode } from '../../../src/shared/engine/errors';
import { PuzzleEngine } from '../../../src/shared/engine/PuzzleEngine';
import type { MoveRequest } from '../../../src/shared/engine/types';
import {
  listLevelIds,
  loadLevelById,
  loadLevelFile,
} from '../../../src/server/game/levelLoader';

const LEVELS_DIR = path.resolve(__dirname, '../../../levels');

function head(x: number, y: number): MoveRequest {
  return { snakeId: 0, end: 'head', target: { x, y } };
}

describe('levelLoader', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'snake-levels-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('lists the bundled levels in order', () => {
    expect(listLevelIds(LEVELS_DIR)).toEqual(['01-first-steps', '02-box-and-plate', '03-portal-ice']);
  });

  it('lists only json files with usable ids', () => {
    fs.writeFileSync(path.join(tmpDir, 'b.json'), '{}');
    fs.writeFileSync(path.join(tmpDir, 'a.json'), '{}');
    fs.writeFileSync(path.join(tmpDir, 'notes.txt'), '');
    fs.writeFileSync(path.join(tmpDir, 'bad name.json'), '{}');

    expect(listLevelIds(tmpDir)).toEqual(['a', 'b']);
  });

  it('returns no ids for a missing directory', () => {
    expect(listLevelIds(path.join(tmpDir, 'nowhere'))).toEqual([]);
  });

  it('loads a level by id and applies schema defaults', () => {
    const level = loadLevelById('02-box-and-plate', LEVELS_DIR);

    expect(level.boxes).toEqual([[{ x: 2, y: 2 }]]);
    expect(level.snakes).toEqual([
      {
        color: 'blue',
        body: [
          { x: 1, y: 2 },
          { x: 0, y: 2 },
        ],
      },
    ]);
    expect(level.holes).toEqual([]);
  });

  it('refuses ids that could leave the directory', () => {
    expect(() => loadLevelById('../package', LEVELS_DIR)).toThrow(
      expect.objectContaining({ code: EngineErrorCode.LEVEL_NOT_FOUND, domain: 'LevelLoader' })
    );
  });

  it('reports a missing level', () => {
    expect(() => loadLevelById('99-missing', tmpDir)).toThrow(
      expect.objectContaining({ code: EngineErrorCode.LEVEL_NOT_FOUND })
    );
  });

  it('reports malformed json as a schema failure', () => {
    const file = path.join(tmpDir, 'broken.json');
    fs.writeFileSync(file, '{ "id": ');

    expect(() => loadLevelFile(file)).toThrow(
      expect.objectContaining({
        code: EngineErrorCode.LEVEL_SCHEMA_INVALID,
        message: 'Level file broken.json is not valid JSON',
      })
    );
  });

  it('reports schema violations from the file', () => {
    const file = path.join(tmpDir, 'empty.json');
    fs.writeFileSync(file, JSON.stringify({ id: 'empty', width: 4, height: 4, snakes: [] }));

    expect(() => loadLevelFile(file)).toThrow(
      expect.objectContaining({ code: EngineErrorCode.LEVEL_SCHEMA_INVALID, domain: 'LevelSchema' })
    );
  });

  describe('bundled levels', () => {
    it('loads every bundled level into a playable engine', () => {
      for (const id of listLevelIds(LEVELS_DIR)) {
        const engine = new PuzzleEngine(loadLevelById(id, LEVELS_DIR));
        expect(engine.getState().status).toBe('playing');
      }
    });

    it('solves the first level in four moves', () => {
      const engine = new PuzzleEngine(loadLevelById('01-first-steps', LEVELS_DIR));

      for (const request of [head(3, 2), head(4, 2), head(5, 2), head(6, 2)]) {
        expect(engine.resolveMove(request).accepted).toBe(true);
      }

      const events = engine.drainEvents();
      expect(events[events.length - 1]).toEqual({
        type: 'LEVEL_WON',
        levelId: '01-first-steps',
        moveCount: 4,
      });
    });

    it('solves the second level by parking the box on the plate', () => {
      const engine = new PuzzleEngine(loadLevelById('02-box-and-plate', LEVELS_DIR));

      for (const request of [
        head(2, 2),
        head(3, 2),
        head(3, 3),
        head(4, 3),
        head(5, 3),
        head(6, 3),
        head(7, 3),
      ]) {
        expect(engine.resolveMove(request).accepted).toBe(true);
      }

      expect(engine.getState().status).toBe('won');
    });
  });
});
