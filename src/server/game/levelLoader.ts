import fs from 'fs';
import path from 'path';
import { EngineErrorCode, LevelDataError } from '../../shared/engine/errors';
import type { LevelData } from '../../shared/types/puzzle';
import { parseLevelData } from '../../shared/validation/levelSchemas';
import { config } from '../config';
import { logger } from '../utils/logger';

const LEVEL_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

function levelsDirectory(dir?: string): string {
  return path.resolve(dir ?? config.puzzle.levelsDir);
}

/**
 * Read and validate one level file. Malformed JSON and schema failures both
 * surface as LevelDataError.
 */
export function loadLevelFile(filePath: string): LevelData {
  const raw = fs.readFileSync(filePath, 'utf8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new LevelDataError(
      EngineErrorCode.LEVEL_SCHEMA_INVALID,
      `Level file ${path.basename(filePath)} is not valid JSON`,
      { filePath, cause: error instanceof Error ? error.message : String(error) },
      'LevelLoader'
    );
  }
  const level = parseLevelData(parsed);
  logger.debug('Level file loaded', { filePath, levelId: level.id });
  return level;
}

/** Ids of every `<id>.json` file in the levels directory, sorted. */
export function listLevelIds(dir?: string): string[] {
  const root = levelsDirectory(dir);
  if (!fs.existsSync(root)) {
    return [];
  }
  return fs
    .readdirSync(root)
    .filter((name) => name.endsWith('.json'))
    .map((name) => name.slice(0, -'.json'.length))
    .filter((id) => LEVEL_ID_PATTERN.test(id))
    .sort();
}

export function loadLevelById(levelId: string, dir?: string): LevelData {
  const root = levelsDirectory(dir);
  const filePath = path.join(root, `${levelId}.json`);
  if (!LEVEL_ID_PATTERN.test(levelId) || !fs.existsSync(filePath)) {
    throw new LevelDataError(
      EngineErrorCode.LEVEL_NOT_FOUND,
      `No level "${levelId}" in ${root}`,
      { levelId, dir: root },
      'LevelLoader'
    );
  }
  return loadLevelFile(filePath);
}
