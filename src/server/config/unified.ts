/**
 * Unified Application Configuration
 *
 * Parses environment variables, validates them with Zod, and exports a
 * frozen config object that all server code should use.
 *
 * Architecture:
 * - `env.ts` defines the raw environment variable schema
 * - `unified.ts` (this file) assembles the typed application config
 * - `index.ts` re-exports everything for convenient imports
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import { resolveRules } from '../../shared/engine/rulesConfig';
import {
  LogFormatSchema,
  LogLevelSchema,
  NodeEnvSchema,
  SnakeColorEnvSchema,
  getEffectiveNodeEnv,
  parseEnv,
  type RawEnv,
} from './env';

// Load .env into process.env before we read anything from it.
// Skip in test mode so a developer .env cannot override test settings.
if (process.env.NODE_ENV !== 'test') {
  dotenv.config();
}

const ConfigSchema = z.object({
  nodeEnv: NodeEnvSchema,
  isProduction: z.boolean(),
  isDevelopment: z.boolean(),
  isTest: z.boolean(),
  app: z.object({
    version: z.string(),
  }),
  logging: z.object({
    level: LogLevelSchema,
    format: LogFormatSchema,
    file: z.string().optional(),
  }),
  puzzle: z.object({
    levelsDir: z.string().min(1),
    rules: z.object({
      reversibleColor: SnakeColorEnvSchema,
      wrappingColor: SnakeColorEnvSchema,
      maxSlideSteps: z.number().int().positive(),
      maxRefreshPasses: z.number().int().positive(),
    }),
  }),
});

/**
 * Application configuration type inferred from the schema.
 */
export type AppConfig = z.infer<typeof ConfigSchema>;

/**
 * Assemble the typed config from an already-validated environment.
 */
export function buildConfig(env: RawEnv): AppConfig {
  const nodeEnv = getEffectiveNodeEnv(env);
  const logFile = env.LOG_FILE?.trim() || undefined;

  return ConfigSchema.parse({
    nodeEnv,
    isProduction: nodeEnv === 'production',
    isDevelopment: nodeEnv === 'development',
    isTest: nodeEnv === 'test',
    app: {
      version: env.npm_package_version ?? '0.0.0',
    },
    logging: {
      level: env.LOG_LEVEL,
      format: env.LOG_FORMAT,
      file: logFile,
    },
    puzzle: {
      levelsDir: env.PUZZLE_LEVELS_DIR,
      rules: resolveRules({
        reversibleColor: env.PUZZLE_REVERSIBLE_COLOR,
        wrappingColor: env.PUZZLE_WRAPPING_COLOR,
        maxSlideSteps: env.PUZZLE_MAX_SLIDE_STEPS,
      }),
    },
  });
}

const envResult = parseEnv(process.env);
if (!envResult.success || !envResult.data) {
  console.error('Invalid environment configuration:');
  for (const error of envResult.errors ?? []) {
    console.error(`  - ${error.path || 'root'}: ${error.message}`);
  }
  process.exit(1);
}

// Parse and freeze the final config so downstream code gets a fully
// validated, immutable view.
export const config: AppConfig = Object.freeze(buildConfig(envResult.data));
