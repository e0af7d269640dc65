// Shared helpers for reading environment flags from the shared engine.
// The engine itself never imports server config; anything it needs to tune
// at run time comes through these flag readers or through PuzzleRules.

type ProcessEnv = Record<string, string | undefined>;
function getProcessEnv(): ProcessEnv | undefined {
  if (typeof process !== 'undefined' && typeof process.env === 'object') {
    return process.env;
  }
  return undefined;
}

export function readEnv(name: string): string | undefined {
  const env = getProcessEnv();
  if (env) {
    const value = env[name];
    if (typeof value === 'string') {
      return value;
    }
  }

  return undefined;
}

/**
 * Returns true if running in a test environment (NODE_ENV === 'test').
 */
export function isTestEnvironment(): boolean {
  return readEnv('NODE_ENV') === 'test';
}

/**
 * Returns true if running inside a Jest worker process, even when NODE_ENV
 * was overridden by a .env file.
 */
export function isJestRuntime(): boolean {
  return readEnv('JEST_WORKER_ID') !== undefined;
}

export function flagEnabled(name: string): boolean {
  const raw = readEnv(name);
  if (!raw) return false;
  return raw === '1' || raw === 'true' || raw === 'TRUE';
}

function flagDisabled(name: string): boolean {
  const raw = readEnv(name);
  return raw === '0' || raw === 'false' || raw === 'FALSE';
}

/**
 * Emits one console line per validation step and mutation while resolving
 * moves. Off unless SNAKE_PUZZLE_RESOLVER_TRACE=1.
 */
export function isResolverTraceEnabled(): boolean {
  return flagEnabled('SNAKE_PUZZLE_RESOLVER_TRACE');
}

/**
 * Development assertions are on outside production. Set
 * SNAKE_PUZZLE_DEV_ASSERTIONS=1 to force them on in production, or =0 to
 * switch them off elsewhere.
 */
export function areDevAssertionsEnabled(): boolean {
  if (flagEnabled('SNAKE_PUZZLE_DEV_ASSERTIONS')) return true;
  if (flagDisabled('SNAKE_PUZZLE_DEV_ASSERTIONS')) return false;
  return readEnv('NODE_ENV') !== 'production';
}

/**
 * Debug logging wrapper that suppresses ESLint no-console warnings.
 * The wrapped console.log is only invoked if the condition is true.
 *
 * @example
 * debugLog(isResolverTraceEnabled(), '[validateMove] rejected', code);
 */
export function debugLog(condition: boolean, ...args: unknown[]): void {
  if (condition) {
    // eslint-disable-next-line no-console
    console.log(...args);
  }
}
