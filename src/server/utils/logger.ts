import winston from 'winston';
import fs from 'fs';
import path from 'path';
import { AsyncLocalStorage } from 'async_hooks';
import { config } from '../config';

// ============================================================================
// Types
// ============================================================================

export type LogMeta = Record<string, unknown>;

/**
 * Session context stored in AsyncLocalStorage so every entry written while
 * a session handles a request carries its identifiers.
 */
export interface SessionContext {
  sessionId: string;
  levelId?: string;
}

// ============================================================================
// Session Context (AsyncLocalStorage)
// ============================================================================

export const sessionContextStorage = new AsyncLocalStorage<SessionContext>();

/**
 * Get the current session context. Returns undefined outside a session call.
 */
export const getSessionContext = (): SessionContext | undefined => {
  return sessionContextStorage.getStore();
};

/**
 * Run a function within a session context. All logs written inside the
 * callback are tagged with it.
 */
export const runWithSessionContext = <T>(context: SessionContext, fn: () => T): T => {
  return sessionContextStorage.run(context, fn);
};

// ============================================================================
// Winston Logger Configuration
// ============================================================================

const SERVICE_NAME = 'snake-puzzle';

const configuredLogFile = config.logging.file;
if (configuredLogFile) {
  const logDir = path.dirname(path.resolve(configuredLogFile));
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }
}

/**
 * Custom format to add session context from AsyncLocalStorage to log entries.
 */
const addSessionContext = winston.format((info) => {
  const context = getSessionContext();
  if (context) {
    info.sessionId = context.sessionId;
    if (context.levelId) {
      info.levelId = context.levelId;
    }
  }
  return info;
});

/**
 * Custom format to structure log metadata consistently.
 */
const structuredFormat = winston.format((info) => {
  if (!info.service) {
    info.service = SERVICE_NAME;
  }
  if (!info.environment) {
    info.environment = config.nodeEnv;
  }

  // Handle Error objects specially
  if (info.error instanceof Error) {
    info.error = {
      message: info.error.message,
      name: info.error.name,
      stack: info.error.stack,
    };
  }
  return info;
});

/**
 * Format for structured JSON logging (used in production and file transports).
 */
export const jsonFormat = winston.format.combine(
  winston.format.timestamp({
    format: () => new Date().toISOString(),
  }),
  winston.format.errors({ stack: true }),
  addSessionContext(),
  structuredFormat(),
  winston.format.json()
);

/**
 * Format for human-readable console output (used in development).
 */
export const consoleFormat = winston.format.combine(
  winston.format.timestamp({
    format: 'YYYY-MM-DD HH:mm:ss',
  }),
  winston.format.errors({ stack: true }),
  addSessionContext(),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, sessionId, ...meta }) => {
    const sessionStr = typeof sessionId === 'string' ? ` [${sessionId}]` : '';
    const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} ${level}${sessionStr}: ${String(message)}${metaStr}`;
  })
);

/**
 * Create the Winston logger instance.
 */
const logger = winston.createLogger({
  level: config.logging.level,
  defaultMeta: {
    service: SERVICE_NAME,
    environment: config.nodeEnv,
  },
  transports: [
    new winston.transports.Console({
      format: config.logging.format === 'json' ? jsonFormat : consoleFormat,
      silent: config.isTest,
    }),
  ],
});

if (configuredLogFile) {
  logger.add(
    new winston.transports.File({
      filename: path.resolve(configuredLogFile),
      format: jsonFormat,
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    })
  );
}

// ============================================================================
// Exports
// ============================================================================

export { logger };
