/**
 * Engine Logging Service
 *
 * Module-scoped structured logging for the tween engine. Every engine module
 * creates its own logger; entries go through a single level filter and are
 * fanned out to registered handlers. Nothing is printed unless a handler is
 * installed (see {@link consoleHandler}).
 *
 * @example
 * ```typescript
 * import { createLogger } from '@/services/logger';
 *
 * const logger = createLogger('Timeline');
 * logger.debug('Built timeline', { duration: 800, children: 2 });
 * ```
 *
 * @module services/logger
 */

// =============================================================================
// Types
// =============================================================================

/** Log severity levels */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

/** Names accepted by configuration for each level */
export type LogLevelName = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/** A single log record */
export interface LogEntry {
  /** Epoch milliseconds */
  timestamp: number;
  level: LogLevel;
  /** Module that produced the entry */
  module: string;
  message: string;
  /** Structured payload, with errors serialized */
  data?: Record<string, unknown>;
}

export type LogHandler = (entry: LogEntry) => void;

export interface Logger {
  readonly module: string;
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

// =============================================================================
// Constants
// =============================================================================

const MAX_LOG_HISTORY = 100;

const MAX_NORMALIZATION_DEPTH = 8;

const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.SILENT]: 'SILENT',
};

const LEVELS_BY_NAME: Record<LogLevelName, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT,
};

// =============================================================================
// Module State
// =============================================================================

let globalLogLevel: LogLevel = LogLevel.WARN;

const handlers: Set<LogHandler> = new Set();

/** Ring buffer of recent entries, oldest first */
const logHistory: LogEntry[] = [];

// =============================================================================
// Handlers & Levels
// =============================================================================

export function addLogHandler(handler: LogHandler): void {
  handlers.add(handler);
}

export function removeLogHandler(handler: LogHandler): void {
  handlers.delete(handler);
}

export function clearLogHandlers(): void {
  handlers.clear();
}

/**
 * Set the minimum level that reaches handlers and history.
 */
export function setGlobalLogLevel(level: LogLevel): void {
  globalLogLevel = level;
}

export function getGlobalLogLevel(): LogLevel {
  return globalLogLevel;
}

/**
 * Resolve a configuration level name to its {@link LogLevel}.
 */
export function logLevelFromName(name: LogLevelName): LogLevel {
  return LEVELS_BY_NAME[name];
}

// =============================================================================
// Serialization
// =============================================================================

/**
 * Convert an unknown thrown value into a plain, JSON-friendly object.
 * Own enumerable properties of Error subclasses (such as `code`) are kept.
 */
export function serializeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    const serialized: Record<string, unknown> = {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
    for (const [key, value] of Object.entries(error)) {
      if (!(key in serialized)) {
        serialized[key] = value;
      }
    }
    return serialized;
  }

  if (typeof error === 'string') {
    return { message: error };
  }

  return { value: error };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function normalizeValue(value: unknown, seen: WeakSet<object>, depth: number): unknown {
  if (value instanceof Error) {
    return serializeError(value);
  }
  if (Array.isArray(value)) {
    return value.map((item) => normalizeValue(item, seen, depth + 1));
  }
  if (isRecord(value)) {
    return normalizeLogData(value, seen, depth + 1);
  }
  return value;
}

/**
 * Serialize nested errors and cut circular or overly deep payloads.
 */
function normalizeLogData(
  data: Record<string, unknown> | undefined,
  seen: WeakSet<object> = new WeakSet(),
  depth: number = 0
): Record<string, unknown> | undefined {
  if (!data) return undefined;

  if (depth > MAX_NORMALIZATION_DEPTH) {
    return { _truncated: true };
  }
  if (seen.has(data)) {
    return { _circular: true };
  }
  seen.add(data);

  const normalized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    normalized[key] = normalizeValue(value, seen, depth);
  }
  return normalized;
}

// =============================================================================
// Dispatch
// =============================================================================

function dispatch(entry: LogEntry): void {
  if (entry.level < globalLogLevel) {
    return;
  }

  logHistory.push(entry);
  if (logHistory.length > MAX_LOG_HISTORY) {
    logHistory.shift();
  }

  handlers.forEach((handler) => {
    try {
      handler(entry);
    } catch (handlerError) {
      // Reporting through the logger again could recurse into the same handler.
      console.error('[Logger] log handler threw', serializeError(handlerError));
    }
  });
}

function log(module: string, level: LogLevel, message: string, data?: Record<string, unknown>): void {
  dispatch({
    timestamp: Date.now(),
    level,
    module,
    message,
    data: normalizeLogData(data),
  });
}

// =============================================================================
// History
// =============================================================================

/**
 * Recent entries at or above `level` (all retained entries when omitted).
 */
export function getLogHistory(level?: LogLevel): readonly LogEntry[] {
  if (level === undefined) {
    return [...logHistory];
  }
  return logHistory.filter((entry) => entry.level >= level);
}

export function clearLogHistory(): void {
  logHistory.length = 0;
}

/**
 * Render one entry as `[iso] [LEVEL] [module] message {data}`.
 */
export function formatLogEntry(entry: LogEntry): string {
  const timestamp = new Date(entry.timestamp).toISOString();
  const dataStr = entry.data ? ` ${JSON.stringify(entry.data)}` : '';
  return `[${timestamp}] [${LEVEL_NAMES[entry.level]}] [${entry.module}] ${entry.message}${dataStr}`;
}

export function exportLogHistory(level?: LogLevel): string {
  return getLogHistory(level).map(formatLogEntry).join('\n');
}

// =============================================================================
// Logger Factory
// =============================================================================

/**
 * Create a logger bound to a module name.
 */
export function createLogger(moduleName: string = 'TweenEngine'): Logger {
  return {
    get module(): string {
      return moduleName;
    },
    debug(message, data) {
      log(moduleName, LogLevel.DEBUG, message, data);
    },
    info(message, data) {
      log(moduleName, LogLevel.INFO, message, data);
    },
    warn(message, data) {
      log(moduleName, LogLevel.WARN, message, data);
    },
    error(message, data) {
      log(moduleName, LogLevel.ERROR, message, data);
    },
  };
}

// =============================================================================
// Console Handler
// =============================================================================

/**
 * Handler writing entries to the console method matching their level.
 */
export const consoleHandler: LogHandler = (entry) => {
  const line = `[${new Date(entry.timestamp).toISOString()}] [${entry.module}] ${entry.message}`;
  const payload = entry.data ?? '';

  switch (entry.level) {
    case LogLevel.DEBUG:
      console.debug(line, payload);
      break;
    case LogLevel.INFO:
      console.info(line, payload);
      break;
    case LogLevel.WARN:
      console.warn(line, payload);
      break;
    case LogLevel.ERROR:
      console.error(line, payload);
      break;
    default:
      break;
  }
};
