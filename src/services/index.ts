/**
 * Services Index
 */

export {
  createLogger,
  addLogHandler,
  removeLogHandler,
  clearLogHandlers,
  setGlobalLogLevel,
  getGlobalLogLevel,
  logLevelFromName,
  serializeError,
  getLogHistory,
  clearLogHistory,
  formatLogEntry,
  exportLogHistory,
  consoleHandler,
  LogLevel,
  type Logger,
  type LogEntry,
  type LogHandler,
  type LogLevelName,
} from './logger';
