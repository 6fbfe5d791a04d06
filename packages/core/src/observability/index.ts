export {
  QuireLogger,
  createLogger,
  isDebugMode,
  setDebugMode,
  silentLogger,
  type LogEntry,
  type LogHandler,
  type LogLevel,
  type QuireLoggerConfig,
} from './logger.js';
