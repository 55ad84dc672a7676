export {
  createLogger,
  noopLogger,
  type LogEntry,
  type LogLevel,
  type Logger,
  type LoggerOptions,
} from './logger.js';
