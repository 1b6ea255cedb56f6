/**
 * Observability module
 */

export {
  type LogLevel,
  type Logger,
  type LogEntry,
  LOG_LEVELS,
  ConsoleLogger,
  NoopLogger,
  InMemoryLogger,
  createLogger,
  sanitizeContext,
} from './logging.js';
