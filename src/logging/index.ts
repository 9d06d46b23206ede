/**
 * Drift Audit Logging Module Index
 */

export {
  type LogLevel,
  type LogEntry,
  type LogFormatter,
  type LogTransport,
  type LogContext,
  type DriftLogger,
  type LoggerConfig,
  LOG_LEVELS,
  compareLogLevels,
  shouldLog,
  isLogLevel,
  createDefaultFormatter,
  ConsoleTransport,
  MemoryTransport,
  DriftLoggerImpl,
  createDriftLogger,
  createSilentLogger,
} from "./logger.js";
