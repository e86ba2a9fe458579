/**
 * Logging Module Index
 */

export {
  type LogLevel,
  type LogEntry,
  type LogFormatter,
  type LogTransport,
  type LogContext,
  type Logger,
  LOG_LEVELS,
  REDACTED,
  isLogLevel,
  shouldLog,
  createDefaultFormatter,
  Redactor,
  ConsoleTransport,
  FileTransport,
  MemoryTransport,
  BootstrapLogger,
  createLogger,
  createSilentLogger,
} from "./logger.js";
