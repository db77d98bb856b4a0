/**
 * Logging Module Index
 */

export {
  type LogLevel,
  type LogEntry,
  type LogFormatter,
  type LogTransport,
  type Logger,
  type LogContext,
  type LoggingOptions,
  LOG_LEVELS,
  shouldLog,
  isLogLevel,
  createDefaultFormatter,
  ConsoleTransport,
  FileTransport,
  MemoryTransport,
  LoggerImpl,
  createLogger,
  getLogger,
  configureLogging,
  setRootLogger,
} from "./logger.js";
