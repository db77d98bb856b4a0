/**
 * converge Logging Subsystem
 *
 * Structured, subsystem-scoped logging with levels, redaction and
 * pluggable transports (console, file).
 */

import * as fs from "node:fs";

// =============================================================================
// Logger Types
// =============================================================================

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

export const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal"];

export type LogEntry = {
  timestamp: Date;
  level: LogLevel;
  subsystem: string;
  message: string;
  metadata?: Record<string, unknown>;
  scope?: string;
  runId?: string;
  address?: string;
};

export type LogFormatter = (entry: LogEntry) => string;

export interface LogTransport {
  name: string;
  write(entry: LogEntry): void;
  flush?(): void;
  close?(): void;
}

export interface Logger {
  readonly subsystem: string;

  trace(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  fatal(message: string, meta?: Record<string, unknown>): void;

  child(name: string): Logger;
  withContext(context: LogContext): Logger;
  setLevel(level: LogLevel): void;
  getLevel(): LogLevel;
  isLevelEnabled(level: LogLevel): boolean;
}

/** Fields attached to every entry written through a contextual logger. */
export type LogContext = {
  scope?: string;
  runId?: string;
  address?: string;
};

/** Logging settings, as carried by the `logging` section of the config. */
export type LoggingOptions = {
  level?: LogLevel;
  file?: string;
  colors?: boolean;
  redactPatterns?: string[];
};

// =============================================================================
// Log Level Utilities
// =============================================================================

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  fatal: 5,
};

export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[minLevel];
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

// =============================================================================
// Default Log Formatter
// =============================================================================

const COLORS = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  cyan: "\x1b[36m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  red: "\x1b[31m",
  magenta: "\x1b[35m",
  blue: "\x1b[34m",
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  trace: COLORS.dim,
  debug: COLORS.cyan,
  info: COLORS.green,
  warn: COLORS.yellow,
  error: COLORS.red,
  fatal: COLORS.magenta,
};

export function createDefaultFormatter(options?: {
  colors?: boolean;
  timestamps?: boolean;
  includeMetadata?: boolean;
}): LogFormatter {
  const {
    colors = process.stderr.isTTY ?? false,
    timestamps = true,
    includeMetadata = true,
  } = options ?? {};

  const paint = (color: string, text: string): string => (colors ? `${color}${text}${COLORS.reset}` : text);

  return (entry: LogEntry): string => {
    const parts: string[] = [];

    if (timestamps) {
      parts.push(paint(COLORS.dim, entry.timestamp.toISOString()));
    }

    parts.push(paint(LEVEL_COLORS[entry.level], entry.level.toUpperCase().padEnd(5)));
    parts.push(paint(COLORS.blue, `[${entry.subsystem}]`));
    parts.push(entry.message);

    const contextParts: string[] = [];
    if (entry.scope) contextParts.push(`scope=${entry.scope}`);
    if (entry.runId) contextParts.push(`run=${entry.runId}`);
    if (entry.address) contextParts.push(`resource=${entry.address}`);
    if (contextParts.length > 0) {
      parts.push(paint(COLORS.dim, `(${contextParts.join(" ")})`));
    }

    if (includeMetadata && entry.metadata && Object.keys(entry.metadata).length > 0) {
      parts.push(paint(COLORS.dim, JSON.stringify(entry.metadata)));
    }

    return parts.join(" ");
  };
}

// =============================================================================
// Transports
// =============================================================================

/**
 * Writes to stderr so command output on stdout stays machine-readable.
 */
export class ConsoleTransport implements LogTransport {
  name = "console";
  private formatter: LogFormatter;
  private minLevel: LogLevel;

  constructor(options?: { formatter?: LogFormatter; minLevel?: LogLevel }) {
    this.formatter = options?.formatter ?? createDefaultFormatter();
    this.minLevel = options?.minLevel ?? "trace";
  }

  write(entry: LogEntry): void {
    if (!shouldLog(entry.level, this.minLevel)) return;

    console.error(this.formatter(entry));
  }
}

export class FileTransport implements LogTransport {
  name = "file";
  private formatter: LogFormatter;
  private minLevel: LogLevel;
  private buffer: string[] = [];
  private bufferSize: number;
  private filePath: string;

  constructor(options: { filePath: string; formatter?: LogFormatter; minLevel?: LogLevel; bufferSize?: number }) {
    this.filePath = options.filePath;
    this.formatter = options.formatter ?? createDefaultFormatter({ colors: false });
    this.minLevel = options.minLevel ?? "trace";
    this.bufferSize = options.bufferSize ?? 50;
  }

  write(entry: LogEntry): void {
    if (!shouldLog(entry.level, this.minLevel)) return;

    this.buffer.push(this.formatter(entry));
    if (this.buffer.length >= this.bufferSize || entry.level === "error" || entry.level === "fatal") {
      this.flush();
    }
  }

  flush(): void {
    if (this.buffer.length === 0) return;
    const content = this.buffer.join("\n") + "\n";
    this.buffer = [];
    fs.appendFileSync(this.filePath, content, "utf-8");
  }

  close(): void {
    this.flush();
  }
}

/** Keeps entries in memory; used by tests and by callers that render logs themselves. */
export class MemoryTransport implements LogTransport {
  name = "memory";
  readonly entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }

  clear(): void {
    this.entries.length = 0;
  }
}

// =============================================================================
// Logger Implementation
// =============================================================================

export class LoggerImpl implements Logger {
  readonly subsystem: string;
  private level: LogLevel;
  private transports: LogTransport[];
  private context: LogContext;
  private redactPatterns: RegExp[];

  constructor(options: {
    subsystem: string;
    level?: LogLevel;
    transports?: LogTransport[];
    context?: LogContext;
    redactPatterns?: string[];
  }) {
    this.subsystem = options.subsystem;
    this.level = options.level ?? "info";
    this.transports = options.transports ?? [new ConsoleTransport()];
    this.context = options.context ?? {};
    this.redactPatterns = (options.redactPatterns ?? []).map((p) => new RegExp(p, "gi"));
  }

  trace(message: string, meta?: Record<string, unknown>): void {
    this.log("trace", message, meta);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log("debug", message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log("info", message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log("warn", message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log("error", message, meta);
  }

  fatal(message: string, meta?: Record<string, unknown>): void {
    this.log("fatal", message, meta);
  }

  child(name: string): Logger {
    return new LoggerImpl({
      subsystem: `${this.subsystem}/${name}`,
      level: this.level,
      transports: this.transports,
      context: this.context,
      redactPatterns: this.redactPatterns.map((r) => r.source),
    });
  }

  withContext(context: LogContext): Logger {
    return new LoggerImpl({
      subsystem: this.subsystem,
      level: this.level,
      transports: this.transports,
      context: { ...this.context, ...context },
      redactPatterns: this.redactPatterns.map((r) => r.source),
    });
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return shouldLog(level, this.level);
  }

  private log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (!shouldLog(level, this.level)) return;

    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      subsystem: this.subsystem,
      message: this.redact(message),
      metadata: meta ? this.redactObject(meta) : undefined,
      scope: this.context.scope,
      runId: this.context.runId,
      address: this.context.address,
    };

    for (const transport of this.transports) {
      try {
        transport.write(entry);
      } catch (err) {
        // A broken transport must not take the run down with it.
        process.stderr.write(`log transport "${transport.name}" failed: ${String(err)}\n`);
      }
    }
  }

  private redact(value: string): string {
    let result = value;
    for (const pattern of this.redactPatterns) {
      result = result.replace(pattern, "[REDACTED]");
    }
    return result;
  }

  private redactObject(obj: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      if (typeof value === "string") {
        result[key] = this.redact(value);
      } else if (typeof value === "object" && value !== null && !Array.isArray(value)) {
        result[key] = this.redactObject(Object.fromEntries(Object.entries(value)));
      } else {
        result[key] = value;
      }
    }
    return result;
  }
}

// =============================================================================
// Logger Factory
// =============================================================================

export function createLogger(subsystem: string, options?: LoggingOptions): Logger {
  const transports: LogTransport[] = [new ConsoleTransport({ formatter: createDefaultFormatter({ colors: options?.colors }) })];
  if (options?.file) {
    transports.push(new FileTransport({ filePath: options.file }));
  }

  return new LoggerImpl({
    subsystem,
    level: options?.level ?? "info",
    transports,
    redactPatterns: options?.redactPatterns,
  });
}

let rootLogger: Logger | null = null;

/**
 * Get a subsystem logger under the process-wide root logger.
 *
 * Loggers obtained before `configureLogging` keep the transports they were
 * created with, so entry points configure logging first.
 */
export function getLogger(subsystem?: string): Logger {
  if (!rootLogger) {
    rootLogger = createLogger("converge", { level: "warn" });
  }
  return subsystem ? rootLogger.child(subsystem) : rootLogger;
}

export function configureLogging(options: LoggingOptions): Logger {
  rootLogger = createLogger("converge", options);
  return rootLogger;
}

export function setRootLogger(logger: Logger | null): void {
  rootLogger = logger;
}
