/**
 * Drift Audit Logging
 *
 * Structured, levelled logging with pluggable transports. Library code
 * receives a logger through its options and defaults to a silent one; the
 * CLI wires a console logger.
 */

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
  resourceAddress?: string;
  resourceType?: string;
};

export type LogFormatter = (entry: LogEntry) => string;

export interface LogTransport {
  name: string;
  write(entry: LogEntry): void;
}

/** Context attached to every entry of a scoped logger */
export type LogContext = {
  resourceAddress?: string;
  resourceType?: string;
};

export interface DriftLogger {
  readonly subsystem: string;

  trace(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  fatal(message: string, meta?: Record<string, unknown>): void;

  child(name: string): DriftLogger;
  withContext(context: LogContext): DriftLogger;
  setLevel(level: LogLevel): void;
  getLevel(): LogLevel;
  isLevelEnabled(level: LogLevel): boolean;
}

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

export function compareLogLevels(a: LogLevel, b: LogLevel): -1 | 0 | 1 {
  const pa = LOG_LEVEL_PRIORITY[a];
  const pb = LOG_LEVEL_PRIORITY[b];
  if (pa < pb) return -1;
  if (pa > pb) return 1;
  return 0;
}

/** Check if a level should be logged given a minimum level */
export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[minLevel];
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVEL_PRIORITY, value);
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

/**
 * `<timestamp> <LEVEL> [<subsystem>] <message> (<context>) <metadata>`
 */
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

  const paint = (color: string, text: string) => (colors ? `${color}${text}${COLORS.reset}` : text);

  return (entry: LogEntry): string => {
    const parts: string[] = [];

    if (timestamps) {
      parts.push(paint(COLORS.dim, entry.timestamp.toISOString()));
    }

    parts.push(paint(LEVEL_COLORS[entry.level], entry.level.toUpperCase().padEnd(5)));
    parts.push(paint(COLORS.blue, `[${entry.subsystem}]`));
    parts.push(entry.message);

    const contextParts: string[] = [];
    if (entry.resourceAddress) contextParts.push(`address=${entry.resourceAddress}`);
    if (entry.resourceType) contextParts.push(`type=${entry.resourceType}`);
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

/** Writes every entry to stderr; stdout carries command output only */
export class ConsoleTransport implements LogTransport {
  name = "console";
  private formatter: LogFormatter;

  constructor(options?: { formatter?: LogFormatter }) {
    this.formatter = options?.formatter ?? createDefaultFormatter();
  }

  write(entry: LogEntry): void {
    console.error(this.formatter(entry));
  }
}

/** Keeps entries in memory; used by tests and embedding callers */
export class MemoryTransport implements LogTransport {
  name = "memory";
  readonly entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }

  messages(level?: LogLevel): string[] {
    return this.entries.filter((e) => level === undefined || e.level === level).map((e) => e.message);
  }
}

// =============================================================================
// Logger Implementation
// =============================================================================

export class DriftLoggerImpl implements DriftLogger {
  readonly subsystem: string;
  private level: LogLevel;
  private transports: LogTransport[];
  private context: LogContext;

  constructor(options: {
    subsystem: string;
    level?: LogLevel;
    transports?: LogTransport[];
    context?: LogContext;
  }) {
    this.subsystem = options.subsystem;
    this.level = options.level ?? "info";
    this.transports = options.transports ?? [new ConsoleTransport()];
    this.context = options.context ?? {};
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

  child(name: string): DriftLogger {
    return new DriftLoggerImpl({
      subsystem: `${this.subsystem}/${name}`,
      level: this.level,
      transports: this.transports,
      context: this.context,
    });
  }

  withContext(context: LogContext): DriftLogger {
    return new DriftLoggerImpl({
      subsystem: this.subsystem,
      level: this.level,
      transports: this.transports,
      context: { ...this.context, ...context },
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
      message,
      metadata: meta,
      resourceAddress: this.context.resourceAddress,
      resourceType: this.context.resourceType,
    };

    for (const transport of this.transports) {
      transport.write(entry);
    }
  }
}

// =============================================================================
// Logger Factory
// =============================================================================

export type LoggerConfig = {
  level?: LogLevel;
  timestamps?: boolean;
  colors?: boolean;
};

export function createDriftLogger(subsystem: string, config?: LoggerConfig): DriftLogger {
  const formatter = createDefaultFormatter({ timestamps: config?.timestamps, colors: config?.colors });
  return new DriftLoggerImpl({
    subsystem: `drift-audit/${subsystem}`,
    level: config?.level ?? "info",
    transports: [new ConsoleTransport({ formatter })],
  });
}

/** A logger with no transports; every call is a no-op */
export function createSilentLogger(subsystem = "drift-audit"): DriftLogger {
  return new DriftLoggerImpl({ subsystem, level: "fatal", transports: [] });
}
