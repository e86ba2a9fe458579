/**
 * Bootstrap Logging
 *
 * Structured, leveled logging with subsystem names, pluggable transports and
 * a shared redactor so resolved secret values never reach any destination.
 */

import { createWriteStream, type WriteStream } from "node:fs";
import type { LoggingConfig } from "../config/schema.js";

// =============================================================================
// Logger Types
// =============================================================================

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

export type LogEntry = {
  timestamp: Date;
  level: LogLevel;
  subsystem: string;
  message: string;
  metadata?: Record<string, unknown>;
  environment?: string;
  runId?: string;
  phase?: string;
  target?: string;
};

export type LogFormatter = (entry: LogEntry) => string;

export interface LogTransport {
  name: string;
  write(entry: LogEntry): void;
  flush?(): Promise<void>;
  close?(): Promise<void>;
}

/**
 * Log context carried by contextual child loggers
 */
export type LogContext = {
  environment?: string;
  runId?: string;
  phase?: string;
  target?: string;
};

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
  /** Register secret values that must be masked in every later entry. */
  redactValues(values: Iterable<string>): void;
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

export const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal"];

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVEL_PRIORITY, value);
}

/**
 * Check if a level should be logged given a minimum level
 */
export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[minLevel];
}

// =============================================================================
// Redaction
// =============================================================================

export const REDACTED = "[REDACTED]";

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Masks registered secret values and configured patterns. One instance is
 * shared by a logger and all of its children.
 */
export class Redactor {
  private values = new Set<string>();
  private patterns: RegExp[];
  private combined: RegExp | null = null;

  constructor(patterns: string[] = []) {
    this.patterns = patterns.map((p) => new RegExp(p, "gi"));
  }

  addValues(values: Iterable<string>): void {
    for (const value of values) {
      // Very short values would mask unrelated text.
      if (value.length >= 4) this.values.add(value);
    }
    this.combined = null;
  }

  get size(): number {
    return this.values.size;
  }

  redact(text: string): string {
    let result = text;
    if (this.values.size > 0) {
      if (!this.combined) {
        const sorted = [...this.values].sort((a, b) => b.length - a.length);
        this.combined = new RegExp(sorted.map(escapeRegExp).join("|"), "g");
      }
      result = result.replace(this.combined, REDACTED);
    }
    for (const pattern of this.patterns) {
      result = result.replace(pattern, REDACTED);
    }
    return result;
  }

  redactValue(value: unknown): unknown {
    if (typeof value === "string") return this.redact(value);
    if (Array.isArray(value)) return value.map((v) => this.redactValue(v));
    if (value instanceof Error) return this.redact(value.message);
    if (typeof value === "object" && value !== null) {
      const result: Record<string, unknown> = {};
      for (const [key, inner] of Object.entries(value)) {
        result[key] = this.redactValue(inner);
      }
      return result;
    }
    return value;
  }
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
  info: COLORS.blue,
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
    colors = process.stdout.isTTY ?? false,
    timestamps = true,
    includeMetadata = true,
  } = options ?? {};

  return (entry: LogEntry): string => {
    const parts: string[] = [];

    if (timestamps) {
      const ts = entry.timestamp.toISOString().slice(11, 19);
      parts.push(colors ? `${COLORS.dim}${ts}${COLORS.reset}` : ts);
    }

    const levelStr = entry.level.toUpperCase().padEnd(5);
    parts.push(colors ? `${LEVEL_COLORS[entry.level]}${levelStr}${COLORS.reset}` : levelStr);
    parts.push(colors ? `${COLORS.cyan}[${entry.subsystem}]${COLORS.reset}` : `[${entry.subsystem}]`);
    parts.push(entry.message);

    const contextParts: string[] = [];
    if (entry.environment) contextParts.push(`env=${entry.environment}`);
    if (entry.phase) contextParts.push(`phase=${entry.phase}`);
    if (entry.target) contextParts.push(`target=${entry.target}`);
    if (contextParts.length > 0) {
      const ctx = contextParts.join(" ");
      parts.push(colors ? `${COLORS.dim}(${ctx})${COLORS.reset}` : `(${ctx})`);
    }

    if (includeMetadata && entry.metadata && Object.keys(entry.metadata).length > 0) {
      const metaStr = JSON.stringify(entry.metadata);
      parts.push(colors ? `${COLORS.dim}${metaStr}${COLORS.reset}` : metaStr);
    }

    return parts.join(" ");
  };
}

// =============================================================================
// Transports
// =============================================================================

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

    const formatted = this.formatter(entry);
    if (entry.level === "error" || entry.level === "fatal") {
      console.error(formatted);
    } else if (entry.level === "warn") {
      console.warn(formatted);
    } else {
      console.log(formatted);
    }
  }
}

/**
 * Appends formatted entries to a file, buffered.
 */
export class FileTransport implements LogTransport {
  name = "file";
  private formatter: LogFormatter;
  private minLevel: LogLevel;
  private buffer: string[] = [];
  private bufferSize: number;
  private filePath: string;
  private stream: WriteStream | null = null;

  constructor(options: {
    filePath: string;
    formatter?: LogFormatter;
    minLevel?: LogLevel;
    bufferSize?: number;
  }) {
    this.filePath = options.filePath;
    this.formatter = options.formatter ?? createDefaultFormatter({ colors: false });
    this.minLevel = options.minLevel ?? "trace";
    this.bufferSize = options.bufferSize ?? 50;
  }

  write(entry: LogEntry): void {
    if (!shouldLog(entry.level, this.minLevel)) return;
    this.buffer.push(this.formatter(entry));
    if (this.buffer.length >= this.bufferSize) this.drain();
  }

  private drain(): void {
    if (this.buffer.length === 0) return;
    if (!this.stream) {
      this.stream = createWriteStream(this.filePath, { flags: "a", mode: 0o600 });
    }
    const content = this.buffer.join("\n") + "\n";
    this.buffer = [];
    this.stream.write(content);
  }

  async flush(): Promise<void> {
    this.drain();
  }

  async close(): Promise<void> {
    this.drain();
    const stream = this.stream;
    this.stream = null;
    if (!stream) return;
    await new Promise<void>((resolve, reject) => {
      stream.once("error", reject);
      stream.end(() => resolve());
    });
  }
}

/**
 * Keeps entries in memory for inspection after a run.
 */
export class MemoryTransport implements LogTransport {
  name = "memory";
  readonly entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }

  messages(level?: LogLevel): string[] {
    return this.entries.filter((e) => !level || e.level === level).map((e) => e.message);
  }
}

// =============================================================================
// Logger Implementation
// =============================================================================

export class BootstrapLogger implements Logger {
  readonly subsystem: string;
  private level: LogLevel;
  private transports: LogTransport[];
  private context: LogContext;
  private redactor: Redactor;

  constructor(options: {
    subsystem: string;
    level?: LogLevel;
    transports?: LogTransport[];
    context?: LogContext;
    redactor?: Redactor;
  }) {
    this.subsystem = options.subsystem;
    this.level = options.level ?? "info";
    this.transports = options.transports ?? [new ConsoleTransport()];
    this.context = options.context ?? {};
    this.redactor = options.redactor ?? new Redactor();
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
    return new BootstrapLogger({
      subsystem: `${this.subsystem}/${name}`,
      level: this.level,
      transports: this.transports,
      context: this.context,
      redactor: this.redactor,
    });
  }

  withContext(context: LogContext): Logger {
    return new BootstrapLogger({
      subsystem: this.subsystem,
      level: this.level,
      transports: this.transports,
      context: { ...this.context, ...context },
      redactor: this.redactor,
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

  redactValues(values: Iterable<string>): void {
    this.redactor.addValues(values);
  }

  private log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (!shouldLog(level, this.level)) return;

    const metadata = meta ? this.redactor.redactValue(meta) : undefined;
    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      subsystem: this.subsystem,
      message: this.redactor.redact(message),
      metadata: isRecord(metadata) ? metadata : undefined,
      environment: this.context.environment,
      runId: this.context.runId,
      phase: this.context.phase,
      target: this.context.target,
    };

    for (const transport of this.transports) {
      transport.write(entry);
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// =============================================================================
// Logger Factory
// =============================================================================

/**
 * Create the root logger from configuration. Returns the transports too so the
 * caller can flush and close them on exit.
 */
export function createLogger(
  config?: Partial<LoggingConfig>,
  options?: { transports?: LogTransport[] },
): { logger: Logger; transports: LogTransport[] } {
  const transports: LogTransport[] = options?.transports ? [...options.transports] : [];

  if (!options?.transports) {
    transports.push(new ConsoleTransport());
    if (config?.file) {
      transports.push(new FileTransport({ filePath: config.file }));
    }
  }

  const logger = new BootstrapLogger({
    subsystem: "fleet",
    level: config?.level ?? "info",
    transports,
    redactor: new Redactor(config?.redactPatterns ?? []),
  });
  return { logger, transports };
}

/** Logger that drops everything; default for library callers. */
export function createSilentLogger(): Logger {
  return new BootstrapLogger({ subsystem: "fleet", level: "fatal", transports: [] });
}
