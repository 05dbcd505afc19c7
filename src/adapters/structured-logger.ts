import type { Logger } from "../interfaces/logger.js";

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

const LEVEL_NAMES: Record<Exclude<LogLevel, LogLevel.SILENT>, string> = {
  [LogLevel.DEBUG]: "debug",
  [LogLevel.INFO]: "info",
  [LogLevel.WARN]: "warn",
  [LogLevel.ERROR]: "error",
};

const RESERVED_FIELDS = new Set(["time", "level", "msg", "component"]);

const LEVELS_BY_NAME: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT,
};

/**
 * Map a level name (case-insensitive) to a LogLevel, e.g. from an environment
 * variable. Unknown or missing names yield `fallback`.
 */
export function parseLogLevel(name: string | undefined, fallback = LogLevel.INFO): LogLevel {
  if (!name) return fallback;
  return LEVELS_BY_NAME[name.trim().toLowerCase()] ?? fallback;
}

export interface StructuredLoggerOptions {
  writer?: (line: string) => void;
  level?: LogLevel;
  component?: string;
  /** Fields merged into every entry, e.g. `{ circuitBreaker: "payments" }`. */
  bindings?: Record<string, unknown>;
}

/** JSON-lines logger. One line per entry, written to stderr unless a writer is given. */
export class StructuredLogger implements Logger {
  private readonly writer: (line: string) => void;
  private readonly level: LogLevel;
  private readonly component: string | undefined;
  private readonly bindings: Record<string, unknown>;

  constructor(options: StructuredLoggerOptions = {}) {
    this.writer = options.writer ?? ((line) => process.stderr.write(`${line}\n`));
    this.level = options.level ?? LogLevel.INFO;
    this.component = options.component;
    this.bindings = options.bindings ?? {};
  }

  /** Derive a logger sharing this writer and level, with extra bound fields. */
  child(bindings: Record<string, unknown>, component = this.component): StructuredLogger {
    return new StructuredLogger({
      writer: this.writer,
      level: this.level,
      component,
      bindings: { ...this.bindings, ...bindings },
    });
  }

  debug(msg: string, ctx?: Record<string, unknown>): void {
    this.write(LogLevel.DEBUG, msg, ctx);
  }

  info(msg: string, ctx?: Record<string, unknown>): void {
    this.write(LogLevel.INFO, msg, ctx);
  }

  warn(msg: string, ctx?: Record<string, unknown>): void {
    this.write(LogLevel.WARN, msg, ctx);
  }

  error(msg: string, ctx?: Record<string, unknown>): void {
    this.write(LogLevel.ERROR, msg, ctx);
  }

  private write(level: Exclude<LogLevel, LogLevel.SILENT>, msg: string, ctx?: Record<string, unknown>): void {
    if (level < this.level) return;

    const entry: Record<string, unknown> = {
      time: new Date().toISOString(),
      level: LEVEL_NAMES[level],
      msg,
    };

    if (this.component) entry.component = this.component;

    for (const [key, value] of Object.entries({ ...this.bindings, ...ctx })) {
      if (RESERVED_FIELDS.has(key)) continue;
      if (value instanceof Error) {
        entry[key] = value.message;
        entry[`${key}Stack`] = value.stack;
      } else {
        entry[key] = value;
      }
    }

    try {
      this.writer(JSON.stringify(entry));
    } catch {
      // Circular reference or serialization failure: emit the fields that are known to serialize
      this.writer(
        JSON.stringify({ time: entry.time, level: entry.level, msg, serializationError: true }),
      );
    }
  }
}
