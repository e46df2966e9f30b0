import { inspect } from "node:util";

export type LogLevel = "debug" | "info" | "warn" | "error";
export const LOG_LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface LogEntry {
  ts: number;
  level: LogLevel;
  scope?: string;
  message: string;
  meta?: Record<string, unknown>;
}

export interface Logger {
  child(scope: string): Logger;
  log(level: LogLevel, message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  isLevelEnabled(level: LogLevel): boolean;
}

type Sink = (entry: LogEntry) => void;
type EchoWriter = (entry: LogEntry) => void;

export interface LoggerOptions {
  scope?: string;
  sink?: Sink;
  minLevel?: LogLevel;
  echo?: EchoWriter | false;
  clock?: () => number;
}

function isEchoSuppressed(): boolean {
  const raw = process.env.RPBS_DISABLE_LOG_ECHO?.trim().toLowerCase();
  if (!raw) return false;
  return raw !== "0" && raw !== "false";
}

const GLYPHS: Record<LogLevel, string> = {
  error: "⛔",
  warn: "⚠️",
  info: "ℹ️",
  debug: "·",
};

const stderrEcho: EchoWriter = (entry) => {
  if (isEchoSuppressed()) return;
  const scopeText = entry.scope ? `[${entry.scope}] ` : "";
  const line = `${GLYPHS[entry.level]} ${scopeText}${entry.message}`;
  if (entry.meta) {
    console.error(line, serializeMeta(entry.meta));
  } else {
    console.error(line);
  }
};

function serializeMeta(meta: Record<string, unknown>): string {
  try {
    return JSON.stringify(meta);
  } catch {
    return inspect(meta, { depth: 4 });
  }
}

export function levelAtOrAbove(desired: LogLevel, candidate: LogLevel): boolean {
  return LEVEL_ORDER[candidate] >= LEVEL_ORDER[desired];
}

/**
 * Logger that filters by a minimum level, hands every accepted entry to a sink
 * and optionally echoes it. Children share sink, echo and threshold, and
 * extend the dotted scope.
 */
export class StructuredLogger implements Logger {
  protected readonly scope?: string;
  private readonly sink: Sink;
  private readonly minLevel: LogLevel;
  private readonly echo: EchoWriter | false;
  private readonly clock: () => number;

  constructor({ scope, sink, minLevel, echo, clock }: LoggerOptions = {}) {
    this.scope = scope;
    this.sink = sink ?? (() => {});
    this.minLevel = minLevel ?? "info";
    this.echo = echo ?? false;
    this.clock = clock ?? Date.now;
  }

  child(scope: string): Logger {
    return new StructuredLogger({
      scope: this.scope ? `${this.scope}.${scope}` : scope,
      sink: this.sink,
      minLevel: this.minLevel,
      echo: this.echo,
      clock: this.clock,
    });
  }

  log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (!this.isLevelEnabled(level)) return;
    const entry: LogEntry = {
      ts: this.clock(),
      level,
      scope: this.scope,
      message,
      meta: meta && Object.keys(meta).length ? meta : undefined,
    };
    this.sink(entry);
    if (this.echo) this.echo(entry);
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

  isLevelEnabled(level: LogLevel): boolean {
    return levelAtOrAbove(this.minLevel, level);
  }
}

export class ConsoleLogger extends StructuredLogger {
  constructor(minLevel: LogLevel = "info") {
    super({ minLevel, echo: stderrEcho });
  }
}

/** Keeps entries in memory; used by tests and by dry runs that report later. */
export class MemoryLogger extends StructuredLogger {
  readonly entries: LogEntry[];

  constructor(minLevel: LogLevel = "debug", entries: LogEntry[] = []) {
    super({ minLevel, sink: (entry) => entries.push(entry) });
    this.entries = entries;
  }

  messages(level?: LogLevel): string[] {
    return this.entries
      .filter((entry) => !level || entry.level === level)
      .map((entry) => entry.message);
  }
}

export class NullLogger implements Logger {
  child(): Logger {
    return this;
  }
  log(): void {}
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
  isLevelEnabled(): boolean {
    return false;
  }
}

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as string[]).includes(value);
}

export function parseLogLevel(
  raw: string | undefined,
  fallback: LogLevel = "info",
): LogLevel {
  if (!raw) return fallback;
  const normalized = raw.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : fallback;
}
