// =============================================================================
// Logger — Structured service event logging with pluggable sinks
// =============================================================================

import { appendFile, rename, rm, stat } from "node:fs/promises";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: number;
  level: LogLevel;
  event: string;
  data?: Record<string, unknown>;
}

export interface LogSink {
  (entry: LogEntry): void;
  /** Resolves once every entry handed to the sink has been written */
  flush?(): Promise<void>;
}

export interface Logger {
  debug(event: string, data?: Record<string, unknown>): void;
  info(event: string, data?: Record<string, unknown>): void;
  warn(event: string, data?: Record<string, unknown>): void;
  error(event: string, data?: Record<string, unknown>): void;
  /** Wait for buffered sinks to drain */
  flush(): Promise<void>;
}

export interface LoggerOptions {
  /** Minimum level to emit (default: "info") */
  level?: LogLevel;
  /** Destinations for emitted entries (default: console) */
  sinks?: LogSink[];
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function formatEntry(entry: LogEntry): string {
  const prefix = `[${new Date(entry.timestamp).toISOString()}] [${entry.level}]`;
  const data = entry.data && Object.keys(entry.data).length > 0
    ? ` ${JSON.stringify(entry.data)}`
    : "";
  return `${prefix} ${entry.event}${data}`;
}

export const consoleSink: LogSink = (entry) => {
  const line = formatEntry(entry);
  // eslint-disable-next-line no-console
  if (entry.level === "error" || entry.level === "warn") console.error(line);
  // eslint-disable-next-line no-console
  else console.log(line);
};

/** Last-resort report for a sink that could not write. Never throws. */
function reportSinkFailure(err: unknown): void {
  const message = err instanceof Error ? err.message : String(err);
  // eslint-disable-next-line no-console
  console.error(`[logger] sink failed: ${message}`);
}

export interface RotatingFileSinkOptions {
  path: string;
  /** Rotate once the active file reaches this size (default: 5 MB) */
  maxBytes?: number;
  /** Rotated files to keep as path.1 … path.N (default: 3) */
  backups?: number;
}

export interface RotatingFileSink extends LogSink {
  flush(): Promise<void>;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

async function sizeOf(path: string): Promise<number> {
  try {
    return (await stat(path)).size;
  } catch (err) {
    if (isMissingFile(err)) return 0;
    throw err;
  }
}

async function renameIfPresent(from: string, to: string): Promise<void> {
  try {
    await rename(from, to);
  } catch (err) {
    if (!isMissingFile(err)) throw err;
  }
}

/**
 * Appends formatted entries to a file, rolling it over at a size limit.
 * Writes are queued and run off the caller's stack, one entry at a time.
 */
export function createRotatingFileSink(options: RotatingFileSinkOptions): RotatingFileSink {
  const maxBytes = options.maxBytes ?? 5 * 1024 * 1024;
  const backups = options.backups ?? 3;
  let queue: Promise<void> = Promise.resolve();

  async function rotate(): Promise<void> {
    if (backups === 0) {
      await rm(options.path, { force: true });
      return;
    }
    await rm(`${options.path}.${backups}`, { force: true });
    for (let i = backups - 1; i >= 1; i--) {
      await renameIfPresent(`${options.path}.${i}`, `${options.path}.${i + 1}`);
    }
    await rename(options.path, `${options.path}.1`);
  }

  async function write(line: string): Promise<void> {
    const size = await sizeOf(options.path);
    if (size > 0 && size + Buffer.byteLength(line) > maxBytes) await rotate();
    await appendFile(options.path, line, "utf-8");
  }

  const sink = (entry: LogEntry): void => {
    const line = `${formatEntry(entry)}\n`;
    queue = queue.then(() => write(line)).catch(reportSinkFailure);
  };

  return Object.assign(sink, { flush: () => queue });
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? "info"];
  const sinks = options.sinks ?? [consoleSink];

  function emit(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < threshold) return;
    const entry: LogEntry = { timestamp: Date.now(), level, event, data };
    for (const sink of sinks) {
      try {
        sink(entry);
      } catch (err) {
        reportSinkFailure(err);
      }
    }
  }

  return {
    debug: (event, data) => emit("debug", event, data),
    info: (event, data) => emit("info", event, data),
    warn: (event, data) => emit("warn", event, data),
    error: (event, data) => emit("error", event, data),
    flush: async () => {
      await Promise.all(sinks.map((sink) => sink.flush?.()));
    },
  };
}

/** Logger that drops everything; the default for components built without one. */
export const silentLogger: Logger = createLogger({ sinks: [] });

/** Flattens an error (and its cause chain) into loggable fields. */
export function describeError(err: unknown): Record<string, unknown> {
  if (!(err instanceof Error)) return { error: String(err) };
  const described: Record<string, unknown> = {
    error: err.message,
    errorName: err.name,
  };
  if (err.cause !== undefined) {
    described.cause = err.cause instanceof Error ? err.cause.message : String(err.cause);
  }
  return described;
}
