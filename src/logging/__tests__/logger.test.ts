import { describe, it, expect, afterEach, vi } from "vitest";
import { mkdtempSync, readFileSync, existsSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  createLogger,
  createRotatingFileSink,
  describeError,
  formatEntry,
  type LogEntry,
} from "../logger.js";
import { StorageError } from "../../errors.js";

describe("createLogger", () => {
  it("drops entries below the configured level", () => {
    const entries: LogEntry[] = [];
    const logger = createLogger({ level: "warn", sinks: [(e) => entries.push(e)] });

    logger.debug("a");
    logger.info("b");
    logger.warn("c", { n: 1 });
    logger.error("d");

    expect(entries.map((e) => [e.level, e.event])).toEqual([
      ["warn", "c"],
      ["error", "d"],
    ]);
    expect(entries[0]?.data).toEqual({ n: 1 });
  });

  it("defaults to info", () => {
    const entries: LogEntry[] = [];
    const logger = createLogger({ sinks: [(e) => entries.push(e)] });
    logger.debug("hidden");
    logger.info("shown");
    expect(entries.map((e) => e.event)).toEqual(["shown"]);
  });

  it("fans out to every sink", () => {
    const first: LogEntry[] = [];
    const second: LogEntry[] = [];
    const logger = createLogger({ sinks: [(e) => first.push(e), (e) => second.push(e)] });
    logger.info("event");
    expect(first).toHaveLength(1);
    expect(second).toHaveLength(1);
  });

  it("keeps emitting when a sink throws", () => {
    const stderr = vi.spyOn(console, "error").mockImplementation(() => {});
    const entries: LogEntry[] = [];
    const logger = createLogger({
      sinks: [
        () => {
          throw new Error("ENOSPC: no space left on device");
        },
        (e) => entries.push(e),
      ],
    });

    expect(() => logger.error("sweep:failed")).not.toThrow();
    expect(entries.map((e) => e.event)).toEqual(["sweep:failed"]);
    expect(stderr).toHaveBeenCalledWith("[logger] sink failed: ENOSPC: no space left on device");
    stderr.mockRestore();
  });

  it("flush waits for sinks that buffer", async () => {
    let flushed = false;
    const sink = Object.assign(() => {}, {
      flush: async () => {
        flushed = true;
      },
    });
    const logger = createLogger({ sinks: [sink, () => {}] });
    await logger.flush();
    expect(flushed).toBe(true);
  });
});

describe("formatEntry", () => {
  it("prints timestamp, level, event and data", () => {
    const line = formatEntry({
      timestamp: Date.UTC(2024, 0, 1),
      level: "info",
      event: "upload:stored",
      data: { token: "abc", textLength: 5 },
    });
    expect(line).toBe(
      '[2024-01-01T00:00:00.000Z] [info] upload:stored {"token":"abc","textLength":5}',
    );
  });

  it("omits empty data", () => {
    const line = formatEntry({ timestamp: Date.UTC(2024, 0, 1), level: "warn", event: "x", data: {} });
    expect(line).toBe("[2024-01-01T00:00:00.000Z] [warn] x");
  });
});

describe("createRotatingFileSink", () => {
  let dir = "";

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = "";
  });

  const entry = (event: string): LogEntry => ({
    timestamp: Date.UTC(2024, 0, 1),
    level: "info",
    event,
  });

  it("appends formatted lines", async () => {
    dir = mkdtempSync(join(tmpdir(), "pagebrief-log-"));
    const path = join(dir, "app.log");
    const sink = createRotatingFileSink({ path });

    sink(entry("one"));
    sink(entry("two"));
    await sink.flush();

    expect(readFileSync(path, "utf-8")).toBe(
      "[2024-01-01T00:00:00.000Z] [info] one\n[2024-01-01T00:00:00.000Z] [info] two\n",
    );
  });

  it("rolls over and keeps at most the configured backups", async () => {
    dir = mkdtempSync(join(tmpdir(), "pagebrief-log-"));
    const path = join(dir, "app.log");
    // each line is 38 bytes, so every write after the first rotates
    const sink = createRotatingFileSink({ path, maxBytes: 50, backups: 2 });

    sink(entry("one"));
    sink(entry("two"));
    sink(entry("thr"));
    sink(entry("fou"));
    await sink.flush();

    expect(readFileSync(path, "utf-8")).toBe("[2024-01-01T00:00:00.000Z] [info] fou\n");
    expect(readFileSync(`${path}.1`, "utf-8")).toBe("[2024-01-01T00:00:00.000Z] [info] thr\n");
    expect(readFileSync(`${path}.2`, "utf-8")).toBe("[2024-01-01T00:00:00.000Z] [info] two\n");
    expect(existsSync(`${path}.3`)).toBe(false);
  });

  it("writes off the caller's stack", async () => {
    dir = mkdtempSync(join(tmpdir(), "pagebrief-log-"));
    const path = join(dir, "app.log");
    const sink = createRotatingFileSink({ path });

    sink(entry("one"));
    expect(existsSync(path)).toBe(false);

    await sink.flush();
    expect(existsSync(path)).toBe(true);
  });

  it("reports a failed write instead of rejecting", async () => {
    const stderr = vi.spyOn(console, "error").mockImplementation(() => {});
    dir = mkdtempSync(join(tmpdir(), "pagebrief-log-"));
    const sink = createRotatingFileSink({ path: join(dir, "missing-dir", "app.log") });

    sink(entry("one"));
    await expect(sink.flush()).resolves.toBeUndefined();
    expect(stderr).toHaveBeenCalledTimes(1);
    expect(String(stderr.mock.calls[0]?.[0])).toMatch(/^\[logger\] sink failed: ENOENT/);
    stderr.mockRestore();
  });
});

describe("describeError", () => {
  it("flattens an error and its cause", () => {
    const err = new StorageError("Sweep failed", new Error("boom"));
    expect(describeError(err)).toEqual({
      error: "Sweep failed",
      errorName: "StorageError",
      cause: "boom",
    });
  });

  it("stringifies non-errors", () => {
    expect(describeError("plain")).toEqual({ error: "plain" });
  });
});
