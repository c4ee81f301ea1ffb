// =============================================================================
// ExpiryScheduler — Periodic purge of entries past the retention window
// =============================================================================

import type { ContentStorePort } from "../ports/content-store.port.js";
import { StorageError } from "../errors.js";
import { fail, ok, type Result } from "../result.js";
import { describeError, silentLogger, type Logger } from "../logging/logger.js";

export interface ExpirySchedulerOptions {
  store: ContentStorePort;
  /** Entries older than this are purged (default: 1 hour) */
  retentionMs?: number;
  /** Time between sweeps (default: 10 minutes) */
  intervalMs?: number;
  /** A sweep running longer than this is reported failed (default: intervalMs) */
  sweepTimeoutMs?: number;
  now?: () => Date;
  logger?: Logger;
}

export interface SweepReport {
  cutoff: Date;
  deleted: number;
}

export class ExpiryScheduler {
  private readonly store: ContentStorePort;
  private readonly retentionMs: number;
  private readonly intervalMs: number;
  private readonly sweepTimeoutMs: number;
  private readonly now: () => Date;
  private readonly logger: Logger;
  private timer: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<Result<SweepReport, StorageError>> | null = null;

  constructor(options: ExpirySchedulerOptions) {
    this.store = options.store;
    this.retentionMs = options.retentionMs ?? 60 * 60_000;
    this.intervalMs = options.intervalMs ?? 10 * 60_000;
    this.sweepTimeoutMs = options.sweepTimeoutMs ?? this.intervalMs;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? silentLogger;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => this.tick(), this.intervalMs);
    this.logger.info("scheduler:start", {
      intervalMs: this.intervalMs,
      retentionMs: this.retentionMs,
    });
  }

  /** Stop ticking and wait for a sweep that is still running. */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      this.logger.info("scheduler:stop");
    }
    if (this.inFlight) await this.inFlight;
  }

  private tick(): void {
    if (this.inFlight) {
      this.logger.warn("sweep:skipped", { reason: "previous sweep still running" });
      return;
    }
    // sweep() settles to a Result and never rejects
    void this.sweep();
  }

  /** Run one sweep now. Failures are logged and returned, never thrown. */
  sweep(): Promise<Result<SweepReport, StorageError>> {
    if (this.inFlight) return this.inFlight;
    const sweep = this.runSweep().catch((err: unknown) => fail(new StorageError("Sweep failed", err)));
    this.inFlight = sweep;
    void sweep.then(() => {
      if (this.inFlight === sweep) this.inFlight = null;
    });
    return sweep;
  }

  private async runSweep(): Promise<Result<SweepReport, StorageError>> {
    const cutoff = new Date(this.now().getTime() - this.retentionMs);
    this.logger.debug("sweep:start", { cutoff: cutoff.toISOString() });

    let timeout: ReturnType<typeof setTimeout> | undefined;
    const timedOut = new Promise<Result<number, StorageError>>((resolve) => {
      timeout = setTimeout(
        () => resolve(fail(new StorageError(`Sweep timed out after ${this.sweepTimeoutMs}ms`))),
        this.sweepTimeoutMs,
      );
    });

    let purged: Result<number, StorageError>;
    try {
      purged = await Promise.race([this.store.purgeOlderThan(cutoff), timedOut]);
    } catch (err) {
      purged = fail(new StorageError("Sweep failed", err));
    } finally {
      clearTimeout(timeout);
    }

    if (!purged.success) {
      this.logger.error("sweep:failed", { cutoff: cutoff.toISOString(), ...describeError(purged.error) });
      return purged;
    }
    this.logger.info("sweep:done", { cutoff: cutoff.toISOString(), deleted: purged.data });
    return ok({ cutoff, deleted: purged.data });
  }
}
