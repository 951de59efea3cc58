import { setTimeout as sleep } from "timers/promises";
import { ProbeErrorKind, type MonitorConfig, type MonitorState, type MonitorSummary, type ProbeBatch, type ProbeResult, type WindowMetrics } from "../types/interfaces";
import { LogIOError, describeError } from "../types/errors";
import { addWindow, createTotals, finishTotals, summarize, type RunTotals } from "../utils/metrics";
import { formatRecord } from "../utils/record";
import { formatMinutes } from "../utils/duration";
import type { AppendResult, LogSink } from "./logWriter";
import type { Logger } from "./logger";
import type { ProbeExecutor } from "./probe";

export interface WindowEvent {
  index: number;
  metrics: WindowMetrics;
  batch: ProbeBatch;
  append: AppendResult;
  state: MonitorState;
}

export interface MonitorListener {
  onWindow?(event: WindowEvent): void;
  onStateChange?(state: MonitorState, previous: MonitorState): void;
}

export interface MonitorOptions {
  config: MonitorConfig;
  executor: ProbeExecutor;
  sink: LogSink;
  logger?: Logger;
  listener?: MonitorListener;
  now?: () => number;
}

/** Every probe of a window that could not run is recorded as a platform error. */
function failedBatch(count: number, windowStart: Date, windowEnd: Date, message: string): ProbeBatch {
  const results: ProbeResult[] = Array.from({ length: count }, () =>
    Object.freeze({ timestamp: windowEnd, roundTripMillis: null, succeeded: false, errorKind: ProbeErrorKind.PlatformError, detail: message })
  );
  return { results, windowStart, windowEnd, error: message };
}

/**
 * Sequential probe scheduler: idle -> running <-> paused -> stopped.
 *
 * Each window runs to completion, then the loop sleeps for the configured interval measured
 * from the end of that window. `stop()` interrupts the sleep or an in-flight probe at once.
 */
export class MonitorLoop {
  private _state: MonitorState = "idle";
  private readonly controller = new AbortController();
  private run: Promise<MonitorSummary> | null = null;
  private totals: RunTotals = createTotals();
  private readonly now: () => number;

  constructor(private readonly options: MonitorOptions) {
    this.now = options.now ?? Date.now;
  }

  public get state(): MonitorState {
    return this._state;
  }

  /**
   * Runs until `durationMinutes` have elapsed (`null` runs until stopped).
   * Resolves with the run summary once the log files are closed.
   */
  public start(durationMinutes: number | null): Promise<MonitorSummary> {
    if (this._state !== "idle") {
      throw new Error(`Monitor cannot start from state "${this._state}"`);
    }
    if (durationMinutes !== null && !(durationMinutes > 0)) {
      throw new Error(`Test duration must be positive, got ${durationMinutes}`);
    }

    this.run = this.execute(durationMinutes);
    return this.run;
  }

  /** Requests a stop. Returns the pending summary, or null if the loop never started. */
  public stop(): Promise<MonitorSummary> | null {
    if (!this.run) {
      if (this._state === "idle") this.setState("stopped");
      return null;
    }
    if (!this.controller.signal.aborted) {
      this.options.logger?.log("Stop requested, finishing up...", "INFO");
      this.controller.abort();
    }
    return this.run;
  }

  private setState(next: MonitorState) {
    const previous = this._state;
    if (previous === next) return;
    this._state = next;
    this.notify(() => this.options.listener?.onStateChange?.(next, previous));
  }

  private notify(callback: () => void) {
    try {
      callback();
    } catch (error) {
      this.options.logger?.error(`Monitor listener failed: ${describeError(error)}`);
    }
  }

  private isPastEnd(endTime: number | null): boolean {
    return endTime !== null && this.now() >= endTime;
  }

  private async execute(durationMinutes: number | null): Promise<MonitorSummary> {
    const { config, logger, sink } = this.options;
    const signal = this.controller.signal;
    const startedAt = new Date(this.now());
    const endTime = durationMinutes === null ? null : startedAt.getTime() + durationMinutes * 60_000;

    this.setState("running");
    logger?.log(`Monitoring ${config.targetHost} for ${formatMinutes(durationMinutes)} (${config.probeCount} probes every ${config.intervalSeconds}s)`, "INFO");

    try {
      while (!signal.aborted && !this.isPastEnd(endTime)) {
        await this.tick(signal);
        if (signal.aborted || this.isPastEnd(endTime)) break;
        await this.waitForNextWindow(endTime, signal);
      }
    } finally {
      await sink.close();
      await logger?.flush();
    }

    const summary = finishTotals(this.totals, signal.aborted ? "cancelled" : "completed", startedAt, new Date(this.now()));
    this.setState("stopped");
    logger?.log(`Monitoring ${summary.reason} after ${summary.windows} windows`, "INFO");
    return summary;
  }

  private async waitForNextWindow(endTime: number | null, signal: AbortSignal): Promise<void> {
    const remaining = endTime === null ? Infinity : endTime - this.now();
    const delay = Math.min(this.options.config.intervalSeconds * 1000, remaining);
    if (delay <= 0) return;

    try {
      await sleep(delay, undefined, { signal });
    } catch (error) {
      if (!signal.aborted) throw error;
    }
  }

  private async tick(signal: AbortSignal): Promise<void> {
    const { config, executor, logger } = this.options;
    const windowStart = new Date(this.now());
    let transient = false;
    let batch: ProbeBatch;

    try {
      batch = await executor.runProbe(config.targetHost, config.probeCount, config.timeoutMillis, signal);
    } catch (error) {
      if (signal.aborted) return;
      transient = true;
      logger?.error(`Probe window failed: ${describeError(error)}`);
      batch = failedBatch(config.probeCount, windowStart, new Date(this.now()), describeError(error));
    }

    // A window cut short by stop() is not a measurement
    if (signal.aborted) return;

    const metrics = summarize(batch);
    const append = await this.appendWindow(metrics, batch);
    if (append.errors.length > 0) transient = true;

    this.totals = addWindow(this.totals, metrics, batch, append.errors.length);
    this.setState(transient ? "paused" : "running");

    const event: WindowEvent = { index: this.totals.windows, metrics, batch, append, state: this._state };
    this.notify(() => this.options.listener?.onWindow?.(event));
  }

  private async appendWindow(metrics: WindowMetrics, batch: ProbeBatch): Promise<AppendResult> {
    try {
      return await this.options.sink.append(metrics, batch);
    } catch (error) {
      const ioError = error instanceof LogIOError ? error : new LogIOError(this.options.config.allLogPath, "write", error);
      this.options.logger?.error(ioError);
      return { record: formatRecord(metrics, batch), failureLogged: false, rotated: [], errors: [ioError] };
    }
  }
}
