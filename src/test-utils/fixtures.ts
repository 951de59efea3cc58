/**
 * Shared builders for probe results, batches and configs used across the test suite.
 */

import { ProbeErrorKind, type MonitorConfig, type ProbeBatch, type ProbeOutcome, type ProbeResult, type WindowMetrics } from "../types/interfaces";
import type { AppendResult, LogSink } from "../services/logWriter";
import type { Pinger } from "../utils/ping";
import { formatRecord } from "../utils/record";

export const WINDOW_START = new Date(2026, 9, 19, 12, 0, 0, 0);

export const reply = (roundTripMillis: number): ProbeOutcome => ({ succeeded: true, roundTripMillis, errorKind: ProbeErrorKind.None });

export const noReply = (errorKind: Exclude<ProbeErrorKind, ProbeErrorKind.None>, detail?: string): ProbeOutcome => ({
  succeeded: false,
  roundTripMillis: null,
  errorKind,
  detail,
});

export const timeout = (detail = "No reply within 1000ms") => noReply(ProbeErrorKind.Timeout, detail);

export function createBatch(outcomes: ProbeOutcome[], options: { durationMillis?: number; error?: string } = {}): ProbeBatch {
  const windowEnd = new Date(WINDOW_START.getTime() + (options.durationMillis ?? 4000));
  const results: ProbeResult[] = outcomes.map((outcome) => ({ timestamp: WINDOW_START, ...outcome }));
  return { results, windowStart: WINDOW_START, windowEnd, error: options.error };
}

export function createConfig(overrides: Partial<MonitorConfig> = {}): MonitorConfig {
  return {
    targetHost: "192.0.2.10",
    probeCount: 2,
    timeoutMillis: 1000,
    intervalSeconds: 0.05,
    allLogPath: "all_attempts.log",
    failureLogPath: "lost_connection.log",
    errorLogPath: "error.log",
    maxLogBytes: 1024 * 1024,
    maxLogAgeMillis: null,
    ...overrides,
  };
}

/** Replays `script` in a loop; an Error entry makes that call reject. */
export class ScriptedPinger implements Pinger {
  readonly name = "scripted";
  public calls: string[] = [];

  constructor(
    private readonly script: Array<ProbeOutcome | Error>,
    private readonly onPing?: (call: number) => void
  ) {}

  public async ping(target: string): Promise<ProbeResult> {
    const call = this.calls.length;
    this.calls.push(target);
    this.onPing?.(call);

    const next = this.script[call % this.script.length];
    if (next instanceof Error) throw next;
    return { timestamp: new Date(), ...next };
  }
}

/** Keeps appended windows in memory; `failNext` makes the next append reject. */
export class MemorySink implements LogSink {
  public batches: ProbeBatch[] = [];
  public closed = false;
  public failNext = false;

  public async append(metrics: WindowMetrics, batch: ProbeBatch): Promise<AppendResult> {
    if (this.failNext) {
      this.failNext = false;
      throw new Error("sink unavailable");
    }
    this.batches.push(batch);
    return { record: formatRecord(metrics, batch), failureLogged: false, rotated: [], errors: [] };
  }

  public async close(): Promise<void> {
    this.closed = true;
  }
}
