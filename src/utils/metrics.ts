import { ProbeErrorKind, type MonitorSummary, type ProbeBatch, type WindowMetrics } from "../types/interfaces";

const average = (values: readonly number[]): number | null => (values.length === 0 ? null : values.reduce((a, b) => a + b, 0) / values.length);

/**
 * Mean absolute difference between consecutive round-trip times.
 * Fewer than two samples have no variation to measure and yield 0.
 */
export function calculateJitter(roundTrips: readonly number[]): number {
  if (roundTrips.length < 2) return 0;

  let total = 0;
  for (let i = 1; i < roundTrips.length; i++) {
    total += Math.abs(roundTrips[i] - roundTrips[i - 1]);
  }
  return total / (roundTrips.length - 1);
}

export function summarize(batch: ProbeBatch): WindowMetrics {
  const sent = batch.results.length;
  const roundTrips: number[] = [];
  let timeoutCount = 0;
  let unreachableCount = 0;
  let errorCount = 0;

  for (const result of batch.results) {
    if (result.succeeded && result.roundTripMillis !== null) {
      roundTrips.push(result.roundTripMillis);
      continue;
    }
    switch (result.errorKind) {
      case ProbeErrorKind.Timeout:
        timeoutCount++;
        break;
      case ProbeErrorKind.Unreachable:
        unreachableCount++;
        break;
      default:
        errorCount++;
    }
  }

  const received = roundTrips.length;
  const lost = sent - received;

  return {
    avgPing: average(roundTrips),
    minPing: received > 0 ? Math.min(...roundTrips) : null,
    maxPing: received > 0 ? Math.max(...roundTrips) : null,
    jitter: calculateJitter(roundTrips),
    // An empty window got no replies at all
    packetLossPct: sent === 0 ? 100 : (lost / sent) * 100,
    timeoutCount,
    unreachableCount,
    errorCount,
    sent,
    received,
    lost,
    durationMillis: Math.max(0, batch.windowEnd.getTime() - batch.windowStart.getTime()),
    connected: received > 0,
  };
}

export function isFailureWindow(metrics: WindowMetrics, batch: ProbeBatch): boolean {
  return metrics.timeoutCount > 0 || batch.error !== undefined || batch.results.some((result) => result.errorKind !== ProbeErrorKind.None);
}

export interface RunTotals {
  windows: number;
  failureWindows: number;
  totalProbes: number;
  failedProbes: number;
  totalTimeouts: number;
  roundTripSum: number;
  roundTripCount: number;
  logErrors: number;
}

export function createTotals(): RunTotals {
  return {
    windows: 0,
    failureWindows: 0,
    totalProbes: 0,
    failedProbes: 0,
    totalTimeouts: 0,
    roundTripSum: 0,
    roundTripCount: 0,
    logErrors: 0,
  };
}

export function addWindow(totals: RunTotals, metrics: WindowMetrics, batch: ProbeBatch, logErrors = 0): RunTotals {
  return {
    windows: totals.windows + 1,
    failureWindows: totals.failureWindows + (isFailureWindow(metrics, batch) ? 1 : 0),
    totalProbes: totals.totalProbes + metrics.sent,
    failedProbes: totals.failedProbes + metrics.lost,
    totalTimeouts: totals.totalTimeouts + metrics.timeoutCount,
    roundTripSum: totals.roundTripSum + (metrics.avgPing ?? 0) * metrics.received,
    roundTripCount: totals.roundTripCount + metrics.received,
    logErrors: totals.logErrors + logErrors,
  };
}

export function finishTotals(totals: RunTotals, reason: MonitorSummary["reason"], startedAt: Date, stoppedAt: Date): MonitorSummary {
  return {
    reason,
    startedAt,
    stoppedAt,
    windows: totals.windows,
    failureWindows: totals.failureWindows,
    totalProbes: totals.totalProbes,
    failedProbes: totals.failedProbes,
    packetLossPct: totals.totalProbes === 0 ? null : (totals.failedProbes / totals.totalProbes) * 100,
    totalTimeouts: totals.totalTimeouts,
    avgPing: totals.roundTripCount === 0 ? null : totals.roundTripSum / totals.roundTripCount,
    logErrors: totals.logErrors,
  };
}
