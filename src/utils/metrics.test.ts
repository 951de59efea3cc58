import { describe, it, expect } from "vitest";
import { ProbeErrorKind } from "../types/interfaces";
import { createBatch, noReply, reply, timeout } from "../test-utils/fixtures";
import { addWindow, calculateJitter, createTotals, finishTotals, isFailureWindow, summarize } from "./metrics";

describe("calculateJitter", () => {
  it("averages the absolute difference between consecutive samples", () => {
    expect(calculateJitter([10, 20, 10])).toBe(10);
    expect(calculateJitter([20, 24])).toBe(4);
  });

  it("is zero when every sample is identical", () => {
    expect(calculateJitter([15, 15, 15])).toBe(0);
  });

  it("is zero with fewer than two samples", () => {
    expect(calculateJitter([])).toBe(0);
    expect(calculateJitter([42])).toBe(0);
  });
});

describe("summarize", () => {
  it("computes statistics over successful probes only", () => {
    const metrics = summarize(createBatch([reply(20), timeout(), reply(24), timeout()]));

    expect(metrics).toEqual({
      avgPing: 22,
      minPing: 20,
      maxPing: 24,
      jitter: 4,
      packetLossPct: 50,
      timeoutCount: 2,
      unreachableCount: 0,
      errorCount: 0,
      sent: 4,
      received: 2,
      lost: 2,
      durationMillis: 4000,
      connected: true,
    });
  });

  it("reports a window with no replies as disconnected", () => {
    const metrics = summarize(createBatch([timeout(), timeout(), timeout()]));

    expect(metrics.avgPing).toBeNull();
    expect(metrics.minPing).toBeNull();
    expect(metrics.maxPing).toBeNull();
    expect(metrics.jitter).toBe(0);
    expect(metrics.packetLossPct).toBe(100);
    expect(metrics.timeoutCount).toBe(3);
    expect(metrics.connected).toBe(false);
  });

  it("counts unreachable and platform failures separately from timeouts", () => {
    const metrics = summarize(
      createBatch([reply(10), noReply(ProbeErrorKind.Unreachable, "Network is unreachable"), noReply(ProbeErrorKind.PlatformError, "boom"), reply(10)])
    );

    expect(metrics.timeoutCount).toBe(0);
    expect(metrics.unreachableCount).toBe(1);
    expect(metrics.errorCount).toBe(1);
    expect(metrics.lost).toBe(2);
    expect(metrics.jitter).toBe(0);
  });

  it("treats an empty window as total loss", () => {
    const metrics = summarize(createBatch([], { durationMillis: 0 }));

    expect(metrics.sent).toBe(0);
    expect(metrics.packetLossPct).toBe(100);
    expect(metrics.connected).toBe(false);
    expect(metrics.durationMillis).toBe(0);
  });
});

describe("isFailureWindow", () => {
  it("is false when every probe answered", () => {
    const batch = createBatch([reply(10), reply(12)]);
    expect(isFailureWindow(summarize(batch), batch)).toBe(false);
  });

  it("is true for timeouts, unreachable hosts and batch errors", () => {
    const timedOut = createBatch([reply(10), timeout()]);
    const unreachable = createBatch([noReply(ProbeErrorKind.Unreachable, "No route to host")]);
    const errored = createBatch([], { error: "spawn failed" });

    expect(isFailureWindow(summarize(timedOut), timedOut)).toBe(true);
    expect(isFailureWindow(summarize(unreachable), unreachable)).toBe(true);
    expect(isFailureWindow(summarize(errored), errored)).toBe(true);
  });
});

describe("run totals", () => {
  it("accumulates windows into a summary", () => {
    const healthy = createBatch([reply(20), reply(24)]);
    const dropped = createBatch([timeout(), timeout()]);

    let totals = createTotals();
    totals = addWindow(totals, summarize(healthy), healthy);
    totals = addWindow(totals, summarize(dropped), dropped, 1);

    const startedAt = new Date(0);
    const stoppedAt = new Date(60_000);
    expect(finishTotals(totals, "completed", startedAt, stoppedAt)).toEqual({
      reason: "completed",
      startedAt,
      stoppedAt,
      windows: 2,
      failureWindows: 1,
      totalProbes: 4,
      failedProbes: 2,
      packetLossPct: 50,
      totalTimeouts: 2,
      avgPing: 22,
      logErrors: 1,
    });
  });

  it("has no loss or average before any probe ran", () => {
    const summary = finishTotals(createTotals(), "cancelled", new Date(0), new Date(0));

    expect(summary.windows).toBe(0);
    expect(summary.packetLossPct).toBeNull();
    expect(summary.avgPing).toBeNull();
  });
});
