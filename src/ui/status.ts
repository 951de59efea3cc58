import chalk from "chalk";
import type { MonitorSummary } from "../types/interfaces";
import type { WindowEvent } from "../services/monitor";
import { formatTimestamp, statusText } from "../utils/record";
import { formatMinutes } from "../utils/duration";

const formatPing = (value: number | null) => (value === null ? "n/a" : `${value.toFixed(1)}ms`);

export function formatStatusLine(event: WindowEvent): string {
  const { metrics, batch, append, state } = event;
  const time = formatTimestamp(batch.windowEnd).slice(11, 19);

  let line =
    `${time} #${event.index} ${metrics.connected ? "UP  " : "DOWN"} ` +
    `loss ${metrics.packetLossPct.toFixed(1)}% avg ${formatPing(metrics.avgPing)} jitter ${metrics.jitter.toFixed(1)}ms timeouts ${metrics.timeoutCount}`;

  const status = statusText(metrics, batch);
  if (status !== "OK") line += ` - ${status}`;
  if (append.errors.length > 0) line += ` [log write failed: ${append.errors.length}]`;
  if (state === "paused") line += " (paused)";
  return line;
}

export function colorStatusLine(event: WindowEvent): string {
  const line = formatStatusLine(event);
  if (event.append.errors.length > 0 || !event.metrics.connected) return chalk.red(line);
  if (event.metrics.packetLossPct > 0 || event.metrics.errorCount > 0) return chalk.yellow(line);
  return chalk.green(line);
}

export function formatSummary(summary: MonitorSummary): string[] {
  const elapsedMinutes = (summary.stoppedAt.getTime() - summary.startedAt.getTime()) / 60_000;
  const loss = summary.packetLossPct === null ? "n/a" : `${summary.packetLossPct.toFixed(1)}%`;

  return [
    `Test ${summary.reason} after ${formatMinutes(elapsedMinutes)}`,
    `Windows: ${summary.windows} (${summary.failureWindows} with failures)`,
    `Probes: ${summary.totalProbes} sent, ${summary.failedProbes} lost (${loss} packet loss)`,
    `Timeouts: ${summary.totalTimeouts}`,
    `Average ping: ${formatPing(summary.avgPing)}`,
    `Log write errors: ${summary.logErrors}`,
  ];
}
