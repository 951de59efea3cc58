import { ProbeErrorKind, type ProbeBatch, type ProbeResult, type WindowMetrics } from "../types/interfaces";

const pad = (value: number, length = 2) => String(value).padStart(length, "0");

/** Local time as `YYYY-MM-DD HH:mm:ss.SSS`. */
export function formatTimestamp(date: Date): string {
  const day = [date.getFullYear(), pad(date.getMonth() + 1), pad(date.getDate())].join("-");
  const time = [pad(date.getHours()), pad(date.getMinutes()), pad(date.getSeconds())].join(":");
  return `${day} ${time}.${pad(date.getMilliseconds(), 3)}`;
}

const formatStat = (value: number | null) => (value === null ? "n/a" : `${value.toFixed(1)}ms`);

const sanitize = (text: string) => text.replace(/[\r\n]+/g, " ").replace(/\|/g, "/").trim();

function formatResult(result: ProbeResult): string {
  if (result.succeeded && result.roundTripMillis !== null) {
    return String(Number(result.roundTripMillis.toFixed(3)));
  }
  switch (result.errorKind) {
    case ProbeErrorKind.Timeout:
      return "timeout";
    case ProbeErrorKind.Unreachable:
      return "unreachable";
    default:
      return "error";
  }
}

/** Short human-readable status: `OK`, or the failure counts and the first failure detail. */
export function statusText(metrics: WindowMetrics, batch: ProbeBatch): string {
  if (batch.error !== undefined) {
    return sanitize(`Error: ${batch.error}`);
  }

  const counts: string[] = [];
  if (metrics.timeoutCount > 0) counts.push(`timeouts: ${metrics.timeoutCount}`);
  if (metrics.unreachableCount > 0) counts.push(`unreachable: ${metrics.unreachableCount}`);
  if (metrics.errorCount > 0) counts.push(`errors: ${metrics.errorCount}`);
  if (counts.length === 0) return "OK";

  const detail = batch.results.find((result) => !result.succeeded && result.detail)?.detail;
  return sanitize(detail ? `${counts.join(", ")}; ${detail}` : counts.join(", "));
}

function withNote(status: string, note: string): string {
  return sanitize(status === "OK" ? note : `${status}; ${note}`);
}

/** `note` is added to the status, e.g. why a healthy window sits in the failure log. */
export function formatRecord(metrics: WindowMetrics, batch: ProbeBatch, note?: string): string {
  const status = statusText(metrics, batch);
  const connection = metrics.connected ? "Connected" : "Disconnected";
  const results = batch.results.map(formatResult).join(", ");

  return (
    `${formatTimestamp(batch.windowEnd)} - ${connection}: ${metrics.packetLossPct.toFixed(1)}% packet loss ` +
    `(Sent: ${metrics.sent}, Received: ${metrics.received}, Lost: ${metrics.lost}) ` +
    `Min: ${formatStat(metrics.minPing)}, Max: ${formatStat(metrics.maxPing)}, Avg: ${formatStat(metrics.avgPing)} | ` +
    `Jitter: ${metrics.jitter.toFixed(1)}ms, Timeouts: ${metrics.timeoutCount}, Duration: ${metrics.durationMillis.toFixed(1)}ms | ` +
    `Ping Results: [${results}] | Status: ${note ? withNote(status, note) : status}`
  );
}
