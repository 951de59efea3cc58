/**
 * Reads window records back from log lines, for assertions on written log files.
 */

export type PingResultToken = number | "timeout" | "unreachable" | "error";

/** One window as read back from a log line. */
export interface LogRecord {
  timestamp: string;
  connected: boolean;
  packetLossPct: number;
  sent: number;
  received: number;
  lost: number;
  minPing: number | null;
  maxPing: number | null;
  avgPing: number | null;
  jitter: number;
  timeoutCount: number;
  durationMillis: number;
  pingResults: PingResultToken[];
  status: string;
}

const RECORD_PATTERN = new RegExp(
  [
    String.raw`^(?<timestamp>\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}\.\d{3}) - `,
    String.raw`(?<connected>Connected|Disconnected): (?<loss>[\d.]+)% packet loss `,
    String.raw`\(Sent: (?<sent>\d+), Received: (?<received>\d+), Lost: (?<lost>\d+)\) `,
    String.raw`Min: (?<min>[\d.]+ms|n/a), Max: (?<max>[\d.]+ms|n/a), Avg: (?<avg>[\d.]+ms|n/a) \| `,
    String.raw`Jitter: (?<jitter>[\d.]+)ms, Timeouts: (?<timeouts>\d+), Duration: (?<duration>[\d.]+)ms \| `,
    String.raw`Ping Results: \[(?<results>[^\]]*)\] \| Status: (?<status>.*)$`,
  ].join("")
);

const parseStat = (value: string) => (value === "n/a" ? null : parseFloat(value));

function parseResultToken(token: string): PingResultToken {
  if (token === "timeout" || token === "unreachable" || token === "error") return token;
  const value = parseFloat(token);
  return Number.isFinite(value) ? value : "error";
}

/** Reads one record line back. Returns null for lines that are not records. */
export function parseRecord(line: string): LogRecord | null {
  const groups = line.trimEnd().match(RECORD_PATTERN)?.groups;
  if (!groups) return null;

  return {
    timestamp: groups.timestamp,
    connected: groups.connected === "Connected",
    packetLossPct: parseFloat(groups.loss),
    sent: parseInt(groups.sent, 10),
    received: parseInt(groups.received, 10),
    lost: parseInt(groups.lost, 10),
    minPing: parseStat(groups.min),
    maxPing: parseStat(groups.max),
    avgPing: parseStat(groups.avg),
    jitter: parseFloat(groups.jitter),
    timeoutCount: parseInt(groups.timeouts, 10),
    durationMillis: parseFloat(groups.duration),
    pingResults: groups.results === "" ? [] : groups.results.split(", ").map(parseResultToken),
    status: groups.status,
  };
}
