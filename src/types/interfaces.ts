export enum ProbeErrorKind {
  None = "none",
  Timeout = "timeout",
  Unreachable = "unreachable",
  PlatformError = "platform_error",
}

export interface ProbeResult {
  readonly timestamp: Date;
  readonly roundTripMillis: number | null; // null unless succeeded
  readonly succeeded: boolean;
  readonly errorKind: ProbeErrorKind;
  readonly detail?: string;
}

export type ProbeOutcome = Omit<ProbeResult, "timestamp">;

export interface ProbeBatch {
  readonly results: readonly ProbeResult[];
  readonly windowStart: Date;
  readonly windowEnd: Date;
  readonly error?: string;
}

export interface WindowMetrics {
  avgPing: number | null;
  minPing: number | null;
  maxPing: number | null;
  jitter: number;
  packetLossPct: number;
  timeoutCount: number;
  unreachableCount: number;
  errorCount: number;
  sent: number;
  received: number;
  lost: number;
  durationMillis: number;
  connected: boolean;
}

export interface MonitorConfig {
  readonly targetHost: string;
  readonly probeCount: number;
  readonly timeoutMillis: number;
  readonly intervalSeconds: number;
  readonly allLogPath: string;
  readonly failureLogPath: string;
  readonly errorLogPath: string;
  readonly maxLogBytes: number;
  readonly maxLogAgeMillis: number | null;
}

export type MonitorState = "idle" | "running" | "paused" | "stopped";

export interface MonitorSummary {
  reason: "completed" | "cancelled";
  startedAt: Date;
  stoppedAt: Date;
  windows: number;
  failureWindows: number;
  totalProbes: number;
  failedProbes: number;
  packetLossPct: number | null;
  totalTimeouts: number;
  avgPing: number | null;
  logErrors: number;
}

export type LogLevel = "INFO" | "WARN" | "ERROR" | "DEBUG";

export interface LoggerConfig {
  filePath?: string;
  debug?: boolean;
  console?: boolean;
  maxLogLength?: number;
}

export interface LogWriterConfig {
  allLogPath: string;
  failureLogPath: string;
  maxLogBytes: number;
  maxLogAgeMillis: number | null;
  retries?: number;
}

export interface StopOptions {
  force?: boolean;
  exitCode?: number;
}
