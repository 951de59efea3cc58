/**
 * Error taxonomy for the monitor.
 *
 * Probe failures are not errors here: they are recorded as {@link ProbeErrorKind}
 * values on each result. Only configuration, log I/O and startup problems are
 * raised as exceptions, and of those only {@link FatalStartupError} ends the process.
 */
export class MonitorError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed or unwritable configuration. Recovered by falling back to defaults. */
export class ConfigError extends MonitorError {}

export type LogOperation = "open" | "write" | "rotate" | "close";

/** A log file could not be opened, written, rotated or closed. */
export class LogIOError extends MonitorError {
  readonly path: string;
  readonly operation: LogOperation;

  constructor(path: string, operation: LogOperation, cause: unknown) {
    super(`Failed to ${operation} log file ${path}: ${describeError(cause)}`, { cause });
    this.path = path;
    this.operation = operation;
  }
}

/** A resource the monitor cannot run without is unavailable before the loop starts. */
export class FatalStartupError extends MonitorError {}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
