import { existsSync } from "fs";
import { mkdir, open, rename, type FileHandle } from "fs/promises";
import { basename, dirname, extname, join } from "path";
import type { LogWriterConfig, ProbeBatch, WindowMetrics } from "../types/interfaces";
import { FatalStartupError, LogIOError, describeError } from "../types/errors";
import { isFailureWindow } from "../utils/metrics";
import { formatRecord } from "../utils/record";
import type { Logger } from "./logger";

export interface RotatingLogFileOptions {
  path: string;
  maxBytes: number;
  maxAgeMillis: number | null;
  now?: () => number;
}

/** Builds `<name>_<timestamp><ext>` beside `path`, e.g. `all_attempts_2026-10-19T12-00-00-000Z.log`. */
export function archivePathFor(path: string, rotatedAt: Date): string {
  const ext = extname(path);
  const name = basename(path, ext);
  const timestamp = rotatedAt.toISOString().replace(/[:.]/g, "-");

  let candidate = join(dirname(path), `${name}_${timestamp}${ext}`);
  for (let n = 1; existsSync(candidate); n++) {
    candidate = join(dirname(path), `${name}_${timestamp}_${n}${ext}`);
  }
  return candidate;
}

/**
 * The active log file. Rotation happens before a write, never during one, so each
 * record lands whole in exactly one file.
 */
export class RotatingLogFile {
  private handle: FileHandle | null = null;
  private _bytesWritten = 0;
  private _openedAt = 0;
  private readonly now: () => number;

  constructor(private readonly options: RotatingLogFileOptions) {
    this.now = options.now ?? Date.now;
  }

  public get path(): string {
    return this.options.path;
  }

  public get bytesWritten(): number {
    return this._bytesWritten;
  }

  public get openedAt(): Date {
    return new Date(this._openedAt);
  }

  public async open(): Promise<void> {
    if (this.handle) return;
    try {
      await mkdir(dirname(this.path), { recursive: true });
      const handle = await open(this.path, "a");
      this._bytesWritten = (await handle.stat()).size;
      this._openedAt = this.now();
      this.handle = handle;
    } catch (error) {
      throw new LogIOError(this.path, "open", error);
    }
  }

  public needsRotation(): boolean {
    if (this._bytesWritten === 0) return false;
    if (this._bytesWritten >= this.options.maxBytes) return true;
    return this.options.maxAgeMillis !== null && this.now() - this._openedAt >= this.options.maxAgeMillis;
  }

  /** Archives the current file and reopens a fresh one at the configured path. */
  public async rotate(): Promise<string> {
    await this.close();
    const archivePath = archivePathFor(this.path, new Date(this.now()));
    try {
      await rename(this.path, archivePath);
    } catch (error) {
      throw new LogIOError(this.path, "rotate", error);
    }
    await this.open();
    return archivePath;
  }

  /** Appends `text` in a single write. Returns the archive path when the file was rotated first. */
  public async append(text: string): Promise<string | null> {
    await this.open();
    const rotated = this.needsRotation() ? await this.rotate() : null;

    const handle = this.handle;
    if (!handle) throw new LogIOError(this.path, "write", new Error("file is not open"));
    try {
      await handle.write(text);
    } catch (error) {
      throw new LogIOError(this.path, "write", error);
    }
    this._bytesWritten += Buffer.byteLength(text);
    return rotated;
  }

  public async close(): Promise<void> {
    const handle = this.handle;
    if (!handle) return;
    this.handle = null;
    try {
      await handle.close();
    } catch (error) {
      throw new LogIOError(this.path, "close", error);
    }
  }
}

export interface AppendResult {
  record: string;
  failureLogged: boolean;
  rotated: string[];
  errors: LogIOError[];
}

export interface LogSink {
  append(metrics: WindowMetrics, batch: ProbeBatch): Promise<AppendResult>;
  close(): Promise<void>;
}

/** Writes every window to the all-attempts log and failing windows to the failure log. */
export class LogWriter implements LogSink {
  private readonly allLog: RotatingLogFile;
  private readonly failureLog: RotatingLogFile;
  private readonly retries: number;

  constructor(
    config: LogWriterConfig,
    private readonly logger?: Logger,
    now?: () => number
  ) {
    const limits = { maxBytes: config.maxLogBytes, maxAgeMillis: config.maxLogAgeMillis, now };
    this.allLog = new RotatingLogFile({ path: config.allLogPath, ...limits });
    this.failureLog = new RotatingLogFile({ path: config.failureLogPath, ...limits });
    this.retries = config.retries ?? 1;
  }

  /** Creates the log directories and opens both files; failure here is fatal. */
  public async open(): Promise<void> {
    try {
      await this.allLog.open();
      await this.failureLog.open();
    } catch (error) {
      throw new FatalStartupError(`Cannot open log files: ${describeError(error)}`, { cause: error });
    }
  }

  private async writeTo(file: RotatingLogFile, line: string, result: AppendResult): Promise<boolean> {
    let lastError: LogIOError | null = null;

    for (let attempt = 0; attempt <= this.retries; attempt++) {
      try {
        const rotated = await file.append(line);
        if (rotated) {
          result.rotated.push(rotated);
          this.logger?.log(`Rotated ${file.path} to ${rotated}`, "INFO");
        }
        return true;
      } catch (error) {
        lastError = error instanceof LogIOError ? error : new LogIOError(file.path, "write", error);
        this.logger?.log(`Write to ${file.path} failed (attempt ${attempt + 1}): ${lastError.message}`, "DEBUG");
        await this.reset(file);
      }
    }

    if (lastError) {
      result.errors.push(lastError);
      this.logger?.error(lastError);
    }
    return false;
  }

  // Drop a handle that may have gone stale so the next attempt reopens the file
  private async reset(file: RotatingLogFile): Promise<void> {
    try {
      await file.close();
    } catch (error) {
      this.logger?.log(`Closing ${file.path} after a failed write also failed: ${describeError(error)}`, "DEBUG");
    }
  }

  public async append(metrics: WindowMetrics, batch: ProbeBatch): Promise<AppendResult> {
    const record = formatRecord(metrics, batch);
    const line = record + "\n";
    const result: AppendResult = { record, failureLogged: false, rotated: [], errors: [] };

    const written = await this.writeTo(this.allLog, line, result);

    // A window the main log lost is kept in the failure log, tagged with the write error
    if (!written) {
      const [mainError] = result.errors;
      const note = `Not in ${this.allLog.path}: ${mainError ? describeError(mainError.cause) : "write failed"}`;
      result.failureLogged = await this.writeTo(this.failureLog, formatRecord(metrics, batch, note) + "\n", result);
    } else if (isFailureWindow(metrics, batch)) {
      result.failureLogged = await this.writeTo(this.failureLog, line, result);
    }

    return result;
  }

  public async close(): Promise<void> {
    const results = await Promise.allSettled([this.allLog.close(), this.failureLog.close()]);
    for (const outcome of results) {
      if (outcome.status === "rejected") {
        this.logger?.error(outcome.reason instanceof Error ? outcome.reason : String(outcome.reason));
      }
    }
  }
}
