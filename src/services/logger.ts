import { existsSync, mkdirSync } from "fs";
import { dirname } from "path";
import { appendFile } from "fs/promises";
import chalk from "chalk";
import type { LoggerConfig, LogLevel } from "../types/interfaces";
import { DEBUG, MAX_LOG_LINES_BUFFER } from "../constants";

const FILE_LEVELS: ReadonlySet<LogLevel> = new Set(["WARN", "ERROR"]);

export class Logger {
  private static isBlessed = false;
  private filePath?: string;
  private debug: boolean;
  private console: boolean;
  private maxLogLength: number;
  private latestLogs: string[] = [];
  private logUpdateCallback?: (logs: string[]) => void;
  private pending: Promise<void> = Promise.resolve();
  private sessionStarted = false;

  constructor(config?: LoggerConfig) {
    this.filePath = config?.filePath;
    this.debug = config?.debug ?? DEBUG;
    this.console = config?.console ?? true;
    this.maxLogLength = config?.maxLogLength || 120;

    if (this.filePath) {
      const dir = dirname(this.filePath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    }
  }

  public static setUIActive(active: boolean) {
    Logger.isBlessed = active;
  }

  private formatDisplayEntry(entry: string): string {
    return entry
      .split("\n")
      .map((line) => (line.length > this.maxLogLength ? line.substring(0, this.maxLogLength - 3) + "..." : line))
      .join("\n");
  }

  public setLogUpdateCallback(callback: (logs: string[]) => void) {
    this.logUpdateCallback = callback;
    if (this.latestLogs.length > 0) {
      callback(this.latestLogs);
    }
  }

  private writeToFile(entry: string) {
    const filePath = this.filePath;
    if (!filePath) return;

    const lines = this.sessionStarted ? entry + "\n" : `--- Monitor session started: ${new Date().toISOString()} ---\n${entry}\n`;
    this.sessionStarted = true;
    this.pending = this.pending.then(() => appendFile(filePath, lines)).catch((err) => console.error("Failed to write to log file:", err));
  }

  public log(message: string, level: LogLevel = "INFO") {
    if (level === "DEBUG" && !this.debug) return;

    const timestamp = new Date().toISOString();
    const logEntry = `[${timestamp}] [${level}] ${message}`;

    // Strip timestamp for display
    const displayEntry = this.formatDisplayEntry(`[${level}] ${message}`);
    this.latestLogs.push(displayEntry);
    if (this.latestLogs.length > MAX_LOG_LINES_BUFFER) {
      this.latestLogs.shift();
    }
    this.logUpdateCallback?.(this.latestLogs);

    if (FILE_LEVELS.has(level)) {
      this.writeToFile(logEntry);
    }

    if (!this.console || Logger.isBlessed) return;

    switch (level) {
      case "ERROR":
        console.error(chalk.red(logEntry));
        break;
      case "WARN":
        console.warn(chalk.yellow(logEntry));
        break;
      case "DEBUG":
        console.debug(chalk.blue(logEntry));
        break;
      default:
        console.log(chalk.gray(logEntry));
    }
  }

  public warn(message: string) {
    this.log(message, "WARN");
  }

  public error(error: Error | string) {
    const errorMessage = error instanceof Error ? error.stack || error.message : error;
    this.log(errorMessage, "ERROR");
  }

  public getLatestLogs(): string[] {
    return this.latestLogs;
  }

  /** Resolves once every queued file write has settled. */
  public flush(): Promise<void> {
    return this.pending;
  }
}
