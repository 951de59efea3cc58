import chalk from "chalk";
import type { MonitorConfig, MonitorSummary, StopOptions } from "./types/interfaces";
import { describeError } from "./types/errors";
import type { Logger } from "./services/logger";
import type { LogSink } from "./services/logWriter";
import { MonitorLoop, type MonitorListener } from "./services/monitor";
import type { ProbeExecutor } from "./services/probe";
import { ScreenManager } from "./ui/screen";
import { colorStatusLine, formatSummary } from "./ui/status";

/**
 * One monitoring session. Signal and error handlers are installed on `events` (the process)
 * at construction, so a stop request before `start()` still ends the process cleanly.
 */
export class UptimeMonitor {
  private monitor: MonitorLoop;
  private screen?: ScreenManager;
  private stopRequests = 0;

  constructor(
    private readonly config: MonitorConfig,
    private readonly logger: Logger,
    sink: LogSink,
    private readonly executor: ProbeExecutor,
    private readonly useDashboard: boolean,
    private readonly events: NodeJS.EventEmitter = process
  ) {
    const listener: MonitorListener = {
      onWindow: (event) => {
        if (this.screen) {
          this.screen.updateWindow(event);
        } else {
          console.log(colorStatusLine(event));
        }
      },
      onStateChange: (state, previous) => {
        this.screen?.setState(state);
        this.logger.log(`Monitor state: ${previous} -> ${state}`, "DEBUG");
      },
    };

    this.monitor = new MonitorLoop({ config, executor, sink, logger, listener });
    this.setupErrorHandling();
  }

  private setupErrorHandling() {
    this.events.on("uncaughtException", (error: Error) => {
      this.logger.error(`Uncaught Exception: ${error.stack ?? error.message}`);
      this.stop({ force: true, exitCode: 1 });
    });

    this.events.on("unhandledRejection", (reason: unknown) => {
      this.logger.error(`Unhandled Rejection: ${describeError(reason)}`);
      this.stop({ force: true, exitCode: 1 });
    });

    const onSignal = (signal: NodeJS.Signals) => {
      this.logger.log(`Received ${signal}, shutting down...`, "INFO");
      this.stop();
    };
    this.events.on("SIGINT", onSignal);
    this.events.on("SIGTERM", onSignal);
  }

  public async start(durationMinutes: number | null): Promise<MonitorSummary> {
    if (this.useDashboard) {
      this.screen = new ScreenManager(this.config.targetHost, this.logger, () => this.stop());
      this.screen.createLayout();
    }

    // A failed check is worth a warning, not an exit: outages are what is being measured
    const check = await this.executor.runProbe(this.config.targetHost, 1, this.config.timeoutMillis);
    const [first] = check.results;
    if (first?.succeeded) {
      this.logger.log(`Target ${this.config.targetHost} answered in ${first.roundTripMillis}ms`, "INFO");
    } else {
      this.logger.warn(`Target ${this.config.targetHost} did not answer the initial check: ${first?.detail ?? "no result"}`);
    }

    this.logger.log(`Logging all windows to ${this.config.allLogPath}, failures to ${this.config.failureLogPath}`, "INFO");
    return this.monitor.start(durationMinutes);
  }

  /**
   * Stops the monitor gracefully; a second request forces the process to exit.
   */
  public stop(options: StopOptions = {}) {
    this.stopRequests++;

    if (options.force || this.stopRequests > 1) {
      this.screen?.destroy();
      process.exit(options.exitCode ?? 1);
    }

    const pending = this.monitor.stop();
    if (!pending) process.exit(0);
  }

  public finish(summary: MonitorSummary) {
    this.screen?.destroy();
    console.log("");
    formatSummary(summary).forEach((line, i) => console.log(i === 0 ? chalk.bold(line) : line));
  }
}
