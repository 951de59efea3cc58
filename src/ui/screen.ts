import blessed from "blessed";
import * as contrib from "blessed-contrib";
import type { MonitorState } from "../types/interfaces";
import type { WindowEvent } from "../services/monitor";
import { Logger } from "../services/logger";
import { MAX_RECENT_WINDOWS } from "../constants";
import { formatTimestamp, statusText } from "../utils/record";

interface DashboardTotals {
  windows: number;
  failureWindows: number;
  sent: number;
  lost: number;
  timeouts: number;
}

const formatPing = (value: number | null) => (value === null ? "n/a" : `${value.toFixed(1)} ms`);

function colorize(log: string): string {
  if (log.includes("[ERROR]")) return `{red-fg}${log}{/red-fg}`;
  if (log.includes("[WARN]")) return `{yellow-fg}${log}{/yellow-fg}`;
  if (log.includes("[DEBUG]")) return `{blue-fg}${log}{/blue-fg}`;
  return `{green-fg}${log}{/green-fg}`;
}

/** Full-screen dashboard: run statistics, the latest windows and recent log lines. */
export class ScreenManager {
  private screen: blessed.Widgets.Screen;
  private table?: contrib.Widgets.TableElement;
  private recentTable?: contrib.Widgets.TableElement;
  private logBox?: blessed.Widgets.Log;
  private currentLayout: Array<{ destroy(): void }> = [];
  private lastEvent?: WindowEvent;
  private state: MonitorState = "idle";
  private recent: string[][] = [];
  private totals: DashboardTotals = { windows: 0, failureWindows: 0, sent: 0, lost: 0, timeouts: 0 };

  constructor(
    private readonly target: string,
    private readonly logger: Logger,
    private readonly onQuit: () => void
  ) {
    this.screen = this.initScreen();
    Logger.setUIActive(true);
  }

  private initScreen(): blessed.Widgets.Screen {
    const screen = blessed.screen({
      smartCSR: true,
      title: `Monitoring ${this.target}`,
      fullUnicode: true,
      autoPadding: true,
      terminal: "xterm-256color",
    });

    let resizeTimeout: NodeJS.Timeout | undefined;
    screen.on("resize", () => {
      if (resizeTimeout) clearTimeout(resizeTimeout);
      resizeTimeout = setTimeout(() => {
        this.clearScreen();
        this.createLayout();
        this.render();
      }, 100);
    });

    screen.key(["r"], () => {
      this.logger.log("Manual refresh triggered", "DEBUG");
      this.clearScreen();
      this.createLayout();
      this.render();
    });

    screen.key(["escape", "q", "C-c"], () => this.onQuit());

    return screen;
  }

  public createLayout() {
    const grid = new contrib.grid({ rows: 12, cols: 12, screen: this.screen });

    const table: contrib.Widgets.TableElement = grid.set(0, 0, 6, 6, contrib.table, {
      keys: true,
      fg: "white",
      selectedFg: "white",
      selectedBg: "blue",
      interactive: false,
      label: `Target ${this.target}`,
      border: { type: "line", fg: "cyan" },
      columnSpacing: 2,
      columnWidth: [16, 24],
    });
    this.table = table;
    this.currentLayout.push(table);

    const logBox: blessed.Widgets.Log = grid.set(0, 6, 6, 6, blessed.log, {
      label: "Latest Logs",
      tags: true,
      keys: true,
      vi: true,
      mouse: true,
      scrollable: true,
      scrollback: 100,
      border: { type: "line" },
      style: { fg: "green", border: { fg: "magenta" } },
    });
    this.logBox = logBox;
    this.currentLayout.push(logBox);

    const recentTable: contrib.Widgets.TableElement = grid.set(6, 0, 6, 12, contrib.table, {
      keys: true,
      fg: "white",
      interactive: false,
      label: "Recent Windows",
      border: { type: "line", fg: "cyan" },
      columnSpacing: 2,
      columnWidth: [10, 6, 8, 10, 10, 40],
    });
    this.recentTable = recentTable;
    this.currentLayout.push(recentTable);

    this.logger.setLogUpdateCallback((logs) => {
      const logBox = this.logBox;
      if (!logBox) return;
      logBox.setContent("");
      logs.forEach((log) => logBox.pushLine(colorize(log)));
      logBox.setScrollPerc(100);
      this.screen.render();
    });

    this.render();
  }

  private clearScreen() {
    this.currentLayout.forEach((component) => component.destroy());
    this.currentLayout = [];
    this.table = undefined;
    this.recentTable = undefined;
    this.logBox = undefined;

    while (this.screen.children.length) {
      this.screen.remove(this.screen.children[0]);
    }
  }

  public setState(state: MonitorState) {
    this.state = state;
    this.render();
  }

  public updateWindow(event: WindowEvent) {
    const { metrics } = event;
    this.lastEvent = event;
    this.state = event.state;
    this.totals = {
      windows: this.totals.windows + 1,
      failureWindows: this.totals.failureWindows + (event.append.failureLogged ? 1 : 0),
      sent: this.totals.sent + metrics.sent,
      lost: this.totals.lost + metrics.lost,
      timeouts: this.totals.timeouts + metrics.timeoutCount,
    };

    this.recent.unshift([
      formatTimestamp(event.batch.windowEnd).slice(11, 19),
      String(event.index),
      `${metrics.packetLossPct.toFixed(1)}%`,
      formatPing(metrics.avgPing),
      `${metrics.jitter.toFixed(1)} ms`,
      statusText(metrics, event.batch),
    ]);
    if (this.recent.length > MAX_RECENT_WINDOWS) this.recent.pop();

    this.render();
  }

  private render() {
    if (!this.table || !this.recentTable) return;

    try {
      const last = this.lastEvent?.metrics;
      const runLoss = this.totals.sent === 0 ? "n/a" : `${((this.totals.lost / this.totals.sent) * 100).toFixed(1)}%`;

      this.table.setData({
        headers: ["Metric", "Value"],
        data: [
          ["State", this.state],
          ["Windows", `${this.totals.windows} (${this.totals.failureWindows} failed)`],
          ["Run loss", runLoss],
          ["Timeouts", String(this.totals.timeouts)],
          ["Last avg ping", formatPing(last?.avgPing ?? null)],
          ["Last jitter", last ? `${last.jitter.toFixed(1)} ms` : "n/a"],
          ["Last loss", last ? `${last.packetLossPct.toFixed(1)}%` : "n/a"],
        ],
      });

      this.recentTable.setData({
        headers: ["Time", "#", "Loss", "Avg", "Jitter", "Status"],
        data: this.recent,
      });

      this.screen.render();
    } catch (error) {
      this.logger.error(`Display update error: ${error}`);
    }
  }

  public destroy() {
    this.clearScreen();
    Logger.setUIActive(false);
    this.screen.destroy();
  }
}
