import { EventEmitter } from "events";
import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { UptimeMonitor } from "./app";
import { Logger } from "./services/logger";
import { ProbeExecutor } from "./services/probe";
import { MemorySink, ScriptedPinger, createConfig, reply } from "./test-utils/fixtures";

describe("UptimeMonitor", () => {
  let events: EventEmitter;
  let sink: MemorySink;

  beforeEach(() => {
    events = new EventEmitter();
    sink = new MemorySink();
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(process, "exit").mockImplementation((code) => {
      throw new Error(`exit ${code}`);
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function createApp() {
    const executor = new ProbeExecutor(new ScriptedPinger([reply(10)]));
    return new UptimeMonitor(createConfig({ intervalSeconds: 60 }), new Logger({ console: false }), sink, executor, false, events);
  }

  it("exits cleanly on Ctrl-C before monitoring starts", () => {
    createApp();

    expect(() => events.emit("SIGINT", "SIGINT")).toThrow("exit 0");
    expect(sink.batches).toEqual([]);
  });

  it("exits cleanly on SIGTERM before monitoring starts", () => {
    createApp();

    expect(() => events.emit("SIGTERM", "SIGTERM")).toThrow("exit 0");
  });

  it("finishes the running window on the first signal and forces an exit on the second", async () => {
    const app = createApp();
    const run = app.start(null);
    await vi.waitFor(() => expect(sink.batches).toHaveLength(1));

    events.emit("SIGINT", "SIGINT");
    const summary = await run;

    expect(summary.reason).toBe("cancelled");
    expect(process.exit).not.toHaveBeenCalled();
    expect(() => events.emit("SIGINT", "SIGINT")).toThrow("exit 1");
  });

  it("exits with an error code on an uncaught exception", () => {
    createApp();

    expect(() => events.emit("uncaughtException", new Error("boom"))).toThrow("exit 1");
  });
});
