import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import ini from "ini";
import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { FatalStartupError } from "../types/errors";
import { ConfigStore, DEFAULT_CONFIG_VALUES } from "./config";
import { Logger } from "./logger";

const DEFAULT_CONFIG = {
  targetHost: "8.8.8.8",
  probeCount: 10,
  timeoutMillis: 1000,
  intervalSeconds: 1,
  allLogPath: "all_attempts.log",
  failureLogPath: "lost_connection.log",
  errorLogPath: "error.log",
  maxLogBytes: 10_485_760,
  maxLogAgeMillis: 604_800_000,
};

describe("ConfigStore", () => {
  let dir: string;
  let logger: Logger;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "uptime-probe-config-"));
    logger = new Logger({ console: false });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it("creates a missing file with default settings", async () => {
    const path = join(dir, "conf", "ping_config.ini");
    const store = new ConfigStore(logger);

    expect(store.load(path)).toEqual(DEFAULT_CONFIG);
    expect(store.lastReport).toEqual({ created: true, rewritten: true, corrected: [] });

    const written = ini.parse(await readFile(path, "utf8"));
    expect(written.DEFAULT).toEqual({ ...DEFAULT_CONFIG_VALUES });
  });

  it("loads a complete file without rewriting it", async () => {
    const path = join(dir, "ping_config.ini");
    const content = [
      "[DEFAULT]",
      "target = example.com",
      "count = 5",
      "timeout = 2000",
      "desired_interval = 0.5",
      "all_log_path = logs/all.log",
      "failure_log_path = logs/failures.log",
      "error_log_path = logs/error.log",
      "max_log_size = 1mb",
      "max_log_age = off",
      "",
    ].join("\n");
    await writeFile(path, content);
    const store = new ConfigStore(logger);

    expect(store.load(path)).toEqual({
      targetHost: "example.com",
      probeCount: 5,
      timeoutMillis: 2000,
      intervalSeconds: 0.5,
      allLogPath: "logs/all.log",
      failureLogPath: "logs/failures.log",
      errorLogPath: "logs/error.log",
      maxLogBytes: 1_048_576,
      maxLogAgeMillis: null,
    });
    expect(store.lastReport).toEqual({ created: false, rewritten: false, corrected: [] });
    expect(await readFile(path, "utf8")).toBe(content);
  });

  it("replaces only the invalid keys and keeps unknown ones", async () => {
    const path = join(dir, "ping_config.ini");
    await writeFile(path, "[DEFAULT]\ntarget = 192.0.2.10\ntimeout = abc\ncolor = blue\n");
    const store = new ConfigStore(logger);

    const config = store.load(path);

    expect(config.targetHost).toBe("192.0.2.10");
    expect(config.timeoutMillis).toBe(1000);
    expect(store.lastReport.rewritten).toBe(true);
    expect(store.lastReport.corrected).toEqual([
      "count",
      "timeout",
      "desired_interval",
      "all_log_path",
      "failure_log_path",
      "error_log_path",
      "max_log_size",
      "max_log_age",
    ]);

    const written = ini.parse(await readFile(path, "utf8"));
    expect(written.DEFAULT.target).toBe("192.0.2.10");
    expect(written.DEFAULT.timeout).toBe("1000");
    expect(written.DEFAULT.color).toBe("blue");
  });

  it("keeps other sections when rewriting the file", async () => {
    const path = join(dir, "ping_config.ini");
    await writeFile(path, "[DEFAULT]\ntarget = 192.0.2.10\ntimeout = abc\n\n[office]\ntarget = 10.0.0.1\n");

    const config = new ConfigStore(logger).load(path);
    const text = await readFile(path, "utf8");
    const written = ini.parse(text);

    expect(config.targetHost).toBe("192.0.2.10");
    expect(text).toContain("[office]");
    expect(written.office).toEqual({ target: "10.0.0.1" });
    expect(written.DEFAULT.timeout).toBe("1000");
  });

  it("keeps sections of a file whose settings have no section header", async () => {
    const path = join(dir, "ping_config.ini");
    await writeFile(path, "target = 192.0.2.20\n\n[office]\ntarget = 10.0.0.1\n");

    const config = new ConfigStore(logger).load(path);
    const written = ini.parse(await readFile(path, "utf8"));

    expect(config.targetHost).toBe("192.0.2.20");
    expect(written.DEFAULT.target).toBe("192.0.2.20");
    expect(written.office).toEqual({ target: "10.0.0.1" });
  });

  it("warns about each corrected key", async () => {
    const path = join(dir, "ping_config.ini");
    await writeFile(path, Object.entries({ ...DEFAULT_CONFIG_VALUES, count: "1000" }).map(([key, value]) => `${key} = ${value}`).join("\n"));
    const warn = vi.spyOn(logger, "warn");

    const config = new ConfigStore(logger).load(path);

    expect(config.probeCount).toBe(10);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith('Config key "count" has invalid value "1000", using default "10"');
  });

  it("reads keys written without a section header", async () => {
    const path = join(dir, "ping_config.ini");
    await writeFile(path, "target = 192.0.2.20\ncount = 3\n");

    const config = new ConfigStore(logger).load(path);

    expect(config.targetHost).toBe("192.0.2.20");
    expect(config.probeCount).toBe(3);
    expect(ini.parse(await readFile(path, "utf8")).DEFAULT.count).toBe("3");
  });

  it("loads the same settings it wrote", () => {
    const path = join(dir, "ping_config.ini");
    const store = new ConfigStore(logger);

    const first = store.load(path);
    const second = store.load(path);

    expect(second).toEqual(first);
    expect(store.lastReport.rewritten).toBe(false);
  });

  it("falls back to defaults when the file cannot be read or written", () => {
    const store = new ConfigStore(logger);
    const warn = vi.spyOn(logger, "warn");

    expect(store.load(dir)).toEqual(DEFAULT_CONFIG);
    expect(store.lastReport.rewritten).toBe(false);
    expect(store.lastReport.corrected).toHaveLength(9);
    expect(warn).toHaveBeenCalledWith(expect.stringMatching(/^Cannot read /));
    expect(warn).toHaveBeenLastCalledWith(expect.stringMatching(/^Cannot write .*keeping settings in memory only/));
  });

  it("fails startup when the config directory cannot be created", async () => {
    const blocker = join(dir, "blocker");
    await writeFile(blocker, "");

    expect(() => new ConfigStore(logger).load(join(blocker, "sub", "ping_config.ini"))).toThrow(FatalStartupError);
  });
});
