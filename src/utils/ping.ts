import { spawn } from "child_process";
import { ProbeErrorKind, type ProbeOutcome, type ProbeResult } from "../types/interfaces";

export interface Pinger {
  readonly name: string;
  /** Sends one echo request. Never rejects: every failure is reported as a result. */
  ping(target: string, timeoutMillis: number, signal?: AbortSignal): Promise<ProbeResult>;
}

export interface CommandOutput {
  stdout: string;
  stderr: string;
  exitCode: number | null;
  timedOut: boolean;
  aborted: boolean;
  spawnError?: Error;
}

const REPLY_TIME = /time[=<]\s*(\d+(?:\.\d+)?)\s*ms/i;
const POSIX_UNREACHABLE =
  /unknown host|name or service not known|temporary failure in name resolution|cannot resolve|nodename nor servname|destination (host|net|network|port) unreachable|network is unreachable|no route to host|time to live exceeded/i;
const POSIX_NO_REPLY = /100(\.0+)?% packet loss|\b0 (packets )?received|request timeout/i;
const WINDOWS_UNREACHABLE = /could not find host|destination (host|net) unreachable|general failure|transmit failed|ttl expired in transit/i;
const WINDOWS_NO_REPLY = /request timed out/i;

/**
 * Runs a command and collects its output. The process is killed once `timeoutMillis`
 * elapses or `signal` aborts; the promise always resolves.
 */
export function runCommand(argv: readonly string[], timeoutMillis: number, signal?: AbortSignal): Promise<CommandOutput> {
  const [file, ...args] = argv;

  if (signal?.aborted) {
    return Promise.resolve({ stdout: "", stderr: "", exitCode: null, timedOut: false, aborted: true });
  }

  return new Promise((resolve) => {
    let stdout = "";
    let stderr = "";
    let timedOut = false;
    let settled = false;

    const child = spawn(file, args, { stdio: ["ignore", "pipe", "pipe"], windowsHide: true });

    const timer = setTimeout(() => {
      timedOut = true;
      child.kill("SIGKILL");
    }, timeoutMillis);
    const onAbort = () => child.kill("SIGKILL");
    signal?.addEventListener("abort", onAbort, { once: true });

    const finish = (exitCode: number | null, spawnError?: Error) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
      resolve({ stdout, stderr, exitCode, timedOut, aborted: signal?.aborted ?? false, spawnError });
    };

    child.stdout?.setEncoding("utf8");
    child.stderr?.setEncoding("utf8");
    child.stdout?.on("data", (chunk: string) => (stdout += chunk));
    child.stderr?.on("data", (chunk: string) => (stderr += chunk));
    child.on("error", (error) => finish(null, error));
    child.on("close", (code) => finish(code));
  });
}

function firstLine(text: string): string {
  return (
    text
      .split(/\r?\n/)
      .map((line) => line.trim())
      .find((line) => line.length > 0) ?? "no output"
  );
}

function matchingLine(text: string, pattern: RegExp): string | undefined {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .find((line) => pattern.test(line));
}

function success(roundTripMillis: number): ProbeOutcome {
  return { succeeded: true, roundTripMillis, errorKind: ProbeErrorKind.None };
}

function failure(errorKind: ProbeErrorKind, detail: string): ProbeOutcome {
  return { succeeded: false, roundTripMillis: null, errorKind, detail };
}

/** Outcomes every platform shares: the process never ran, or had to be killed. */
function classifyProcessFailure(output: CommandOutput, timeoutMillis: number): ProbeOutcome | null {
  if (output.spawnError) {
    const code = "code" in output.spawnError ? String(output.spawnError.code) : "";
    const reason = code === "ENOENT" ? "ping executable not found" : output.spawnError.message;
    return failure(ProbeErrorKind.PlatformError, `Failed to start ping: ${reason}`);
  }
  if (output.timedOut) {
    return failure(ProbeErrorKind.Timeout, `No reply within ${timeoutMillis}ms`);
  }
  return null;
}

export function parsePosixOutput(output: CommandOutput, timeoutMillis: number): ProbeOutcome {
  const processFailure = classifyProcessFailure(output, timeoutMillis);
  if (processFailure) return processFailure;

  const text = `${output.stdout}\n${output.stderr}`;

  const unreachable = matchingLine(text, POSIX_UNREACHABLE);
  if (unreachable) return failure(ProbeErrorKind.Unreachable, unreachable);

  const reply = matchingLine(text, /bytes from/i);
  const timeMatch = reply?.match(REPLY_TIME);
  if (timeMatch) return success(parseFloat(timeMatch[1]));

  const noReply = matchingLine(text, POSIX_NO_REPLY);
  if (noReply) return failure(ProbeErrorKind.Timeout, noReply);

  if (text.includes("Operation not permitted")) {
    return failure(ProbeErrorKind.PlatformError, "Ping is not permitted for this user. Run with elevated privileges.");
  }

  return failure(ProbeErrorKind.PlatformError, `Unrecognised ping output: ${firstLine(text)}`);
}

export function parseWindowsOutput(output: CommandOutput, timeoutMillis: number): ProbeOutcome {
  const processFailure = classifyProcessFailure(output, timeoutMillis);
  if (processFailure) return processFailure;

  const text = `${output.stdout}\n${output.stderr}`;

  // "Reply from x: Destination host unreachable." is a reply without a round-trip time
  const unreachable = matchingLine(text, WINDOWS_UNREACHABLE);
  if (unreachable) return failure(ProbeErrorKind.Unreachable, unreachable);

  const reply = matchingLine(text, /^reply from/i);
  const timeMatch = reply?.match(REPLY_TIME);
  if (timeMatch) return success(parseFloat(timeMatch[1]));

  const noReply = matchingLine(text, WINDOWS_NO_REPLY);
  if (noReply) return failure(ProbeErrorKind.Timeout, noReply);

  return failure(ProbeErrorKind.PlatformError, `Unrecognised ping output: ${firstLine(text)}`);
}

/** A pinger that shells out to the system `ping` executable once per probe. */
export abstract class CommandPinger implements Pinger {
  abstract readonly name: string;

  protected abstract buildArgs(target: string, timeoutMillis: number): string[];
  protected abstract parse(output: CommandOutput, timeoutMillis: number): ProbeOutcome;

  public async ping(target: string, timeoutMillis: number, signal?: AbortSignal): Promise<ProbeResult> {
    const timestamp = new Date();
    const output = await runCommand(this.buildArgs(target, timeoutMillis), timeoutMillis, signal);
    return { timestamp, ...this.parse(output, timeoutMillis) };
  }
}

const toSeconds = (timeoutMillis: number) => String(Math.max(1, Math.ceil(timeoutMillis / 1000)));

export class WindowsPinger extends CommandPinger {
  readonly name = "windows";

  protected buildArgs(target: string, timeoutMillis: number): string[] {
    return ["ping", "-n", "1", "-w", String(timeoutMillis), target];
  }

  protected parse(output: CommandOutput, timeoutMillis: number): ProbeOutcome {
    return parseWindowsOutput(output, timeoutMillis);
  }
}

export class LinuxPinger extends CommandPinger {
  readonly name = "linux";

  protected buildArgs(target: string, timeoutMillis: number): string[] {
    return ["ping", "-c", "1", "-W", toSeconds(timeoutMillis), target];
  }

  protected parse(output: CommandOutput, timeoutMillis: number): ProbeOutcome {
    return parsePosixOutput(output, timeoutMillis);
  }
}

export class DarwinPinger extends CommandPinger {
  readonly name = "darwin";

  protected buildArgs(target: string, timeoutMillis: number): string[] {
    return ["ping", "-c", "1", "-t", toSeconds(timeoutMillis), target]; // -t is the overall timeout on macOS
  }

  protected parse(output: CommandOutput, timeoutMillis: number): ProbeOutcome {
    return parsePosixOutput(output, timeoutMillis);
  }
}

export function createPinger(platform: NodeJS.Platform = process.platform): Pinger {
  switch (platform) {
    case "win32":
      return new WindowsPinger();
    case "darwin":
      return new DarwinPinger();
    case "linux":
      return new LinuxPinger();
    default:
      throw new Error(`Unsupported platform: ${platform}`);
  }
}
