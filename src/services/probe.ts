import type { ProbeBatch, ProbeResult } from "../types/interfaces";
import { ConfigError } from "../types/errors";
import { isValidTarget } from "../utils/target";
import type { Pinger } from "../utils/ping";

export class ProbeExecutor {
  constructor(private readonly pinger: Pinger) {}

  public get pingerName(): string {
    return this.pinger.name;
  }

  /**
   * Runs `count` sequential probes against `target`, each bounded by `timeoutMillis`.
   *
   * Probe failures come back as results. Only invalid arguments throw ({@link ConfigError}).
   * When `signal` aborts, the batch ends early and the interrupted probe is left out.
   */
  public async runProbe(target: string, count: number, timeoutMillis: number, signal?: AbortSignal): Promise<ProbeBatch> {
    if (!target) {
      throw new ConfigError("Target is required");
    }
    if (!isValidTarget(target)) {
      throw new ConfigError(`Invalid target "${target}"`);
    }
    if (!Number.isInteger(count) || count <= 0) {
      throw new ConfigError(`Probe count must be a positive integer, got ${count}`);
    }
    if (!Number.isFinite(timeoutMillis) || timeoutMillis <= 0) {
      throw new ConfigError(`Probe timeout must be positive, got ${timeoutMillis}`);
    }

    const windowStart = new Date();
    const results: ProbeResult[] = [];

    for (let i = 0; i < count && !signal?.aborted; i++) {
      const result = await this.pinger.ping(target, timeoutMillis, signal);
      if (signal?.aborted) break;
      results.push(Object.freeze(result));
    }

    return { results, windowStart, windowEnd: new Date() };
  }
}
