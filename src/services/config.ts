import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { dirname } from "path";
import ini from "ini";
import { z } from "zod";
import type { MonitorConfig } from "../types/interfaces";
import { FatalStartupError, describeError } from "../types/errors";
import { CONFIG_SECTION } from "../constants";
import parseSize from "../utils/parseSize";
import { parseAge } from "../utils/duration";
import { isValidTarget } from "../utils/target";
import type { Logger } from "./logger";

/** Values written to a fresh config file, in file order. */
export const DEFAULT_CONFIG_VALUES = {
  target: "8.8.8.8",
  count: "10",
  timeout: "1000",
  desired_interval: "1",
  all_log_path: "all_attempts.log",
  failure_log_path: "lost_connection.log",
  error_log_path: "error.log",
  max_log_size: "10mb",
  max_log_age: "7d",
} as const;

export type ConfigKey = keyof typeof DEFAULT_CONFIG_VALUES;

const CONFIG_KEYS: readonly ConfigKey[] = [
  "target",
  "count",
  "timeout",
  "desired_interval",
  "all_log_path",
  "failure_log_path",
  "error_log_path",
  "max_log_size",
  "max_log_age",
];

const rawValue = z.union([z.string(), z.number(), z.boolean()]).transform((value) => String(value).trim());

const pathSchema = rawValue.pipe(z.string().min(1));

const convertible = <T>(convert: (value: string) => T) =>
  rawValue.transform((value, ctx) => {
    try {
      return convert(value);
    } catch (error) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: describeError(error) });
      return z.NEVER;
    }
  });

/** One schema per key so a bad value only resets that key. */
const FIELD_SCHEMAS = {
  target: rawValue.pipe(z.string().refine(isValidTarget, "Expected an IP address or hostname")),
  count: rawValue.pipe(z.coerce.number().int().min(1).max(100)),
  timeout: rawValue.pipe(z.coerce.number().int().min(100).max(60000)),
  desired_interval: rawValue.pipe(z.coerce.number().min(0.1).max(3600)),
  all_log_path: pathSchema,
  failure_log_path: pathSchema,
  error_log_path: pathSchema,
  max_log_size: convertible(parseSize),
  max_log_age: convertible(parseAge),
} satisfies Record<ConfigKey, z.ZodTypeAny>;

type ParsedFields = { [K in ConfigKey]: z.output<(typeof FIELD_SCHEMAS)[K]> };

export interface ConfigLoadReport {
  created: boolean;
  rewritten: boolean;
  corrected: ConfigKey[];
}

function toMonitorConfig(fields: ParsedFields): MonitorConfig {
  return Object.freeze({
    targetHost: fields.target,
    probeCount: fields.count,
    timeoutMillis: fields.timeout,
    intervalSeconds: fields.desired_interval,
    allLogPath: fields.all_log_path,
    failureLogPath: fields.failure_log_path,
    errorLogPath: fields.error_log_path,
    maxLogBytes: fields.max_log_size,
    maxLogAgeMillis: fields.max_log_age,
  });
}

const isRecord = (value: unknown): value is Record<string, unknown> => typeof value === "object" && value !== null && !Array.isArray(value);

/** The settings section; keys written without a section header count as settings too. */
function sectionOf(document: Record<string, unknown>): Record<string, unknown> {
  const section = document[CONFIG_SECTION];
  if (isRecord(section)) return section;
  return Object.fromEntries(Object.entries(document).filter(([, value]) => !isRecord(value)));
}

/**
 * Loads `ping_config.ini`, creating it with defaults when missing.
 *
 * Missing or invalid keys are replaced by their defaults and the file is rewritten with
 * only those keys changed. Content problems never fail the load.
 */
export class ConfigStore {
  private report: ConfigLoadReport = { created: false, rewritten: false, corrected: [] };

  constructor(private readonly logger?: Logger) {}

  public get lastReport(): ConfigLoadReport {
    return this.report;
  }

  public load(path: string): MonitorConfig {
    this.ensureDirectory(path);

    const fileExisted = existsSync(path);
    const document: Record<string, unknown> = (fileExisted && this.readDocument(path)) || {};
    const section = sectionOf(document);
    const values: Record<string, unknown> = { ...section };
    const corrected: ConfigKey[] = [];

    for (const key of CONFIG_KEYS) {
      if (FIELD_SCHEMAS[key].safeParse(section[key]).success) continue;
      if (fileExisted) {
        const reason = section[key] === undefined ? "missing" : `has invalid value "${String(section[key])}"`;
        this.logger?.warn(`Config key "${key}" ${reason}, using default "${DEFAULT_CONFIG_VALUES[key]}"`);
      }
      values[key] = DEFAULT_CONFIG_VALUES[key];
      corrected.push(key);
    }

    const rewritten = corrected.length > 0 && this.write(path, document, values);
    this.report = { created: !fileExisted && rewritten, rewritten, corrected: fileExisted ? corrected : [] };
    if (this.report.created) {
      this.logger?.log(`Created ${path} with default settings`, "INFO");
    }

    return toMonitorConfig(this.parseFields(values));
  }

  private parseFields(values: Record<string, unknown>): ParsedFields {
    return {
      target: FIELD_SCHEMAS.target.parse(values.target),
      count: FIELD_SCHEMAS.count.parse(values.count),
      timeout: FIELD_SCHEMAS.timeout.parse(values.timeout),
      desired_interval: FIELD_SCHEMAS.desired_interval.parse(values.desired_interval),
      all_log_path: FIELD_SCHEMAS.all_log_path.parse(values.all_log_path),
      failure_log_path: FIELD_SCHEMAS.failure_log_path.parse(values.failure_log_path),
      error_log_path: FIELD_SCHEMAS.error_log_path.parse(values.error_log_path),
      max_log_size: FIELD_SCHEMAS.max_log_size.parse(values.max_log_size),
      max_log_age: FIELD_SCHEMAS.max_log_age.parse(values.max_log_age),
    };
  }

  private ensureDirectory(path: string) {
    const dir = dirname(path);
    try {
      if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
    } catch (error) {
      throw new FatalStartupError(`Cannot create configuration directory ${dir}: ${describeError(error)}`, { cause: error });
    }
  }

  /** Returns the parsed file, or null when it cannot be read. */
  private readDocument(path: string): Record<string, unknown> | null {
    let parsed: unknown;
    try {
      parsed = ini.parse(readFileSync(path, "utf8"));
    } catch (error) {
      this.logger?.warn(`Cannot read ${path}, using defaults: ${describeError(error)}`);
      return null;
    }
    return isRecord(parsed) ? parsed : null;
  }

  /** Writes the settings back under `[DEFAULT]`, keeping every other section of `document`. */
  private write(path: string, document: Record<string, unknown>, values: Record<string, unknown>): boolean {
    const ordered: Record<string, unknown> = {};
    for (const key of CONFIG_KEYS) ordered[key] = values[key];
    for (const [key, value] of Object.entries(values)) {
      if (!(key in ordered)) ordered[key] = value;
    }

    const output: Record<string, unknown> = { [CONFIG_SECTION]: ordered };
    for (const [name, value] of Object.entries(document)) {
      if (name !== CONFIG_SECTION && isRecord(value)) output[name] = value;
    }

    try {
      writeFileSync(path, ini.stringify(output, { whitespace: true }));
      return true;
    } catch (error) {
      this.logger?.warn(`Cannot write ${path}, keeping settings in memory only: ${describeError(error)}`);
      return false;
    }
  }
}
