import ms from "ms";

const UNLIMITED = new Set(["0", "unlimited", "none", "forever"]);

/**
 * Parses a test duration into minutes.
 *
 * A bare number is taken as minutes; anything else goes through `ms` (`90s`, `2h`, `1d`).
 * `0` or `unlimited` mean the run has no end time and yield `null`.
 */
export function parseDuration(input: string): number | null {
  const value = input.trim().toLowerCase();
  if (UNLIMITED.has(value)) return null;

  if (/^\d+(\.\d+)?$/.test(value)) {
    const minutes = parseFloat(value);
    if (minutes > 0) return minutes;
  } else {
    const millis = ms(value);
    if (typeof millis === "number" && Number.isFinite(millis) && millis > 0) {
      return millis / 60_000;
    }
  }

  throw new Error(`Invalid duration "${input}". Use minutes (e.g. 30), a duration like 90s or 2h, or 0 for unlimited`);
}

/** Parses a log age such as `7d` or `12h`; `off` disables age-based rotation. */
export function parseAge(input: string): number | null {
  const value = input.trim().toLowerCase();
  if (value === "off" || value === "never") return null;

  const millis = ms(value);
  if (typeof millis !== "number" || !Number.isFinite(millis) || millis <= 0) {
    throw new Error(`Invalid age "${input}". Use a duration like 12h or 7d, or off`);
  }
  return millis;
}

export function formatMinutes(minutes: number | null): string {
  if (minutes === null) return "unlimited";
  return ms(Math.round(minutes * 60_000), { long: true });
}
