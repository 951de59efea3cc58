const UNITS: Record<string, number> = {
  "": 1,
  b: 1,
  k: 1024,
  kb: 1024,
  m: 1024 ** 2,
  mb: 1024 ** 2,
  g: 1024 ** 3,
  gb: 1024 ** 3,
};

export const MAX_SIZE = 1024 ** 4; // 1tb

/**
 * Parses a byte size such as `10mb`, `512k` or `2048`.
 * Units are binary (1k = 1024 bytes).
 */
export default function parseSize(val: string): number {
  const match = val.trim().match(/^(\d+(?:\.\d+)?)\s*(b|kb?|mb?|gb?)?$/i);
  if (!match) {
    throw new Error(`Invalid size "${val}". Use a number with an optional b/kb/mb/gb suffix (e.g. 512kb, 10mb)`);
  }

  const num = parseFloat(match[1]);
  const unit = match[2]?.toLowerCase() || "";
  const result = Math.floor(num * UNITS[unit]);

  if (result <= 0) {
    throw new Error(`Size must be greater than zero: "${val}"`);
  }
  if (result > MAX_SIZE) {
    throw new Error(`Size cannot exceed 1tb (${MAX_SIZE.toLocaleString()} bytes)`);
  }

  return result;
}
