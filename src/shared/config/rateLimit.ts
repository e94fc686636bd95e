import type { RateLimit } from "../throttle/RateGovernor";

const UNBOUNDED_WORDS = new Set(["", "0", "unbounded", "unlimited", "inf"]);

const MULTIPLIERS: Record<string, number> = {
  "": 1,
  K: 1024,
  M: 1024 * 1024,
  G: 1024 * 1024 * 1024
};

/**
 * Parses a transfer rate such as `500K`, `1.5M`, `2MB/s` or `1024` into bytes
 * per second. Empty, `0`, `unbounded`, `unlimited` and `inf` disable the limit.
 */
export const parseRateLimit = (text: string): RateLimit => {
  const normalized = text.trim();
  if (UNBOUNDED_WORDS.has(normalized.toLowerCase())) return "unbounded";

  const match = /^(\d+(?:\.\d+)?)\s*([KMG]?)B?(?:\/s)?$/i.exec(normalized);
  if (!match) {
    throw new Error(`Invalid rate limit "${text}". Expected e.g. 500K, 1.5M, 2MB/s or unbounded`);
  }

  const [, amount = "", unit = ""] = match;
  const multiplier = MULTIPLIERS[unit.toUpperCase()] ?? 1;
  const bytesPerSecond = Math.floor(Number(amount) * multiplier);
  if (!Number.isFinite(bytesPerSecond) || bytesPerSecond <= 0) {
    throw new Error(`Invalid rate limit "${text}". Rate must be at least 1 byte per second`);
  }
  return bytesPerSecond;
};
