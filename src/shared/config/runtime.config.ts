import {
  downloaderCaps,
  type DownloaderConfigInput,
  type RemuxRetryPolicy,
  remuxRetryPolicies
} from "../../application/download/downloader.config";
import { parseRateLimit } from "./rateLimit";

const parseOptionalIntInRange = (
  env: NodeJS.ProcessEnv,
  name: string,
  range: { min: number; max: number }
): number | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new Error(`${name}=${raw} is out of allowed range [${range.min}..${range.max}]`);
  }

  return value;
};

const TRUE_WORDS = new Set(["1", "true", "yes", "on"]);
const FALSE_WORDS = new Set(["0", "false", "no", "off"]);

const parseOptionalBoolean = (env: NodeJS.ProcessEnv, name: string): boolean | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  const normalized = raw.trim().toLowerCase();
  if (TRUE_WORDS.has(normalized)) return true;
  if (FALSE_WORDS.has(normalized)) return false;
  throw new Error(`${name}=${raw} must be one of true, false, 1, 0, yes, no, on, off`);
};

const isRemuxRetryPolicy = (value: string): value is RemuxRetryPolicy =>
  remuxRetryPolicies.some((policy) => policy === value);

const parseOptionalRemuxPolicy = (env: NodeJS.ProcessEnv, name: string): RemuxRetryPolicy | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  const value = raw.trim();
  if (!isRemuxRetryPolicy(value)) {
    throw new Error(`${name}=${raw} must be one of ${remuxRetryPolicies.join(", ")}`);
  }
  return value;
};

/**
 * Downloader settings taken from `DL_*` variables. Unset variables are left
 * out so the defaults in `resolveDownloaderConfig` apply.
 */
export const loadRuntimeConfigFromEnv = (env: NodeJS.ProcessEnv = process.env): DownloaderConfigInput => {
  const config: DownloaderConfigInput = {};

  const concurrency = parseOptionalIntInRange(env, "DL_CONCURRENCY", downloaderCaps.concurrency);
  if (concurrency !== undefined) config.concurrency = concurrency;

  const queueCapacity = parseOptionalIntInRange(env, "DL_QUEUE_CAPACITY", downloaderCaps.queueCapacity);
  if (queueCapacity !== undefined) config.queueCapacity = queueCapacity;

  const retries = parseOptionalIntInRange(env, "DL_RETRIES", downloaderCaps.retries);
  if (retries !== undefined) config.retries = retries;

  const minBackoffMs = parseOptionalIntInRange(env, "DL_MIN_BACKOFF_MS", downloaderCaps.minBackoffMs);
  if (minBackoffMs !== undefined) config.minBackoffMs = minBackoffMs;

  const maxBackoffMs = parseOptionalIntInRange(env, "DL_MAX_BACKOFF_MS", downloaderCaps.maxBackoffMs);
  if (maxBackoffMs !== undefined) config.maxBackoffMs = maxBackoffMs;

  const rateLimit = env.DL_RATE_LIMIT;
  if (rateLimit != null && rateLimit.trim() !== "") config.rateLimit = parseRateLimit(rateLimit);

  const cadenceThreshold = parseOptionalIntInRange(env, "DL_CADENCE_THRESHOLD", downloaderCaps.cadenceThreshold);
  if (cadenceThreshold !== undefined) config.cadenceThreshold = cadenceThreshold;

  const cadencePauseMs = parseOptionalIntInRange(env, "DL_CADENCE_PAUSE_MS", downloaderCaps.cadencePauseMs);
  if (cadencePauseMs !== undefined) config.cadencePauseMs = cadencePauseMs;

  const skipExisting = parseOptionalBoolean(env, "DL_SKIP_EXISTING");
  if (skipExisting !== undefined) config.skipExisting = skipExisting;

  const overwrite = parseOptionalBoolean(env, "DL_OVERWRITE");
  if (overwrite !== undefined) config.overwrite = overwrite;

  const remuxRetryPolicy = parseOptionalRemuxPolicy(env, "DL_REMUX_RETRY");
  if (remuxRetryPolicy !== undefined) config.remuxRetryPolicy = remuxRetryPolicy;

  const outputDir = env.DL_OUTPUT_DIR;
  if (outputDir != null && outputDir.trim() !== "") config.outputDir = outputDir.trim();

  const requestTimeoutMs = parseOptionalIntInRange(env, "DL_TIMEOUT_MS", downloaderCaps.requestTimeoutMs);
  if (requestTimeoutMs !== undefined) config.requestTimeoutMs = requestTimeoutMs;

  return config;
};
