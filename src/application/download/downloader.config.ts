import path from "path";
import type { RateLimit } from "../../shared/throttle/RateGovernor";

export type RemuxRetryPolicy = "remux-only" | "refetch";

export const remuxRetryPolicies: readonly RemuxRetryPolicy[] = ["remux-only", "refetch"];

export type DownloaderConfig = {
  concurrency: number;
  queueCapacity: number;
  retries: number;
  minBackoffMs: number;
  maxBackoffMs: number;
  rateLimit: RateLimit;
  cadenceThreshold: number;
  cadencePauseMs: number;
  skipExisting: boolean;
  overwrite: boolean;
  remuxRetryPolicy: RemuxRetryPolicy;
  outputDir: string;
  requestTimeoutMs: number;
};

export type DownloaderConfigInput = Partial<DownloaderConfig>;

export const defaultDownloaderConfig: DownloaderConfig = {
  concurrency: 5,
  queueCapacity: 50,
  retries: 3,
  minBackoffMs: 500,
  maxBackoffMs: 30000,
  rateLimit: "unbounded",
  cadenceThreshold: 30,
  cadencePauseMs: 10000,
  skipExisting: true,
  overwrite: false,
  remuxRetryPolicy: "remux-only",
  outputDir: "downloads",
  requestTimeoutMs: 30000
};

export const downloaderCaps = {
  concurrency: { min: 1, max: 50 },
  queueCapacity: { min: 1, max: 10000 },
  retries: { min: 0, max: 20 },
  minBackoffMs: { min: 0, max: 60000 },
  maxBackoffMs: { min: 0, max: 600000 },
  cadenceThreshold: { min: 0, max: 100000 },
  cadencePauseMs: { min: 0, max: 3600000 },
  requestTimeoutMs: { min: 1000, max: 300000 }
} as const;

const assertIntegerInRange = (name: string, value: number, min: number, max: number) => {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`${name}=${String(value)} is out of allowed range [${min}..${max}]`);
  }
};

export const validateDownloaderConfig = (config: DownloaderConfig): DownloaderConfig => {
  assertIntegerInRange("concurrency", config.concurrency, downloaderCaps.concurrency.min, downloaderCaps.concurrency.max);
  assertIntegerInRange("queueCapacity", config.queueCapacity, downloaderCaps.queueCapacity.min, downloaderCaps.queueCapacity.max);
  assertIntegerInRange("retries", config.retries, downloaderCaps.retries.min, downloaderCaps.retries.max);
  assertIntegerInRange("minBackoffMs", config.minBackoffMs, downloaderCaps.minBackoffMs.min, downloaderCaps.minBackoffMs.max);
  assertIntegerInRange("maxBackoffMs", config.maxBackoffMs, downloaderCaps.maxBackoffMs.min, downloaderCaps.maxBackoffMs.max);
  assertIntegerInRange("cadenceThreshold", config.cadenceThreshold, downloaderCaps.cadenceThreshold.min, downloaderCaps.cadenceThreshold.max);
  assertIntegerInRange("cadencePauseMs", config.cadencePauseMs, downloaderCaps.cadencePauseMs.min, downloaderCaps.cadencePauseMs.max);
  assertIntegerInRange("requestTimeoutMs", config.requestTimeoutMs, downloaderCaps.requestTimeoutMs.min, downloaderCaps.requestTimeoutMs.max);

  if (config.minBackoffMs > config.maxBackoffMs) {
    throw new Error(`minBackoffMs=${config.minBackoffMs} must not exceed maxBackoffMs=${config.maxBackoffMs}`);
  }
  if (config.rateLimit !== "unbounded" && (!Number.isFinite(config.rateLimit) || config.rateLimit <= 0)) {
    throw new Error(`rateLimit=${String(config.rateLimit)} must be a positive number of bytes per second or "unbounded"`);
  }
  if (!remuxRetryPolicies.includes(config.remuxRetryPolicy)) {
    throw new Error(`remuxRetryPolicy=${String(config.remuxRetryPolicy)} must be one of ${remuxRetryPolicies.join(", ")}`);
  }
  if (config.outputDir.trim() === "") {
    throw new Error("outputDir must not be empty");
  }
  return config;
};

export const resolveDownloaderConfig = (input: DownloaderConfigInput = {}): DownloaderConfig => {
  const config = validateDownloaderConfig({
    ...defaultDownloaderConfig,
    ...input
  });
  return { ...config, outputDir: path.resolve(config.outputDir.trim()) };
};
