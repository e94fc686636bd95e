import { abortableSleep } from "../concurrency/abort";

export type RetryDecision =
  | boolean
  | {
      retry: boolean;
      delayMs?: number;
    };

export type BackoffOptions = {
  minDelayMs: number;       // base delay for backoff
  maxDelayMs: number;       // max delay cap
  randomFn?: () => number;
  jitterRatio?: number;
};

export type RetryOptions = BackoffOptions & {
  retries: number;          // max attempts after initial try (e.g. 5 means up to 6 total tries)
  shouldRetry: (err: unknown) => RetryDecision;
  onRetry?: (ctx: { attempt: number; maxAttempts: number; delayMs: number; error: unknown }) => void;
  onGiveUp?: (ctx: { attempt: number; maxAttempts: number; error: unknown }) => void;
  signal?: AbortSignal;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
};

/**
 * Delay before the retry that follows failed attempt `attempt` (1-based).
 * A finite, non-negative `customDelayMs` (e.g. from Retry-After) replaces the
 * exponential step but is still capped at `maxDelayMs`.
 */
export const computeBackoffMs = (attempt: number, opts: BackoffOptions, customDelayMs?: number): number => {
  const { minDelayMs, maxDelayMs, randomFn = Math.random, jitterRatio = 0.2 } = opts;

  const validCustomDelayMs =
    typeof customDelayMs === "number" && Number.isFinite(customDelayMs) && customDelayMs >= 0
      ? customDelayMs
      : undefined;
  const backoff = validCustomDelayMs != null
    ? Math.min(maxDelayMs, validCustomDelayMs)
    : Math.min(maxDelayMs, minDelayMs * Math.pow(2, Math.max(0, attempt - 1)));
  // small jitter to avoid thundering herd (still deterministic-ish)
  const normalizedJitterRatio = Math.min(1, Math.max(0, jitterRatio));
  const normalizedRandom = Math.min(1, Math.max(0, randomFn()));
  const jitter = Math.floor(backoff * normalizedJitterRatio * normalizedRandom);
  return backoff + jitter;
};

export const retry = async <T>(fn: () => Promise<T>, opts: RetryOptions): Promise<T> => {
  const { retries, shouldRetry, onRetry, onGiveUp, signal, sleep = abortableSleep } = opts;

  let attempt = 0;
  const maxAttempts = retries + 1;
  // attempt=0 is first try, then up to retries extra
  while (true) {
    try {
      return await fn();
    } catch (err) {
      const decision = shouldRetry(err);
      const normalized =
        typeof decision === "boolean"
          ? { retry: decision, delayMs: undefined }
          : decision;
      if (attempt >= retries || !normalized.retry) {
        onGiveUp?.({ attempt: attempt + 1, maxAttempts, error: err });
        throw err;
      }

      const waitMs = computeBackoffMs(attempt + 1, opts, normalized.delayMs);
      onRetry?.({ attempt: attempt + 1, maxAttempts, delayMs: waitMs, error: err });
      await sleep(waitMs, signal);
      attempt += 1;
    }
  }
};
