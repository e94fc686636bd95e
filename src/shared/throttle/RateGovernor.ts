import { Transform } from "stream";
import { abortableSleep, CancelledError } from "../concurrency/abort";

export type RateLimit = number | "unbounded";

export type RateGovernorOptions = {
  /** Averaging window; the bucket holds at most `rate * burstMs` bytes. */
  burstMs?: number;
  now?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
};

/**
 * Token bucket shared by every transfer of a run.
 *
 * `acquire` reserves synchronously and may drive the bucket negative; the
 * caller then sleeps until the debt it created is paid back at `rate`. Since
 * every reservation lands on the same counter, N concurrent readers split one
 * budget instead of getting one each.
 */
export class RateGovernor {
  private readonly bytesPerSecond: number;
  private readonly capacity: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private tokens: number;
  private lastRefill: number;

  constructor(readonly limit: RateLimit, opts: RateGovernorOptions = {}) {
    if (limit !== "unbounded" && (!Number.isFinite(limit) || limit <= 0)) {
      throw new Error(`rate limit must be a positive number of bytes per second or "unbounded". Received: ${String(limit)}`);
    }

    const burstMs = opts.burstMs ?? 1000;
    if (!Number.isFinite(burstMs) || burstMs <= 0) {
      throw new Error("burstMs must be a positive number");
    }

    this.bytesPerSecond = limit === "unbounded" ? Number.POSITIVE_INFINITY : limit;
    this.capacity = limit === "unbounded" ? Number.POSITIVE_INFINITY : Math.max(1, (limit * burstMs) / 1000);
    this.now = opts.now ?? Date.now;
    this.sleep = opts.sleep ?? abortableSleep;
    this.tokens = this.capacity;
    this.lastRefill = this.now();
  }

  static unbounded(): RateGovernor {
    return new RateGovernor("unbounded");
  }

  get isUnbounded(): boolean {
    return this.limit === "unbounded";
  }

  /**
   * Blocks until `bytes` fit in the shared budget. Rejects with CancelledError
   * when `signal` fires; the reservation is handed back in that case.
   */
  async acquire(bytes: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) throw new CancelledError();
    if (this.isUnbounded || bytes <= 0) return;

    const waitMs = this.reserve(bytes);
    if (waitMs <= 0) return;

    try {
      await this.sleep(waitMs, signal);
    } catch (err) {
      this.tokens = Math.min(this.capacity, this.tokens + bytes);
      throw err;
    }
  }

  /**
   * Reserve `bytes` and return how long the caller must wait. Exposed for
   * tests; transfers go through `acquire`/`throttle`.
   */
  reserve(bytes: number): number {
    this.refill();
    this.tokens -= bytes;
    if (this.tokens >= 0) return 0;
    return Math.ceil((-this.tokens / this.bytesPerSecond) * 1000);
  }

  throttle(signal?: AbortSignal): Transform {
    return new Transform({
      transform: (chunk: Buffer, _encoding, callback) => {
        this.acquire(chunk.length, signal).then(
          () => callback(null, chunk),
          (err: unknown) => callback(err instanceof Error ? err : new Error(String(err)))
        );
      }
    });
  }

  private refill(): void {
    const now = this.now();
    const elapsedMs = Math.max(0, now - this.lastRefill);
    this.lastRefill = now;
    this.tokens = Math.min(this.capacity, this.tokens + (elapsedMs / 1000) * this.bytesPerSecond);
  }
}
