import { abortableSleep, CancelledError } from "../concurrency/abort";

export type CadenceGuardOptions = {
  /** Requests allowed between pauses; 0 disables the guard. */
  threshold: number;
  pauseMs: number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  onPause?: (ctx: { threshold: number; pauseMs: number }) => void;
};

/**
 * Request counter shared by all workers of a run. Remote anti-abuse systems key
 * on request cadence rather than volume, so this runs independently of the
 * RateGovernor.
 */
export class CadenceGuard {
  private count = 0;
  private pause?: Promise<void>;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(private readonly opts: CadenceGuardOptions) {
    if (!Number.isInteger(opts.threshold) || opts.threshold < 0) {
      throw new Error("cadence threshold must be an integer >= 0");
    }
    if (!Number.isFinite(opts.pauseMs) || opts.pauseMs < 0) {
      throw new Error("cadence pauseMs must be a number >= 0");
    }
    this.sleep = opts.sleep ?? abortableSleep;
  }

  static disabled(): CadenceGuard {
    return new CadenceGuard({ threshold: 0, pauseMs: 0 });
  }

  get requestsSincePause(): number {
    return this.count;
  }

  get isPausing(): boolean {
    return this.pause !== undefined;
  }

  async beforeRequest(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) throw new CancelledError();
    if (this.opts.threshold === 0) return;

    while (true) {
      if (this.pause) {
        // Someone else is pausing; wait for it, then re-check the counter.
        await this.waitForPause(this.pause, signal);
        continue;
      }

      if (this.count < this.opts.threshold) {
        this.count += 1;
        return;
      }

      this.opts.onPause?.({ threshold: this.opts.threshold, pauseMs: this.opts.pauseMs });
      const pause = this.sleep(this.opts.pauseMs, signal);
      this.pause = pause;
      try {
        await pause;
        this.count = 0;
      } finally {
        if (this.pause === pause) this.pause = undefined;
      }
    }
  }

  private waitForPause(pause: Promise<void>, signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (signal?.aborted) {
        reject(new CancelledError());
        return;
      }
      const onAbort = () => reject(new CancelledError());
      signal?.addEventListener("abort", onAbort, { once: true });
      // The pausing caller may itself be cancelled; waiters then retry the pause.
      const settle = () => {
        signal?.removeEventListener("abort", onAbort);
        resolve();
      };
      pause.then(settle, settle);
    });
  }
}
