import { CancelledError } from "./abort";

export class QueueClosedError extends Error {
  readonly code = "queue_closed";

  constructor(message = "Queue is closed") {
    super(message);
    this.name = "QueueClosedError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

type Waiter = {
  resolve: () => void;
  reject: (err: Error) => void;
};

/**
 * A tiny bounded FIFO channel (no external deps).
 * Usage:
 *   const queue = new BoundedQueue<Job>(50);
 *   await queue.push(job);          // waits while full
 *   const next = await queue.take(); // undefined once closed and drained
 */
export class BoundedQueue<T> {
  private readonly items: T[] = [];
  private readonly pushWaiters: Waiter[] = [];
  private readonly takeWaiters: Waiter[] = [];
  private closed = false;
  private cancelledWith?: Error;

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error("capacity must be an integer >= 1");
    }
  }

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async push(item: T, signal?: AbortSignal): Promise<void> {
    while (true) {
      if (this.cancelledWith) throw this.cancelledWith;
      if (this.closed) throw new QueueClosedError();
      if (signal?.aborted) throw new CancelledError();

      if (this.items.length < this.capacity) {
        this.items.push(item);
        this.wake(this.takeWaiters);
        return;
      }

      await this.wait(this.pushWaiters, signal);
    }
  }

  /**
   * Next item in FIFO order, or undefined once the queue is closed and empty.
   */
  async take(signal?: AbortSignal): Promise<T | undefined> {
    while (true) {
      if (this.cancelledWith) throw this.cancelledWith;
      if (signal?.aborted) throw new CancelledError();

      const item = this.items.shift();
      if (item !== undefined) {
        this.wake(this.pushWaiters);
        return item;
      }
      if (this.closed) return undefined;

      await this.wait(this.takeWaiters, signal);
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.wakeAll(this.takeWaiters);
    this.wakeAll(this.pushWaiters);
  }

  /**
   * Stops the queue for good: pending and future push/take calls reject with
   * `reason`. Returns the items that were still queued.
   */
  cancel(reason: Error = new CancelledError()): T[] {
    const error = (this.cancelledWith ??= reason);
    this.closed = true;
    const dropped = this.items.splice(0, this.items.length);
    for (const waiter of [...this.takeWaiters.splice(0), ...this.pushWaiters.splice(0)]) {
      waiter.reject(error);
    }
    return dropped;
  }

  private wait(waiters: Waiter[], signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const waiter: Waiter = {
        resolve: () => {
          signal?.removeEventListener("abort", onAbort);
          resolve();
        },
        reject: (err) => {
          signal?.removeEventListener("abort", onAbort);
          reject(err);
        }
      };
      // An abandoned waiter must leave the list, or a later wake-up would be lost on it.
      const onAbort = () => {
        const index = waiters.indexOf(waiter);
        if (index >= 0) waiters.splice(index, 1);
        reject(new CancelledError());
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      waiters.push(waiter);
    });
  }

  private wake(waiters: Waiter[]): void {
    waiters.shift()?.resolve();
  }

  private wakeAll(waiters: Waiter[]): void {
    for (const waiter of waiters.splice(0)) waiter.resolve();
  }
}
