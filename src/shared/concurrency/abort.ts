export class CancelledError extends Error {
  readonly code = "cancelled";

  constructor(message = "Operation cancelled") {
    super(message);
    this.name = "CancelledError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export const isCancelledError = (err: unknown): err is CancelledError => err instanceof CancelledError;

export const throwIfAborted = (signal?: AbortSignal): void => {
  if (signal?.aborted) throw new CancelledError();
};

/**
 * Resolves after `ms`, or rejects with CancelledError as soon as `signal` fires.
 * The timer is cleared on abort so a cancelled run leaves nothing scheduled.
 */
export const abortableSleep = (ms: number, signal?: AbortSignal): Promise<void> =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, Math.max(0, ms));

    signal?.addEventListener("abort", onAbort, { once: true });
  });

/**
 * Child controller that aborts whenever `parent` does. Call `dispose` once the
 * child is no longer needed so the parent does not keep a stale listener.
 */
export const linkAbortController = (parent?: AbortSignal): { controller: AbortController; dispose: () => void } => {
  const controller = new AbortController();
  if (!parent) return { controller, dispose: () => undefined };

  if (parent.aborted) {
    controller.abort(parent.reason);
    return { controller, dispose: () => undefined };
  }

  const onAbort = () => controller.abort(parent.reason);
  parent.addEventListener("abort", onAbort, { once: true });
  return { controller, dispose: () => parent.removeEventListener("abort", onAbort) };
};
