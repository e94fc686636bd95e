import type { FailureClass } from "../jobs/DownloadJob";
import { computeBackoffMs, type BackoffOptions } from "../../shared/retry/retry";

/**
 * Per-job attempt state machine:
 *
 *   attempting -> succeeded
 *   attempting -> backing_off -> attempting
 *   attempting -> failed_transient | failed_permanent
 */
export type AttemptState =
  | { kind: "attempting"; attempt: number }
  | { kind: "backing_off"; attempt: number; delayMs: number }
  | { kind: "succeeded"; attempts: number }
  | { kind: "failed_transient"; attempts: number }
  | { kind: "failed_permanent"; attempts: number };

export type AttemptPolicy = BackoffOptions & {
  /** Attempts allowed after the first one. */
  retryBudget: number;
};

/** States a failed attempt can lead to. */
export type FailureTransition = Extract<AttemptState, { kind: "backing_off" | "failed_transient" | "failed_permanent" }>;

export const firstAttempt = (): Extract<AttemptState, { kind: "attempting" }> => ({ kind: "attempting", attempt: 1 });

/**
 * Where a failed attempt leads. `attempt` is 1-based; `retryAfterMs` is a
 * server-provided hint that replaces the exponential step.
 */
export const nextAttemptState = (
  errorClass: FailureClass,
  attempt: number,
  policy: AttemptPolicy,
  retryAfterMs?: number
): FailureTransition => {
  if (errorClass === "permanent") return { kind: "failed_permanent", attempts: attempt };
  if (attempt >= policy.retryBudget + 1) return { kind: "failed_transient", attempts: attempt };
  return { kind: "backing_off", attempt, delayMs: computeBackoffMs(attempt, policy, retryAfterMs) };
};

export const resumeAfterBackoff = (
  state: Extract<AttemptState, { kind: "backing_off" }>
): Extract<AttemptState, { kind: "attempting" }> => ({
  kind: "attempting",
  attempt: state.attempt + 1
});

export const isTerminal = (state: AttemptState): boolean =>
  state.kind === "succeeded" || state.kind === "failed_transient" || state.kind === "failed_permanent";
