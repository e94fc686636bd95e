import type { DownloadJob, JobOutcome } from "../../core/jobs/DownloadJob";
import { sanitizeUrl } from "../../infrastructure/http/sanitizeUrl";
import type { JobSink } from "../../ports/JobProducer";
import { CancelledError, isCancelledError, linkAbortController } from "../../shared/concurrency/abort";
import { BoundedQueue, QueueClosedError } from "../../shared/concurrency/boundedQueue";
import { toErrorMessage } from "../../shared/errors/errorCode";
import {
  createRunSummaryTracker,
  DownloadFatalError,
  type RunResult
} from "./download.error-handler";

export class SchedulerClosedError extends Error {
  readonly code = "scheduler_closed";

  constructor(message = "Scheduler is closed to new jobs") {
    super(message);
    this.name = "SchedulerClosedError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export type SchedulerState = "open" | "draining" | "done";

/** What the scheduler needs from an executor. */
export type JobRunner = {
  execute(job: DownloadJob, opts: { signal: AbortSignal }): Promise<JobOutcome>;
};

export type DownloadSchedulerOptions = {
  executor: JobRunner;
  concurrency: number;
  queueCapacity: number;
  onOutcome?: (outcome: JobOutcome) => void;
  now?: () => number;
};

/**
 * Default outcome log: one JSON line per finished job.
 */
export const logOutcome = (outcome: JobOutcome): void => {
  const base = { jobId: outcome.job.id, url: sanitizeUrl(outcome.job.url) };
  switch (outcome.status) {
    case "completed":
      console.log(JSON.stringify({
        event: "download.completed",
        ...base,
        outputPath: outcome.outputPath,
        bytes: outcome.bytes,
        attempts: outcome.attempts
      }));
      break;
    case "skipped":
      console.log(JSON.stringify({ event: "download.skipped", ...base, outputPath: outcome.job.outputPath, reason: outcome.reason }));
      break;
    case "failed":
      console.error(JSON.stringify({
        event: "download.failed",
        ...base,
        errorClass: outcome.errorClass,
        attempts: outcome.attempts,
        reason: outcome.reason
      }));
      break;
    case "cancelled":
      console.warn(JSON.stringify({ event: "download.cancelled", ...base, attempts: outcome.attempts }));
      break;
  }
};

/**
 * Bounded-concurrency dispatcher. Producers `submit` into a bounded FIFO queue
 * and wait while it is full; `run` drains it with a fixed number of worker
 * loops until `close` has been called and the queue is empty.
 */
export class DownloadScheduler implements JobSink {
  private readonly queue: BoundedQueue<DownloadJob>;
  private readonly onOutcome: (outcome: JobOutcome) => void;
  private readonly runController = new AbortController();
  private readonly tracker: ReturnType<typeof createRunSummaryTracker>;
  private currentState: SchedulerState = "open";
  private started = false;

  constructor(private readonly opts: DownloadSchedulerOptions) {
    if (!Number.isInteger(opts.concurrency) || opts.concurrency < 1) {
      throw new Error("concurrency must be an integer >= 1");
    }
    this.queue = new BoundedQueue<DownloadJob>(opts.queueCapacity);
    this.onOutcome = opts.onOutcome ?? logOutcome;
    this.tracker = createRunSummaryTracker(opts.now);
  }

  get state(): SchedulerState {
    return this.currentState;
  }

  async submit(job: DownloadJob): Promise<void> {
    if (this.currentState !== "open") {
      throw this.runController.signal.aborted ? new CancelledError() : new SchedulerClosedError();
    }
    try {
      await this.queue.push(job);
    } catch (err) {
      if (err instanceof QueueClosedError) throw new SchedulerClosedError();
      throw err;
    }
  }

  close(): void {
    if (this.currentState === "open") this.currentState = "draining";
    this.queue.close();
  }

  async run(signal?: AbortSignal): Promise<RunResult> {
    if (this.started) throw new Error("DownloadScheduler.run may only be called once");
    this.started = true;

    const { controller: stop, dispose } = linkAbortController(signal);
    const onStop = () => this.stopEarly();
    stop.signal.addEventListener("abort", onStop, { once: true });
    const onFatal = () => stop.abort();
    this.runController.signal.addEventListener("abort", onFatal, { once: true });
    if (stop.signal.aborted) this.stopEarly();

    try {
      const workers = Array.from({ length: this.opts.concurrency }, () => this.workerLoop(stop.signal));
      await Promise.all(workers);
    } finally {
      stop.signal.removeEventListener("abort", onStop);
      this.runController.signal.removeEventListener("abort", onFatal);
      dispose();
      this.currentState = "done";
    }

    return this.tracker.summary(signal?.aborted ?? false);
  }

  private async workerLoop(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      let job: DownloadJob | undefined;
      try {
        job = await this.queue.take(signal);
      } catch (err) {
        if (isCancelledError(err)) return;
        throw err;
      }
      if (!job) return;

      let outcome: JobOutcome;
      try {
        outcome = await this.opts.executor.execute(job, { signal });
      } catch (err) {
        if (!(err instanceof DownloadFatalError)) {
          // Executors report per-job failures as outcomes; anything else is contained to this job.
          outcome = { status: "failed", job, reason: toErrorMessage(err), errorClass: "permanent", attempts: 1 };
        } else {
          const failed: JobOutcome = {
            status: "failed",
            job,
            reason: err.message,
            errorClass: "permanent",
            attempts: err.context.attempt ?? 0
          };
          this.tracker.record(failed);
          this.onOutcome(failed);
          if (this.tracker.setFatal(err)) {
            console.error(JSON.stringify({ event: "run.fatal", jobId: job.id, code: err.code, message: err.message }));
            this.runController.abort();
          }
          return;
        }
      }

      this.tracker.record(outcome);
      this.onOutcome(outcome);
    }
  }

  /**
   * Cancellation or a fatal error: drop what is queued and release blocked
   * submitters. In-flight jobs observe the same signal.
   */
  private stopEarly(): void {
    this.currentState = "draining";
    if (!this.runController.signal.aborted) this.runController.abort();
    const dropped = this.queue.cancel(new CancelledError("Run stopped before the job started"));
    this.tracker.addNotStarted(dropped.length);
  }
}
