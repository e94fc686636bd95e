import type { DownloadJob, FailureClass, JobOutcome } from "../../core/jobs/DownloadJob";
import { UnsupportedContentError } from "../../core/hls/playlist";
import { MediaRequestError } from "../../infrastructure/http/MediaHttpFetcher";
import { RemuxError } from "../../infrastructure/ffmpeg/FfmpegRemuxer";
import { isCancelledError } from "../../shared/concurrency/abort";
import { errorCode, toErrorMessage } from "../../shared/errors/errorCode";

export type DownloadErrorClass = FailureClass | "fatal" | "cancelled";

export type DownloadFatalCode = "disk_full" | "output_unwritable";

export type DownloadErrorContext = {
  jobId: string;
  outputPath: string;
  attempt?: number;
};

export class DownloadFatalError extends Error {
  readonly code: DownloadFatalCode;
  readonly context: DownloadErrorContext;
  readonly cause?: unknown;

  constructor(args: { code: DownloadFatalCode; message: string; context: DownloadErrorContext; cause?: unknown }) {
    super(args.message);
    this.name = "DownloadFatalError";
    this.code = args.code;
    this.context = args.context;
    this.cause = args.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class PartialContentError extends Error {
  readonly code = "partial_content";

  constructor(readonly expectedBytes: number, readonly receivedBytes: number) {
    super(`Partial content: received ${receivedBytes} of ${expectedBytes} bytes`);
    this.name = "PartialContentError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class OutputExistsError extends Error {
  readonly code = "output_exists";

  constructor(readonly outputPath: string) {
    super(`Output already exists: ${outputPath}`);
    this.name = "OutputExistsError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

const DISK_FULL_CODES = new Set(["ENOSPC", "EDQUOT"]);
const UNWRITABLE_CODES = new Set(["EROFS", "EACCES", "EPERM"]);

/**
 * Maps any error raised while executing a job onto the taxonomy the executor
 * and scheduler act on. Unknown errors (socket resets, DNS hiccups, stream
 * aborts) count as transient.
 */
export const classifyDownloadFailure = (err: unknown, signal?: AbortSignal): DownloadErrorClass => {
  if (signal?.aborted || isCancelledError(err)) return "cancelled";
  if (err instanceof DownloadFatalError) return "fatal";

  const code = errorCode(err);
  if (code && (DISK_FULL_CODES.has(code) || UNWRITABLE_CODES.has(code))) return "fatal";

  if (err instanceof MediaRequestError) {
    if (err.isTimeout) return "transient";
    const status = err.status;
    if (status === 408 || status === 429) return "transient";
    if (typeof status === "number" && status >= 500) return "transient";
    if (typeof status === "number") return "permanent";
    return "transient";
  }

  if (err instanceof UnsupportedContentError || err instanceof OutputExistsError) return "permanent";
  if (err instanceof PartialContentError || err instanceof RemuxError) return "transient";
  return "transient";
};

/**
 * Server hint for the next backoff (Retry-After on 429/503).
 */
export const retryAfterHintMs = (err: unknown): number | undefined =>
  err instanceof MediaRequestError ? err.retryDelayMs : undefined;

export const toFatalError = (err: unknown, context: DownloadErrorContext): DownloadFatalError => {
  if (err instanceof DownloadFatalError) return err;
  const code = errorCode(err);
  const fatalCode: DownloadFatalCode = code && DISK_FULL_CODES.has(code) ? "disk_full" : "output_unwritable";
  return new DownloadFatalError({
    code: fatalCode,
    message: `Cannot write output for job ${context.jobId} at ${context.outputPath}: ${toErrorMessage(err)}`,
    context,
    cause: err
  });
};

export type JobFailureRecord = {
  jobId: string;
  url: string;
  outputPath: string;
  reason: string;
};

export type RunResult = {
  completed: number;
  skipped: number;
  failed: number;
  /** Started but cancelled before finishing. */
  interrupted: number;
  /** Queued but never started because the run stopped early. */
  notStarted: number;
  cancelled: boolean;
  fatalError?: DownloadFatalError;
  failures: JobFailureRecord[];
  durationMs: number;
};

/**
 * Accumulator owned by the scheduler. Every mutation is a synchronous step, so
 * concurrent workers on the event loop cannot lose or tear an update.
 */
export const createRunSummaryTracker = (now: () => number = Date.now) => {
  const startedAt = now();
  let completed = 0;
  let skipped = 0;
  let failed = 0;
  let interrupted = 0;
  let notStarted = 0;
  let fatalError: DownloadFatalError | undefined;
  const failures: JobFailureRecord[] = [];

  return {
    record: (outcome: JobOutcome) => {
      switch (outcome.status) {
        case "completed":
          completed += 1;
          break;
        case "skipped":
          skipped += 1;
          break;
        case "failed":
          failed += 1;
          failures.push(failureRecordOf(outcome.job, outcome.reason));
          break;
        case "cancelled":
          interrupted += 1;
          break;
      }
    },
    addNotStarted: (count: number) => {
      notStarted += count;
    },
    /** Keeps the first fatal error; later ones are consequences of the abort. */
    setFatal: (err: DownloadFatalError): boolean => {
      if (fatalError) return false;
      fatalError = err;
      return true;
    },
    fatalError: () => fatalError,
    summary: (cancelled: boolean): RunResult => ({
      completed,
      skipped,
      failed,
      interrupted,
      notStarted,
      cancelled,
      fatalError,
      failures: failures.slice(),
      durationMs: now() - startedAt
    })
  };
};

const failureRecordOf = (job: DownloadJob, reason: string): JobFailureRecord => ({
  jobId: job.id,
  url: job.url,
  outputPath: job.outputPath,
  reason
});

/**
 * Process exit status for a finished run.
 */
export const exitCodeFor = (result: RunResult): number => {
  if (result.fatalError) return 1;
  if (result.cancelled) return 130;
  return result.failed > 0 ? 1 : 0;
};
