import { randomBytes } from "crypto";
import { createWriteStream, promises as fs } from "fs";
import path from "path";
import { Transform, type Readable } from "stream";
import { pipeline } from "stream/promises";
import { requestHeadersFor, type DownloadJob, type JobOutcome } from "../../core/jobs/DownloadJob";
import { parsePlaylist, pickVariant, UnsupportedContentError } from "../../core/hls/playlist";
import { detectMediaFormat, needsRemux } from "../../core/media/mediaFormat";
import type { OutputIndex } from "../../core/output/OutputIndex";
import { firstAttempt, nextAttemptState, resumeAfterBackoff, type AttemptPolicy } from "../../core/retry/attemptPolicy";
import { RemuxError } from "../../infrastructure/ffmpeg/FfmpegRemuxer";
import { sanitizeUrl } from "../../infrastructure/http/sanitizeUrl";
import type { MediaFetcher, MediaResponse } from "../../ports/MediaFetcher";
import type { Remuxer } from "../../ports/Remuxer";
import { abortableSleep, isCancelledError, throwIfAborted } from "../../shared/concurrency/abort";
import { errorCode, toErrorMessage } from "../../shared/errors/errorCode";
import { retry, type BackoffOptions } from "../../shared/retry/retry";
import type { CadenceGuard } from "../../shared/throttle/CadenceGuard";
import type { RateGovernor } from "../../shared/throttle/RateGovernor";
import {
  classifyDownloadFailure,
  OutputExistsError,
  PartialContentError,
  retryAfterHintMs,
  toFatalError
} from "./download.error-handler";
import type { RemuxRetryPolicy } from "./downloader.config";

export type JobExecutorConfig = {
  backoff: BackoffOptions;
  overwrite: boolean;
  remuxRetryPolicy: RemuxRetryPolicy;
};

export type JobExecutorDeps = {
  fetcher: MediaFetcher;
  remuxer: Remuxer;
  index: OutputIndex;
  governor: RateGovernor;
  cadence: CadenceGuard;
  config: JobExecutorConfig;
  userAgent?: string;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
};

type AttemptProgress = { attempt: number };

// Hard links are not available everywhere (FAT, some network mounts).
const LINK_UNSUPPORTED_CODES = new Set(["EPERM", "ENOTSUP", "EOPNOTSUPP", "ENOSYS"]);

const tempPathFor = (outputPath: string): string =>
  path.join(path.dirname(outputPath), `.${path.basename(outputPath)}.${randomBytes(6).toString("hex")}.part`);

/**
 * Temp files of one attempt. They live next to the final path so the final
 * move stays on one file system.
 */
class AttemptFiles {
  private readonly paths: string[] = [];

  constructor(private readonly outputPath: string) {}

  allocate(): string {
    const tempPath = tempPathFor(this.outputPath);
    this.paths.push(tempPath);
    return tempPath;
  }

  async removeAll(jobId: string): Promise<void> {
    const results = await Promise.allSettled(this.paths.splice(0).map((p) => fs.rm(p, { force: true })));
    for (const result of results) {
      if (result.status === "rejected") {
        console.warn(JSON.stringify({ event: "download.cleanup_failed", jobId, message: toErrorMessage(result.reason) }));
      }
    }
  }
}

const pathExists = async (target: string): Promise<boolean> => {
  try {
    await fs.lstat(target);
    return true;
  } catch (err) {
    if (errorCode(err) === "ENOENT") return false;
    throw err;
  }
};

const readText = async (body: Readable, signal: AbortSignal): Promise<string> => {
  const chunks: Buffer[] = [];
  for await (const chunk of body) {
    throwIfAborted(signal);
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf8");
};

/**
 * Runs one job end to end. Per-job failures come back as outcomes; only
 * resource exhaustion on the local disk is thrown (DownloadFatalError).
 */
export class JobExecutor {
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(private readonly deps: JobExecutorDeps) {
    this.sleep = deps.sleep ?? abortableSleep;
  }

  async execute(job: DownloadJob, opts: { signal: AbortSignal }): Promise<JobOutcome> {
    const { signal } = opts;

    if (job.skipIfExists && this.deps.index.containsOutput(job.outputPath)) {
      return { status: "skipped", job, reason: "exists" };
    }
    if (signal.aborted) return { status: "cancelled", job, attempts: 0 };

    if (!this.deps.config.overwrite) {
      let exists: boolean;
      try {
        exists = await pathExists(job.outputPath);
      } catch (err) {
        throw toFatalError(err, { jobId: job.id, outputPath: job.outputPath });
      }
      if (exists) {
        return {
          status: "failed",
          job,
          reason: new OutputExistsError(job.outputPath).message,
          errorClass: "permanent",
          attempts: 0
        };
      }
    }

    const policy: AttemptPolicy = { ...this.deps.config.backoff, retryBudget: job.retryBudget };
    let state = firstAttempt();

    while (true) {
      const progress: AttemptProgress = { attempt: state.attempt };
      const files = new AttemptFiles(job.outputPath);

      try {
        const bytes = await this.attempt(job, progress, policy, files, signal);
        return { status: "completed", job, outputPath: job.outputPath, bytes, attempts: progress.attempt };
      } catch (err) {
        const errorClass = classifyDownloadFailure(err, signal);
        if (errorClass === "cancelled") return { status: "cancelled", job, attempts: progress.attempt };
        if (errorClass === "fatal") {
          throw toFatalError(err, { jobId: job.id, outputPath: job.outputPath, attempt: progress.attempt });
        }

        const reason = toErrorMessage(err);
        const next = nextAttemptState(errorClass, progress.attempt, policy, retryAfterHintMs(err));
        if (next.kind === "failed_permanent") {
          return { status: "failed", job, reason, errorClass: "permanent", attempts: next.attempts };
        }
        if (next.kind === "failed_transient") {
          console.warn(JSON.stringify({
            event: "download.give_up",
            jobId: job.id,
            url: sanitizeUrl(job.url),
            attempts: next.attempts,
            message: reason
          }));
          return { status: "failed", job, reason, errorClass: "transient", attempts: next.attempts };
        }

        console.warn(JSON.stringify({
          event: "download.retry",
          jobId: job.id,
          url: sanitizeUrl(job.url),
          attempt: next.attempt,
          maxAttempts: job.retryBudget + 1,
          delayMs: next.delayMs,
          message: reason
        }));
        await files.removeAll(job.id);
        try {
          await this.sleep(next.delayMs, signal);
        } catch (sleepErr) {
          if (isCancelledError(sleepErr) || signal.aborted) {
            return { status: "cancelled", job, attempts: next.attempt };
          }
          throw sleepErr;
        }
        state = resumeAfterBackoff(next);
      } finally {
        await files.removeAll(job.id);
      }
    }
  }

  private async attempt(
    job: DownloadJob,
    progress: AttemptProgress,
    policy: AttemptPolicy,
    files: AttemptFiles,
    signal: AbortSignal
  ): Promise<number> {
    await fs.mkdir(path.dirname(job.outputPath), { recursive: true });

    const headers = requestHeadersFor(job, this.deps.userAgent);
    await this.deps.cadence.beforeRequest(signal);
    const res = await this.deps.fetcher.open({ url: job.url, headers, signal });

    const format = detectMediaFormat(res);
    if (format === "html") {
      res.body.destroy();
      throw new UnsupportedContentError("Unsupported content: received an HTML page instead of media");
    }

    const rawPath = files.allocate();
    let bytes = format === "hls"
      ? await this.downloadHls(res, headers, rawPath, signal)
      : await this.writeBody(res, rawPath, "w", signal);

    let finalSource = rawPath;
    if (needsRemux(format, job.outputPath)) {
      finalSource = files.allocate();
      await this.remux(job, rawPath, finalSource, progress, policy, signal);
      bytes = (await fs.stat(finalSource)).size;
    }

    await this.finalize(finalSource, job.outputPath);
    return bytes;
  }

  /**
   * Streams one response body through the shared rate governor into `filePath`.
   * A body shorter or longer than its Content-Length fails the attempt.
   */
  private async writeBody(res: MediaResponse, filePath: string, flags: "w" | "a", signal: AbortSignal): Promise<number> {
    let written = 0;
    const counter = new Transform({
      transform: (chunk: Buffer, _encoding, callback) => {
        written += chunk.length;
        callback(null, chunk);
      }
    });

    await pipeline(res.body, this.deps.governor.throttle(signal), counter, createWriteStream(filePath, { flags }), { signal });

    if (res.contentLength !== undefined && written !== res.contentLength) {
      throw new PartialContentError(res.contentLength, written);
    }
    return written;
  }

  private async downloadHls(
    res: MediaResponse,
    headers: Record<string, string>,
    rawPath: string,
    signal: AbortSignal
  ): Promise<number> {
    let playlist = parsePlaylist(await readText(res.body, signal), res.url);

    if (playlist.kind === "master") {
      const variant = pickVariant(playlist.variants);
      if (!variant) throw new UnsupportedContentError("Unsupported content: master playlist has no variants");

      await this.deps.cadence.beforeRequest(signal);
      const variantRes = await this.deps.fetcher.open({ url: variant.uri, headers, signal });
      playlist = parsePlaylist(await readText(variantRes.body, signal), variantRes.url);
      if (playlist.kind === "master") {
        throw new UnsupportedContentError("Unsupported content: variant is another master playlist");
      }
    }

    let total = 0;
    for (const [index, segmentUrl] of playlist.segments.entries()) {
      await this.deps.cadence.beforeRequest(signal);
      const segment = await this.deps.fetcher.open({ url: segmentUrl, headers, signal });
      total += await this.writeBody(segment, rawPath, index === 0 ? "w" : "a", signal);
    }
    return total;
  }

  private async remux(
    job: DownloadJob,
    inputPath: string,
    outputPath: string,
    progress: AttemptProgress,
    policy: AttemptPolicy,
    signal: AbortSignal
  ): Promise<void> {
    if (this.deps.config.remuxRetryPolicy === "refetch") {
      await this.deps.remuxer.remux(inputPath, outputPath, signal);
      return;
    }

    // remux-only: the fetched bytes are kept and only the remux is repeated.
    await retry(() => this.deps.remuxer.remux(inputPath, outputPath, signal), {
      retries: Math.max(0, policy.retryBudget + 1 - progress.attempt),
      minDelayMs: policy.minDelayMs,
      maxDelayMs: policy.maxDelayMs,
      randomFn: policy.randomFn,
      jitterRatio: policy.jitterRatio,
      shouldRetry: (err) => err instanceof RemuxError,
      onRetry: ({ delayMs, error }) => {
        progress.attempt += 1;
        console.warn(JSON.stringify({
          event: "download.remux_retry",
          jobId: job.id,
          attempt: progress.attempt,
          maxAttempts: job.retryBudget + 1,
          delayMs,
          message: toErrorMessage(error)
        }));
      },
      signal,
      sleep: this.sleep
    });
  }

  /**
   * Moves the finished temp file into place. Without overwrite the move is a
   * hard link plus unlink, which fails with EEXIST instead of replacing a file
   * that appeared during the download.
   */
  private async finalize(source: string, target: string): Promise<void> {
    if (this.deps.config.overwrite) {
      await fs.rename(source, target);
      return;
    }

    try {
      await fs.link(source, target);
    } catch (err) {
      const code = errorCode(err);
      if (code === "EEXIST") throw new OutputExistsError(target);
      if (code === undefined || !LINK_UNSUPPORTED_CODES.has(code)) throw err;

      if (await pathExists(target)) throw new OutputExistsError(target);
      await fs.rename(source, target);
      return;
    }
    await fs.unlink(source);
  }
}
