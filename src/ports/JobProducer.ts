import type { DownloadJob } from "../core/jobs/DownloadJob";

export interface JobSink {
  /** Waits while the scheduler queue is full. */
  submit(job: DownloadJob): Promise<void>;
}

/**
 * Discovers jobs (site traversal, manifests, direct URLs) and pushes them into
 * the sink. Returning means no more jobs will follow.
 */
export interface JobProducer {
  produce(sink: JobSink, signal: AbortSignal): Promise<void>;
}
