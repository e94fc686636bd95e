import { promises as fs } from "fs";
import type { RunResult } from "../application/download/download.error-handler";
import { resolveDownloaderConfig, type DownloaderConfigInput } from "../application/download/downloader.config";
import { downloadJobs } from "../application/download/downloadJobs.usecase";
import { DownloadScheduler } from "../application/download/DownloadScheduler";
import { JobExecutor } from "../application/download/JobExecutor";
import { OutputIndex } from "../core/output/OutputIndex";
import { FfmpegRemuxer } from "../infrastructure/ffmpeg/FfmpegRemuxer";
import { MediaHttpFetcher } from "../infrastructure/http/MediaHttpFetcher";
import { ManifestJobProducer, type ManifestDefaults } from "../infrastructure/input/ManifestJobProducer";
import { UrlListJobProducer } from "../infrastructure/input/UrlListJobProducer";
import type { JobProducer } from "../ports/JobProducer";
import { loadEnv } from "../shared/config/env";
import { loadRuntimeConfigFromEnv } from "../shared/config/runtime.config";
import { CadenceGuard } from "../shared/throttle/CadenceGuard";
import { RateGovernor } from "../shared/throttle/RateGovernor";

export type DownloadRequest = {
  urls: readonly string[];
  manifestPath?: string;
  referer?: string;
  /** Overrides on top of DL_* variables; keys must be omitted, not undefined. */
  config?: DownloaderConfigInput;
  signal?: AbortSignal;
};

const sequentialProducer = (producers: JobProducer[]): JobProducer => ({
  produce: async (sink, signal) => {
    for (const producer of producers) {
      await producer.produce(sink, signal);
    }
  }
});

export const runDownloads = async (request: DownloadRequest): Promise<RunResult> => {
  const env = loadEnv();
  const config = resolveDownloaderConfig({ ...loadRuntimeConfigFromEnv(), ...request.config });

  const producers: JobProducer[] = [];
  const defaults: ManifestDefaults = {
    outputDir: config.outputDir,
    skipIfExists: config.skipExisting,
    retryBudget: config.retries,
    referer: request.referer ?? env.FETCHLINE_REFERER
  };
  if (request.urls.length > 0) producers.push(new UrlListJobProducer(request.urls, defaults));
  if (request.manifestPath) producers.push(new ManifestJobProducer(request.manifestPath, defaults));
  if (producers.length === 0) {
    throw new Error("Nothing to download: pass one or more URLs or --manifest <file>");
  }

  await fs.mkdir(config.outputDir, { recursive: true });
  const index = await OutputIndex.build(config.outputDir);

  const cadence = new CadenceGuard({
    threshold: config.cadenceThreshold,
    pauseMs: config.cadencePauseMs,
    onPause: (ctx) => console.warn(JSON.stringify({ event: "cadence.pause", ...ctx }))
  });
  const executor = new JobExecutor({
    fetcher: new MediaHttpFetcher(config.requestTimeoutMs),
    remuxer: new FfmpegRemuxer(env.FFMPEG_PATH),
    index,
    governor: new RateGovernor(config.rateLimit),
    cadence,
    config: {
      backoff: { minDelayMs: config.minBackoffMs, maxDelayMs: config.maxBackoffMs },
      overwrite: config.overwrite,
      remuxRetryPolicy: config.remuxRetryPolicy
    },
    userAgent: env.FETCHLINE_USER_AGENT
  });
  const scheduler = new DownloadScheduler({
    executor,
    concurrency: config.concurrency,
    queueCapacity: config.queueCapacity
  });

  console.log(JSON.stringify({
    event: "run.started",
    outputDir: config.outputDir,
    indexed: index.size,
    concurrency: config.concurrency,
    rateLimit: config.rateLimit,
    cadenceThreshold: config.cadenceThreshold
  }));

  return downloadJobs({ scheduler, producer: sequentialProducer(producers), signal: request.signal });
};
