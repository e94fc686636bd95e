#!/usr/bin/env node
import { Command, InvalidArgumentError, Option } from "commander";
import { exitCodeFor } from "../application/download/download.error-handler";
import {
  remuxRetryPolicies,
  type DownloaderConfigInput,
  type RemuxRetryPolicy
} from "../application/download/downloader.config";
import { runDownloads, type DownloadRequest } from "../composition/root";
import { parseRateLimit } from "../shared/config/rateLimit";
import { errorCode, isRecord, jobErrorContextOf, toErrorMessage, type JobErrorContext } from "../shared/errors/errorCode";
import type { RateLimit } from "../shared/throttle/RateGovernor";

type CliErrorEnvelope = {
  event: "run.failed";
  name: string;
  message: string;
  code?: string;
  context?: JobErrorContext;
  status?: number;
  stack?: string;
};

export type CliOptions = {
  manifest?: string;
  output?: string;
  referer?: string;
  concurrency?: number;
  retries?: number;
  rate?: RateLimit;
  cadence?: number;
  cadencePause?: number;
  timeout?: number;
  skipExisting?: boolean;
  overwrite?: boolean;
  remuxRetry?: RemuxRetryPolicy;
};

export const isDebugMode = (env: NodeJS.ProcessEnv = process.env): boolean => {
  const debug = env.DEBUG?.toLowerCase();
  return debug === "1" || debug === "true";
};

export const buildCliErrorEnvelope = (err: unknown, includeStack: boolean): CliErrorEnvelope => {
  const error = err instanceof Error ? err : new Error(String(err));
  const errorRecord: Record<string, unknown> = isRecord(err) ? err : {};

  const envelope: CliErrorEnvelope = {
    event: "run.failed",
    name: error.name || "Error",
    message: error.message
  };

  const code = errorCode(err);
  if (code) envelope.code = code;

  const context = jobErrorContextOf(err);
  if (context) envelope.context = context;

  if (typeof errorRecord.status === "number" && Number.isFinite(errorRecord.status)) {
    envelope.status = errorRecord.status;
  }

  if (includeStack && typeof error.stack === "string") {
    envelope.stack = error.stack;
  }

  return envelope;
};

const integerOption = (name: string) => (value: string): number => {
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isInteger(parsed)) {
    throw new InvalidArgumentError(`${name} must be an integer.`);
  }
  return parsed;
};

const rateOption = (value: string): RateLimit => {
  try {
    return parseRateLimit(value);
  } catch (err) {
    throw new InvalidArgumentError(toErrorMessage(err));
  }
};

export const buildProgram = (): Command =>
  new Command()
    .name("fetchline")
    .description("Download media files with bounded concurrency, a shared rate limit and retries")
    .argument("[urls...]", "media URLs, each saved under a timestamp name")
    .option("-m, --manifest <file>", "JSON-lines manifest of jobs ({\"url\", \"output\", ...} per line)")
    .option("-o, --output <dir>", "output directory (default: downloads, or DL_OUTPUT_DIR)")
    .option("-r, --referer <url>", "Referer header sent with every request")
    .option("-c, --concurrency <n>", "transfers in flight at once (1-50)", integerOption("concurrency"))
    .option("--retries <n>", "retries per job after the first attempt (0-20)", integerOption("retries"))
    .option("--rate <limit>", "aggregate rate limit, e.g. 500K, 2M, 1.5MB/s or unbounded", rateOption)
    .option("--cadence <n>", "requests between forced pauses (0 disables)", integerOption("cadence"))
    .option("--cadence-pause <ms>", "length of a forced pause in milliseconds", integerOption("cadence-pause"))
    .option("--timeout <ms>", "timeout for connecting, headers and each body read", integerOption("timeout"))
    .option("--skip-existing", "skip jobs whose output is already present")
    .option("--no-skip-existing", "download even when the output is already present")
    .option("--overwrite", "replace existing output files")
    .addOption(new Option("--remux-retry <policy>", "what a failed remux retries").choices(remuxRetryPolicies));

/**
 * CLI flags win over DL_* variables. Flags that were not given stay out of
 * the overrides so the environment and defaults still apply.
 */
export const toDownloadRequest = (urls: string[], options: CliOptions): DownloadRequest => {
  const config: DownloaderConfigInput = {};
  if (options.output !== undefined) config.outputDir = options.output;
  if (options.concurrency !== undefined) config.concurrency = options.concurrency;
  if (options.retries !== undefined) config.retries = options.retries;
  if (options.rate !== undefined) config.rateLimit = options.rate;
  if (options.cadence !== undefined) config.cadenceThreshold = options.cadence;
  if (options.cadencePause !== undefined) config.cadencePauseMs = options.cadencePause;
  if (options.timeout !== undefined) config.requestTimeoutMs = options.timeout;
  if (options.skipExisting !== undefined) config.skipExisting = options.skipExisting;
  if (options.overwrite !== undefined) config.overwrite = options.overwrite;
  if (options.remuxRetry !== undefined) config.remuxRetryPolicy = options.remuxRetry;

  return {
    urls,
    manifestPath: options.manifest,
    referer: options.referer,
    config
  };
};

export const executeDownloadCli = async (argv: string[] = process.argv): Promise<void> => {
  const controller = new AbortController();
  // A second signal falls through to Node's default handler and kills the process.
  const onSignal = (signal: NodeJS.Signals) => {
    console.warn(JSON.stringify({ event: "run.interrupted", signal }));
    controller.abort();
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  try {
    const program = buildProgram().action(async (urls: string[], options: CliOptions) => {
      const result = await runDownloads({ ...toDownloadRequest(urls, options), signal: controller.signal });
      process.exitCode = exitCodeFor(result);
    });
    await program.parseAsync(argv);
  } catch (err) {
    const envelope = buildCliErrorEnvelope(err, isDebugMode());
    // eslint-disable-next-line no-console
    console.error(JSON.stringify(envelope));
    process.exit(1);
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
  }
};

if (require.main === module) {
  void executeDownloadCli();
}
