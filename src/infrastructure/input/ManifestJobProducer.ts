import { promises as fs } from "fs";
import path from "path";
import { createInterface } from "readline";
import {
  createDownloadJob,
  InvalidJobError,
  type DownloadJob,
  type DownloadJobDefaults,
  type DownloadJobInput
} from "../../core/jobs/DownloadJob";
import type { JobProducer, JobSink } from "../../ports/JobProducer";
import { throwIfAborted } from "../../shared/concurrency/abort";
import { toErrorMessage } from "../../shared/errors/errorCode";

export type ManifestDefaults = DownloadJobDefaults & {
  outputDir: string;
  referer?: string;
};

export const DEFAULT_OUTPUT_EXTENSION = ".mp4";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const optionalString = (entry: Record<string, unknown>, key: string): string | undefined => {
  const value = entry[key];
  if (value == null) return undefined;
  if (typeof value !== "string") throw new InvalidJobError(`Invalid job: ${key} must be a string`);
  return value;
};

const optionalHeaders = (entry: Record<string, unknown>): Record<string, string> | undefined => {
  const value = entry.headers;
  if (value == null) return undefined;
  if (!isRecord(value)) throw new InvalidJobError("Invalid job: headers must be an object of strings");

  const headers: Record<string, string> = {};
  for (const [name, headerValue] of Object.entries(value)) {
    if (typeof headerValue !== "string") throw new InvalidJobError(`Invalid job: header ${name} must be a string`);
    headers[name] = headerValue;
  }
  return headers;
};

/**
 * Resolves a manifest `output` inside the output directory. A name without an
 * extension gets `.mp4`; names escaping the directory are rejected.
 */
export const resolveManifestOutput = (outputDir: string, output: string): string => {
  const root = path.resolve(outputDir);
  const withExtension = path.extname(output) === "" ? `${output}${DEFAULT_OUTPUT_EXTENSION}` : output;
  const resolved = path.resolve(root, withExtension);
  const relative = path.relative(root, resolved);
  if (relative === "" || relative.startsWith("..") || path.isAbsolute(relative)) {
    throw new InvalidJobError(`Invalid job: output ${output} points outside ${root}`);
  }
  return resolved;
};

export const parseManifestLine = (line: string, defaults: ManifestDefaults): DownloadJob => {
  let entry: unknown;
  try {
    entry = JSON.parse(line);
  } catch (err) {
    throw new InvalidJobError(`Invalid job: line is not valid JSON (${toErrorMessage(err)})`);
  }
  if (!isRecord(entry)) throw new InvalidJobError("Invalid job: line must be a JSON object");

  const url = optionalString(entry, "url");
  const output = optionalString(entry, "output");
  if (url === undefined) throw new InvalidJobError("Invalid job: url is required");
  if (output === undefined || output.trim() === "") throw new InvalidJobError("Invalid job: output is required");

  let skipIfExists: boolean | undefined;
  if (typeof entry.skipIfExists === "boolean") skipIfExists = entry.skipIfExists;
  else if (entry.skipIfExists != null) throw new InvalidJobError("Invalid job: skipIfExists must be a boolean");

  let retryBudget: number | undefined;
  if (typeof entry.retries === "number") retryBudget = entry.retries;
  else if (entry.retries != null) throw new InvalidJobError("Invalid job: retries must be a number");

  const input: DownloadJobInput = {
    url,
    outputPath: resolveManifestOutput(defaults.outputDir, output.trim()),
    referer: optionalString(entry, "referer") ?? defaults.referer,
    headers: optionalHeaders(entry),
    skipIfExists,
    retryBudget
  };
  return createDownloadJob(input, defaults);
};

/**
 * Reads a JSON-lines manifest and submits one job per line. Lines are read
 * lazily, so a full scheduler queue also pauses the file reader.
 */
export class ManifestJobProducer implements JobProducer {
  constructor(
    private readonly manifestPath: string,
    private readonly defaults: ManifestDefaults
  ) {}

  async produce(sink: JobSink, signal: AbortSignal): Promise<void> {
    throwIfAborted(signal);
    const handle = await fs.open(this.manifestPath, "r");
    const lines = createInterface({ input: handle.createReadStream({ encoding: "utf8" }), crlfDelay: Infinity });

    let lineNumber = 0;
    try {
      for await (const line of lines) {
        lineNumber += 1;
        throwIfAborted(signal);

        const trimmed = line.trim();
        if (trimmed === "" || trimmed.startsWith("#")) continue;

        let job: DownloadJob;
        try {
          job = parseManifestLine(trimmed, this.defaults);
        } catch (err) {
          if (!(err instanceof InvalidJobError)) throw err;
          console.warn(JSON.stringify({
            event: "manifest.entry_skipped",
            manifest: this.manifestPath,
            line: lineNumber,
            message: err.message
          }));
          continue;
        }

        await sink.submit(job);
      }
    } finally {
      lines.close();
      await handle.close();
    }
  }
}
