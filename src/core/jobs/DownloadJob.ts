import { randomUUID } from "crypto";
import path from "path";

export class InvalidJobError extends Error {
  readonly code = "invalid_job";

  constructor(message: string) {
    super(message);
    this.name = "InvalidJobError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export type DownloadJob = Readonly<{
  id: string;
  url: string;
  referer?: string;
  headers: Readonly<Record<string, string>>;
  /** Absolute final path, extension included. */
  outputPath: string;
  skipIfExists: boolean;
  retryBudget: number;
}>;

export type DownloadJobInput = {
  url: string;
  outputPath: string;
  referer?: string;
  headers?: Record<string, string>;
  skipIfExists?: boolean;
  retryBudget?: number;
  id?: string;
};

export type DownloadJobDefaults = {
  skipIfExists: boolean;
  retryBudget: number;
};

export type FailureClass = "transient" | "permanent";

export type JobOutcome =
  | { status: "completed"; job: DownloadJob; outputPath: string; bytes: number; attempts: number }
  | { status: "skipped"; job: DownloadJob; reason: "exists" }
  | { status: "failed"; job: DownloadJob; reason: string; errorClass: FailureClass; attempts: number }
  | { status: "cancelled"; job: DownloadJob; attempts: number };

const parseHttpUrl = (value: unknown, field: string): string => {
  if (typeof value !== "string" || value.trim() === "") {
    throw new InvalidJobError(`Invalid job: ${field} is required`);
  }

  let parsed: URL;
  try {
    parsed = new URL(value.trim());
  } catch {
    throw new InvalidJobError(`Invalid job: ${field} is not an absolute URL`);
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new InvalidJobError(`Invalid job: ${field} must use http or https`);
  }
  return parsed.toString();
};

const parseHeaders = (value: unknown): Record<string, string> => {
  if (value == null) return {};
  if (typeof value !== "object" || Array.isArray(value)) {
    throw new InvalidJobError("Invalid job: headers must be an object of strings");
  }

  const headers: Record<string, string> = {};
  for (const [name, headerValue] of Object.entries(value)) {
    if (typeof headerValue !== "string") {
      throw new InvalidJobError(`Invalid job: header ${name} must be a string`);
    }
    headers[name] = headerValue;
  }
  return headers;
};

export const createDownloadJob = (input: DownloadJobInput, defaults: DownloadJobDefaults): DownloadJob => {
  const url = parseHttpUrl(input.url, "url");
  const referer = input.referer == null || input.referer === "" ? undefined : parseHttpUrl(input.referer, "referer");

  if (typeof input.outputPath !== "string" || input.outputPath.trim() === "") {
    throw new InvalidJobError("Invalid job: outputPath is required");
  }
  const outputPath = path.resolve(input.outputPath.trim());
  if (path.basename(outputPath) === "") {
    throw new InvalidJobError("Invalid job: outputPath must name a file");
  }

  const retryBudget = input.retryBudget ?? defaults.retryBudget;
  if (!Number.isInteger(retryBudget) || retryBudget < 0) {
    throw new InvalidJobError("Invalid job: retryBudget must be a non-negative integer");
  }

  return Object.freeze({
    id: input.id ?? randomUUID(),
    url,
    referer,
    headers: Object.freeze(parseHeaders(input.headers)),
    outputPath,
    skipIfExists: input.skipIfExists ?? defaults.skipIfExists,
    retryBudget
  });
};

/**
 * Headers sent with every request of a job. Explicit overrides win over the
 * referer and the default user agent.
 */
export const requestHeadersFor = (job: DownloadJob, userAgent?: string): Record<string, string> => {
  const headers: Record<string, string> = {};
  if (userAgent) headers["User-Agent"] = userAgent;
  if (job.referer) headers.Referer = job.referer;
  return { ...headers, ...job.headers };
};
