/**
 * `code` of a Node system error (ENOENT, ECONNRESET, ...), if it has one.
 */
export const errorCode = (err: unknown): string | undefined => {
  if (typeof err !== "object" || err === null || !("code" in err)) return undefined;
  return typeof err.code === "string" ? err.code : undefined;
};

export const toErrorMessage = (reason: unknown): string => {
  if (reason instanceof Error) return reason.message;
  return String(reason);
};

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

export type JobErrorContext = Partial<{
  jobId: string;
  outputPath: string;
  attempt: number;
}>;

/**
 * The job fields of an error's `context` that are safe to print; anything
 * else attached to it is dropped.
 */
export const jobErrorContextOf = (err: unknown): JobErrorContext | undefined => {
  const context = isRecord(err) ? err.context : undefined;
  if (!isRecord(context)) return undefined;

  const picked: JobErrorContext = {};
  if (typeof context.jobId === "string") picked.jobId = context.jobId;
  if (typeof context.outputPath === "string") picked.outputPath = context.outputPath;
  if (typeof context.attempt === "number" && Number.isFinite(context.attempt)) picked.attempt = context.attempt;

  return Object.keys(picked).length > 0 ? picked : undefined;
};
