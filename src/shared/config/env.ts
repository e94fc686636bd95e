export type Env = {
  FFMPEG_PATH: string;
  FETCHLINE_USER_AGENT: string;
  FETCHLINE_REFERER?: string;
};

export const DEFAULT_USER_AGENT = "fetchline/0.1 (+node)";

const validateHttpUrl = (name: string, value: string): string => {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new Error(`${name} must be a valid absolute http/https URL. Received: ${value}`);
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new Error(`${name} must use http or https scheme. Received: ${value}`);
  }

  return value;
};

const nonBlank = (value: string | undefined): string | undefined =>
  value != null && value.trim() !== "" ? value.trim() : undefined;

export const loadEnv = (env: NodeJS.ProcessEnv = process.env): Env => {
  const FFMPEG_PATH = nonBlank(env.FFMPEG_PATH) ?? "ffmpeg";
  const FETCHLINE_USER_AGENT = nonBlank(env.FETCHLINE_USER_AGENT) ?? DEFAULT_USER_AGENT;
  const referer = nonBlank(env.FETCHLINE_REFERER);
  const FETCHLINE_REFERER = referer === undefined ? undefined : validateHttpUrl("FETCHLINE_REFERER", referer);

  return { FFMPEG_PATH, FETCHLINE_USER_AGENT, FETCHLINE_REFERER };
};
