import { spawn } from "child_process";
import type { Remuxer } from "../../ports/Remuxer";
import { containerFormatFor } from "../../core/media/mediaFormat";
import { CancelledError } from "../../shared/concurrency/abort";
import { errorCode } from "../../shared/errors/errorCode";

export class RemuxError extends Error {
  readonly code = "remux_failed";
  readonly exitCode?: number;

  constructor(message: string, exitCode?: number) {
    super(message);
    this.name = "RemuxError";
    this.exitCode = exitCode;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

const STDERR_TAIL_CHARS = 2000;

export const buildRemuxArgs = (inputPath: string, outputPath: string): string[] => {
  const format = containerFormatFor(outputPath);
  const args = ["-y", "-loglevel", "error", "-i", inputPath, "-c", "copy"];
  // ADTS AAC from MPEG-TS needs its headers rewritten for MP4.
  if (format === "mp4") args.push("-bsf:a", "aac_adtstoasc");
  args.push("-f", format, outputPath);
  return args;
};

/**
 * Stream-copy remux through an ffmpeg binary. Installing ffmpeg is the host's
 * job; a missing binary surfaces as RemuxError.
 */
export class FfmpegRemuxer implements Remuxer {
  constructor(private readonly ffmpegPath = "ffmpeg") {}

  remux(inputPath: string, outputPath: string, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) return Promise.reject(new CancelledError());

    return new Promise<void>((resolve, reject) => {
      const child = spawn(this.ffmpegPath, buildRemuxArgs(inputPath, outputPath), {
        stdio: ["ignore", "ignore", "pipe"]
      });

      let stderr = "";
      child.stderr?.on("data", (data: Buffer) => {
        stderr = (stderr + data.toString()).slice(-STDERR_TAIL_CHARS);
      });

      const onAbort = () => {
        child.kill("SIGKILL");
      };
      signal?.addEventListener("abort", onAbort, { once: true });

      let settled = false;
      const settle = (err?: Error) => {
        if (settled) return;
        settled = true;
        signal?.removeEventListener("abort", onAbort);
        if (err) reject(err);
        else resolve();
      };

      child.on("error", (err) => {
        const message = errorCode(err) === "ENOENT"
          ? `ffmpeg not found at ${this.ffmpegPath}`
          : `ffmpeg failed to start: ${err.message}`;
        settle(new RemuxError(message));
      });

      child.on("close", (code) => {
        if (signal?.aborted) {
          settle(new CancelledError());
          return;
        }
        if (code === 0) {
          settle();
          return;
        }
        const detail = stderr.trim();
        settle(new RemuxError(`ffmpeg exited with code ${String(code)}${detail ? `: ${detail}` : ""}`, code ?? undefined));
      });
    });
  }
}
