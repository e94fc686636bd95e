import { Readable } from "stream";
import type { ReadableStream } from "stream/web";
import type { MediaFetcher, MediaRequest, MediaResponse } from "../../ports/MediaFetcher";
import { CancelledError, linkAbortController } from "../../shared/concurrency/abort";
import { sanitizeUrl } from "./sanitizeUrl";

export class MediaRequestError extends Error {
  readonly code = "media_request_failed";
  readonly status?: number;
  readonly isTimeout: boolean;
  readonly retryDelayMs?: number;
  readonly requestUrl: string;

  constructor(args: { message: string; requestUrl: string; status?: number; isTimeout?: boolean; retryDelayMs?: number }) {
    super(args.message);
    this.name = "MediaRequestError";
    this.requestUrl = args.requestUrl;
    this.status = args.status;
    this.isTimeout = args.isTimeout ?? false;
    this.retryDelayMs = args.retryDelayMs;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Parses a delta-seconds Retry-After header. HTTP-date values and overflowing
 * numbers yield undefined so the caller falls back to normal backoff.
 */
export const parseRetryAfterMs = (header: string | null): number | undefined => {
  if (!header || !/^\d+$/.test(header.trim())) return undefined;
  const ms = Number(header.trim()) * 1000;
  return Number.isSafeInteger(ms) ? ms : undefined;
};

const parseContentLength = (header: string | null): number | undefined => {
  if (header == null || !/^\d+$/.test(header.trim())) return undefined;
  const length = Number(header.trim());
  return Number.isSafeInteger(length) ? length : undefined;
};

/**
 * Media client using native fetch (Node 20). `timeoutMs` bounds connecting and
 * receiving response headers, and then every wait for the next body chunk.
 * Time the consumer spends holding data back (rate limiting) does not count.
 */
export class MediaHttpFetcher implements MediaFetcher {
  constructor(private readonly timeoutMs = 30000) {}

  async open(request: MediaRequest): Promise<MediaResponse> {
    const safeRequestUrl = sanitizeUrl(request.url);
    // One controller per request: aborted by the run signal or by the header timeout.
    const { controller, dispose } = linkAbortController(request.signal);
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);

    let res: Response;
    try {
      res = await fetch(request.url, {
        headers: request.headers,
        redirect: "follow",
        signal: controller.signal
      });
    } catch (err) {
      dispose();
      if (request.signal?.aborted) throw new CancelledError();
      if (timedOut) {
        throw new MediaRequestError({
          message: `Media request timeout after ${this.timeoutMs}ms`,
          requestUrl: safeRequestUrl,
          isTimeout: true
        });
      }
      throw err;
    } finally {
      clearTimeout(timeout);
    }

    if (!res.ok || !res.body) {
      dispose();
      await res.text().catch(() => "");
      throw new MediaRequestError({
        message: res.ok ? "Media response has no body" : `Media request failed: ${res.status}`,
        requestUrl: safeRequestUrl,
        status: res.status,
        retryDelayMs: res.status === 429 || res.status === 503 ? parseRetryAfterMs(res.headers.get("retry-after")) : undefined
      });
    }

    const body = this.guardedBody(res.body, controller, safeRequestUrl);
    body.once("close", dispose);

    return {
      url: res.url || request.url,
      status: res.status,
      contentType: res.headers.get("content-type") ?? undefined,
      contentLength: parseContentLength(res.headers.get("content-length")),
      body
    };
  }

  private guardedBody(source: ReadableStream<Uint8Array>, controller: AbortController, requestUrl: string): Readable {
    const reader = source.getReader();
    const timeoutMs = this.timeoutMs;

    const body: Readable = new Readable({
      read() {
        const stalled = setTimeout(() => {
          body.destroy(new MediaRequestError({
            message: `Media body stalled for ${timeoutMs}ms`,
            requestUrl,
            isTimeout: true
          }));
          controller.abort();
        }, timeoutMs);

        void reader.read().then(
          (chunk) => {
            clearTimeout(stalled);
            if (body.destroyed) return;
            body.push(chunk.done ? null : Buffer.from(chunk.value.buffer, chunk.value.byteOffset, chunk.value.byteLength));
          },
          (err: unknown) => {
            clearTimeout(stalled);
            body.destroy(err instanceof Error ? err : new Error(String(err)));
          }
        );
      },
      destroy(err, callback) {
        void reader.cancel().then(
          () => callback(err),
          () => callback(err)
        );
      }
    });
    return body;
  }
}
