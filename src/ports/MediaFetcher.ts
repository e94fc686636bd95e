import type { Readable } from "stream";

export type MediaRequest = {
  url: string;
  headers: Record<string, string>;
  signal?: AbortSignal;
};

export type MediaResponse = {
  /** URL after redirects. */
  url: string;
  status: number;
  contentType?: string;
  contentLength?: number;
  body: Readable;
};

/**
 * Opens a remote resource. Implementations reject with MediaRequestError for
 * non-2xx responses and timeouts; other rejections are network failures.
 */
export interface MediaFetcher {
  open(request: MediaRequest): Promise<MediaResponse>;
}
