import path from "path";

export type MediaFormat = "progressive" | "mpegts" | "hls" | "html";

const HLS_CONTENT_TYPES = new Set(["application/vnd.apple.mpegurl", "application/x-mpegurl", "audio/mpegurl"]);
const MPEGTS_CONTENT_TYPES = new Set(["video/mp2t", "video/mpeg-ts"]);

const mimeOf = (contentType?: string): string => (contentType ?? "").split(";")[0]?.trim().toLowerCase() ?? "";

const pathExtOf = (url: string): string => {
  try {
    return path.posix.extname(new URL(url).pathname).toLowerCase();
  } catch {
    return "";
  }
};

/**
 * Content type wins; the URL path is only consulted when the server sends a
 * generic type such as application/octet-stream.
 */
export const detectMediaFormat = (res: { url: string; contentType?: string }): MediaFormat => {
  const mime = mimeOf(res.contentType);
  if (HLS_CONTENT_TYPES.has(mime)) return "hls";
  if (MPEGTS_CONTENT_TYPES.has(mime)) return "mpegts";
  if (mime === "text/html" || mime === "application/xhtml+xml") return "html";

  const ext = pathExtOf(res.url);
  if (ext === ".m3u8") return "hls";
  if (ext === ".ts") return "mpegts";
  return "progressive";
};

export const needsRemux = (format: MediaFormat, outputPath: string): boolean =>
  (format === "hls" || format === "mpegts") && path.extname(outputPath).toLowerCase() !== ".ts";

/**
 * ffmpeg muxer name for an output path, defaulting to mp4.
 */
export const containerFormatFor = (outputPath: string): "mp4" | "matroska" | "mpegts" => {
  switch (path.extname(outputPath).toLowerCase()) {
    case ".mkv":
      return "matroska";
    case ".ts":
      return "mpegts";
    default:
      return "mp4";
  }
};
