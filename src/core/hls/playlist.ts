export class UnsupportedContentError extends Error {
  readonly code = "unsupported_content";

  constructor(message: string) {
    super(message);
    this.name = "UnsupportedContentError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export type HlsVariant = {
  uri: string;
  bandwidth: number;
};

export type HlsPlaylist =
  | { kind: "master"; variants: HlsVariant[] }
  | { kind: "media"; segments: string[] };

const parseAttributes = (list: string): Record<string, string> => {
  const attrs: Record<string, string> = {};
  const re = /([A-Z0-9-]+)=("[^"]*"|[^,]*)/g;
  let match: RegExpExecArray | null;
  while ((match = re.exec(list)) !== null) {
    const [, key, raw] = match;
    if (key == null || raw == null) continue;
    attrs[key] = raw.startsWith("\"") ? raw.slice(1, -1) : raw;
  }
  return attrs;
};

const resolveUri = (uri: string, baseUrl: string): string => new URL(uri, baseUrl).toString();

/**
 * Parses a master or media playlist. Only clear-text MPEG-TS media playlists
 * are downloadable; encryption and fMP4 init maps raise UnsupportedContentError.
 */
export const parsePlaylist = (text: string, baseUrl: string): HlsPlaylist => {
  const lines = text.split(/\r?\n/).map((line) => line.trim()).filter((line) => line !== "");
  if (lines[0] !== "#EXTM3U") {
    throw new UnsupportedContentError("Unsupported content: playlist is missing #EXTM3U header");
  }

  const variants: HlsVariant[] = [];
  const segments: string[] = [];
  let pendingBandwidth: number | undefined;

  for (const line of lines.slice(1)) {
    if (line.startsWith("#EXT-X-STREAM-INF:")) {
      const bandwidth = Number(parseAttributes(line.slice("#EXT-X-STREAM-INF:".length)).BANDWIDTH);
      pendingBandwidth = Number.isFinite(bandwidth) ? bandwidth : 0;
      continue;
    }
    if (line.startsWith("#EXT-X-KEY:")) {
      const method = parseAttributes(line.slice("#EXT-X-KEY:".length)).METHOD ?? "NONE";
      if (method !== "NONE") {
        throw new UnsupportedContentError(`Unsupported content: encrypted playlist (${method})`);
      }
      continue;
    }
    if (line.startsWith("#EXT-X-MAP:")) {
      throw new UnsupportedContentError("Unsupported content: fragmented MP4 playlist");
    }
    if (line.startsWith("#")) continue;

    if (pendingBandwidth !== undefined) {
      variants.push({ uri: resolveUri(line, baseUrl), bandwidth: pendingBandwidth });
      pendingBandwidth = undefined;
    } else {
      segments.push(resolveUri(line, baseUrl));
    }
  }

  if (variants.length > 0) return { kind: "master", variants };
  if (segments.length === 0) {
    throw new UnsupportedContentError("Unsupported content: playlist has no segments");
  }
  return { kind: "media", segments };
};

export const pickVariant = (variants: HlsVariant[]): HlsVariant | undefined =>
  variants.reduce<HlsVariant | undefined>((best, v) => (best == null || v.bandwidth > best.bandwidth ? v : best), undefined);
