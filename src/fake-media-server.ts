import http from "http";
import { URL } from "url";

/**
 * Minimal fake media origin for tests and local runs.
 * - every route answers GET with a fixed body and content type
 * - `failTimes` answers 503 (with Retry-After: 0) before serving the body
 * - `truncateAt` advertises the full Content-Length but closes the socket early
 * - `stallAfter` sends that many bytes, then holds the connection open
 */
export type FakeRoute = {
  body: string | Buffer;
  contentType?: string;
  status?: number;
  headers?: Record<string, string>;
  failTimes?: number;
  truncateAt?: number;
  stallAfter?: number;
};

export type FakeMediaServer = {
  server: http.Server;
  /** Requests received per path. */
  hits: Map<string, number>;
  /** Request headers of the last request per path. */
  lastHeaders: Map<string, http.IncomingHttpHeaders>;
  listen(port?: number): Promise<string>;
  close(): Promise<void>;
};

export const createFakeMediaServer = (routes: Record<string, FakeRoute>): FakeMediaServer => {
  const hits = new Map<string, number>();
  const lastHeaders = new Map<string, http.IncomingHttpHeaders>();

  const server = http.createServer((req, res) => {
    const url = new URL(req.url ?? "/", "http://localhost");
    const route = routes[url.pathname];
    const count = (hits.get(url.pathname) ?? 0) + 1;
    hits.set(url.pathname, count);
    lastHeaders.set(url.pathname, req.headers);

    if (!route) {
      res.writeHead(404, { "content-type": "text/plain" });
      res.end("not found");
      return;
    }

    if (route.failTimes !== undefined && count <= route.failTimes) {
      res.writeHead(503, { "content-type": "text/plain", "Retry-After": "0" });
      res.end("unavailable");
      return;
    }

    const body = Buffer.isBuffer(route.body) ? route.body : Buffer.from(route.body);
    res.writeHead(route.status ?? 200, {
      "content-type": route.contentType ?? "application/octet-stream",
      "content-length": String(body.length),
      ...route.headers
    });

    if (route.stallAfter !== undefined && route.stallAfter < body.length) {
      res.write(body.subarray(0, route.stallAfter));
      return;
    }
    if (route.truncateAt !== undefined && route.truncateAt < body.length) {
      res.write(body.subarray(0, route.truncateAt), () => res.destroy());
      return;
    }
    res.end(body);
  });

  return {
    server,
    hits,
    lastHeaders,
    listen: (port = 0) =>
      new Promise<string>((resolve, reject) => {
        server.once("error", reject);
        server.listen(port, "127.0.0.1", () => {
          server.off("error", reject);
          const address = server.address();
          if (address === null || typeof address === "string") {
            reject(new Error("Fake media server has no TCP address"));
            return;
          }
          resolve(`http://127.0.0.1:${address.port}`);
        });
      }),
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((err) => (err ? reject(err) : resolve()));
      })
  };
};

const demoRoutes = (): Record<string, FakeRoute> => {
  const segment = (n: number) => Buffer.alloc(188 * 64, n);
  return {
    "/video.mp4": { body: Buffer.alloc(256 * 1024, 7), contentType: "video/mp4" },
    "/flaky.mp4": { body: Buffer.alloc(64 * 1024, 3), contentType: "video/mp4", failTimes: 2 },
    "/page.html": { body: "<html><body>not media</body></html>", contentType: "text/html; charset=utf-8" },
    "/live/master.m3u8": {
      body: "#EXTM3U\n#EXT-X-STREAM-INF:BANDWIDTH=800000\nlow.m3u8\n#EXT-X-STREAM-INF:BANDWIDTH=2400000\nhigh.m3u8\n",
      contentType: "application/vnd.apple.mpegurl"
    },
    "/live/high.m3u8": {
      body: "#EXTM3U\n#EXT-X-TARGETDURATION:4\n#EXTINF:4,\nseg0.ts\n#EXTINF:4,\nseg1.ts\n#EXT-X-ENDLIST\n",
      contentType: "application/vnd.apple.mpegurl"
    },
    "/live/seg0.ts": { body: segment(0x47), contentType: "video/mp2t" },
    "/live/seg1.ts": { body: segment(0x47), contentType: "video/mp2t" }
  };
};

if (require.main === module) {
  const port = Number(process.env.FAKE_MEDIA_PORT ?? 3999);
  const fake = createFakeMediaServer(demoRoutes());
  fake.listen(port).then(
    (baseUrl) => {
      // eslint-disable-next-line no-console
      console.log(`Fake media server on ${baseUrl}`);
    },
    (err: unknown) => {
      console.error(err);
      process.exitCode = 1;
    }
  );
}
