import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { Readable } from "stream";
import { DownloadFatalError } from "../../src/application/download/download.error-handler";
import { JobExecutor, type JobExecutorDeps } from "../../src/application/download/JobExecutor";
import { createDownloadJob, type DownloadJobInput } from "../../src/core/jobs/DownloadJob";
import { OutputIndex } from "../../src/core/output/OutputIndex";
import { RemuxError } from "../../src/infrastructure/ffmpeg/FfmpegRemuxer";
import { MediaRequestError } from "../../src/infrastructure/http/MediaHttpFetcher";
import type { MediaFetcher, MediaRequest, MediaResponse } from "../../src/ports/MediaFetcher";
import type { Remuxer } from "../../src/ports/Remuxer";
import { abortableSleep } from "../../src/shared/concurrency/abort";
import { CadenceGuard } from "../../src/shared/throttle/CadenceGuard";
import { RateGovernor } from "../../src/shared/throttle/RateGovernor";

type Handler = (request: MediaRequest, call: number) => MediaResponse | Promise<MediaResponse>;

class FakeFetcher implements MediaFetcher {
  readonly calls: MediaRequest[] = [];

  constructor(private readonly handler: Handler) {}

  async open(request: MediaRequest): Promise<MediaResponse> {
    this.calls.push(request);
    return this.handler(request, this.calls.length);
  }
}

class FakeRemuxer implements Remuxer {
  readonly calls: Array<{ inputPath: string; outputPath: string }> = [];

  constructor(
    private failures = 0,
    private readonly failWith: () => Error = () => new RemuxError("ffmpeg exited with code 1", 1)
  ) {}

  async remux(inputPath: string, outputPath: string): Promise<void> {
    this.calls.push({ inputPath, outputPath });
    if (this.failures > 0) {
      this.failures -= 1;
      throw this.failWith();
    }
    const data = await fs.readFile(inputPath);
    await fs.writeFile(outputPath, Buffer.concat([Buffer.from("remuxed:"), data]));
  }
}

const media = (
  request: MediaRequest,
  body: string | Buffer,
  opts: { contentType?: string; contentLength?: number } = {}
): MediaResponse => {
  const data = Buffer.isBuffer(body) ? body : Buffer.from(body);
  return {
    url: request.url,
    status: 200,
    contentType: opts.contentType ?? "video/mp4",
    contentLength: opts.contentLength ?? data.length,
    body: Readable.from([data])
  };
};

const httpError = (status: number, retryDelayMs?: number) =>
  new MediaRequestError({ message: `Media request failed: ${status}`, requestUrl: "https://cdn.example.test/x", status, retryDelayMs });

const systemError = (code: string): Error => Object.assign(new Error(`${code}: failure`), { code });

describe("JobExecutor", () => {
  let dir: string;
  let warnSpy: jest.SpyInstance;

  const job = (overrides: Partial<DownloadJobInput> = {}) =>
    createDownloadJob({
      url: "https://cdn.example.test/media/clip.mp4",
      outputPath: path.join(dir, "clip.mp4"),
      ...overrides
    }, { skipIfExists: true, retryBudget: 2 });

  const makeExecutor = (overrides: Partial<JobExecutorDeps> & Pick<JobExecutorDeps, "fetcher">) =>
    new JobExecutor({
      remuxer: new FakeRemuxer(),
      index: OutputIndex.empty(),
      governor: RateGovernor.unbounded(),
      cadence: CadenceGuard.disabled(),
      config: {
        backoff: { minDelayMs: 100, maxDelayMs: 1000, jitterRatio: 0 },
        overwrite: false,
        remuxRetryPolicy: "remux-only"
      },
      sleep: async () => undefined,
      ...overrides
    });

  const leftovers = async () => (await fs.readdir(dir)).filter((name) => name.endsWith(".part"));

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "fetchline-exec-"));
    warnSpy = jest.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    warnSpy.mockRestore();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("downloads a progressive file to its final path", async () => {
    const fetcher = new FakeFetcher((request) => media(request, "progressive-bytes"));
    const executor = makeExecutor({ fetcher, userAgent: "fetchline-test" });
    const target = job({ referer: "https://site.example.test/watch" });

    const outcome = await executor.execute(target, { signal: new AbortController().signal });

    expect(outcome).toEqual({ status: "completed", job: target, outputPath: target.outputPath, bytes: 17, attempts: 1 });
    expect(await fs.readFile(target.outputPath, "utf8")).toBe("progressive-bytes");
    expect(fetcher.calls[0]?.headers).toEqual({
      "User-Agent": "fetchline-test",
      Referer: "https://site.example.test/watch"
    });
    expect(await fs.readdir(dir)).toEqual(["clip.mp4"]);
  });

  it("creates missing parent directories of the output", async () => {
    const fetcher = new FakeFetcher((request) => media(request, "abc"));
    const target = job({ outputPath: path.join(dir, "season-1", "ep-1.mp4") });

    const outcome = await makeExecutor({ fetcher }).execute(target, { signal: new AbortController().signal });

    expect(outcome.status).toBe("completed");
    expect(await fs.readFile(target.outputPath, "utf8")).toBe("abc");
  });

  it("skips an indexed job without any network activity", async () => {
    const fetcher = new FakeFetcher((request) => media(request, "unused"));
    const executor = makeExecutor({ fetcher, index: OutputIndex.fromNames(dir, ["clip.ts"]) });
    const target = job();

    const outcome = await executor.execute(target, { signal: new AbortController().signal });

    expect(outcome).toEqual({ status: "skipped", job: target, reason: "exists" });
    expect(fetcher.calls).toHaveLength(0);
  });

  it("downloads an indexed job when skipIfExists is off", async () => {
    const fetcher = new FakeFetcher((request) => media(request, "fresh"));
    const executor = makeExecutor({ fetcher, index: OutputIndex.fromNames(dir, ["clip.mp4"]) });

    const outcome = await executor.execute(job({ skipIfExists: false }), { signal: new AbortController().signal });

    expect(outcome.status).toBe("completed");
    expect(fetcher.calls).toHaveLength(1);
  });

  it("skips a job whose own .mkv output is already on disk", async () => {
    await fs.writeFile(path.join(dir, "show.mkv"), "old");
    const fetcher = new FakeFetcher((request) => media(request, "unused"));
    const executor = makeExecutor({ fetcher, index: await OutputIndex.build(dir) });
    const target = job({ outputPath: path.join(dir, "show.mkv") });

    const outcome = await executor.execute(target, { signal: new AbortController().signal });

    expect(outcome).toEqual({ status: "skipped", job: target, reason: "exists" });
    expect(fetcher.calls).toHaveLength(0);
  });

  it("does not let a top-level file stand in for an output in a sub-directory", async () => {
    await fs.writeFile(path.join(dir, "ep1.mp4"), "top-level");
    const fetcher = new FakeFetcher((request) => media(request, "season-2"));
    const executor = makeExecutor({ fetcher, index: await OutputIndex.build(dir) });
    const target = job({ outputPath: path.join(dir, "season2", "ep1.mp4") });

    const outcome = await executor.execute(target, { signal: new AbortController().signal });

    expect(outcome.status).toBe("completed");
    expect(fetcher.calls).toHaveLength(1);
    expect(await fs.readFile(target.outputPath, "utf8")).toBe("season-2");
    expect(await fs.readFile(path.join(dir, "ep1.mp4"), "utf8")).toBe("top-level");
  });

  it("skips an output already present in its sub-directory", async () => {
    await fs.mkdir(path.join(dir, "season2"));
    await fs.writeFile(path.join(dir, "season2", "ep1.ts"), "raw");
    const fetcher = new FakeFetcher((request) => media(request, "unused"));
    const executor = makeExecutor({ fetcher, index: await OutputIndex.build(dir) });

    const outcome = await executor.execute(job({ outputPath: path.join(dir, "season2", "ep1.mp4") }), {
      signal: new AbortController().signal
    });

    expect(outcome.status).toBe("skipped");
    expect(fetcher.calls).toHaveLength(0);
  });

  it("fails permanently without fetching when the output exists and overwrite is off", async () => {
    await fs.writeFile(path.join(dir, "clip.mp4"), "old");
    const fetcher = new FakeFetcher((request) => media(request, "new"));

    const outcome = await makeExecutor({ fetcher }).execute(job({ skipIfExists: false }), {
      signal: new AbortController().signal
    });

    expect(outcome).toMatchObject({
      status: "failed",
      errorClass: "permanent",
      attempts: 0,
      reason: `Output already exists: ${path.join(dir, "clip.mp4")}`
    });
    expect(fetcher.calls).toHaveLength(0);
    expect(await fs.readFile(path.join(dir, "clip.mp4"), "utf8")).toBe("old");
  });

  it("replaces the output when overwrite is on", async () => {
    await fs.writeFile(path.join(dir, "clip.mp4"), "old");
    const fetcher = new FakeFetcher((request) => media(request, "new"));
    const executor = makeExecutor({
      fetcher,
      config: { backoff: { minDelayMs: 1, maxDelayMs: 1 }, overwrite: true, remuxRetryPolicy: "remux-only" }
    });

    const outcome = await executor.execute(job({ skipIfExists: false }), { signal: new AbortController().signal });

    expect(outcome.status).toBe("completed");
    expect(await fs.readFile(path.join(dir, "clip.mp4"), "utf8")).toBe("new");
  });

  it("makes retryBudget + 1 attempts for a job that always fails transiently", async () => {
    const fetcher = new FakeFetcher(() => {
      throw httpError(503);
    });
    const sleep = jest.fn<Promise<undefined>, [number, AbortSignal?]>(async () => undefined);
    const target = job();

    const outcome = await makeExecutor({ fetcher, sleep }).execute(target, { signal: new AbortController().signal });

    expect(outcome).toEqual({
      status: "failed",
      job: target,
      reason: "Media request failed: 503",
      errorClass: "transient",
      attempts: 3
    });
    expect(fetcher.calls).toHaveLength(3);
    expect(sleep.mock.calls.map((call) => call[0])).toEqual([100, 200]);
    expect(await leftovers()).toEqual([]);
  });

  it("uses the server's Retry-After hint for the backoff", async () => {
    const fetcher = new FakeFetcher((request, call) => {
      if (call === 1) throw httpError(429, 700);
      return media(request, "ok");
    });
    const sleep = jest.fn<Promise<undefined>, [number, AbortSignal?]>(async () => undefined);

    const outcome = await makeExecutor({ fetcher, sleep }).execute(job(), { signal: new AbortController().signal });

    expect(outcome).toMatchObject({ status: "completed", attempts: 2 });
    expect(sleep.mock.calls.map((call) => call[0])).toEqual([700]);
  });

  it("fails a permanent error after exactly one attempt", async () => {
    const fetcher = new FakeFetcher(() => {
      throw httpError(404);
    });

    const outcome = await makeExecutor({ fetcher }).execute(job(), { signal: new AbortController().signal });

    expect(outcome).toMatchObject({ status: "failed", errorClass: "permanent", attempts: 1, reason: "Media request failed: 404" });
    expect(fetcher.calls).toHaveLength(1);
  });

  it("treats an HTML page as unsupported content", async () => {
    const fetcher = new FakeFetcher((request) => media(request, "<html></html>", { contentType: "text/html" }));

    const outcome = await makeExecutor({ fetcher }).execute(job(), { signal: new AbortController().signal });

    expect(outcome).toMatchObject({
      status: "failed",
      errorClass: "permanent",
      attempts: 1,
      reason: "Unsupported content: received an HTML page instead of media"
    });
    expect(await fs.readdir(dir)).toEqual([]);
  });

  it("retries a body shorter than its Content-Length", async () => {
    const fetcher = new FakeFetcher((request, call) =>
      call === 1 ? media(request, "short", { contentLength: 10 }) : media(request, "full-body!")
    );

    const outcome = await makeExecutor({ fetcher }).execute(job(), { signal: new AbortController().signal });

    expect(outcome).toMatchObject({ status: "completed", attempts: 2, bytes: 10 });
    expect(warnSpy).toHaveBeenCalledWith(expect.stringContaining("Partial content: received 5 of 10 bytes"));
    expect(await fs.readFile(path.join(dir, "clip.mp4"), "utf8")).toBe("full-body!");
  });

  it("remuxes MPEG-TS into an mp4 output", async () => {
    const fetcher = new FakeFetcher((request) => media(request, "TS", { contentType: "video/mp2t" }));
    const remuxer = new FakeRemuxer();

    const outcome = await makeExecutor({ fetcher, remuxer }).execute(job(), { signal: new AbortController().signal });

    expect(outcome).toMatchObject({ status: "completed", attempts: 1, bytes: 10 });
    expect(remuxer.calls).toHaveLength(1);
    expect(await fs.readFile(path.join(dir, "clip.mp4"), "utf8")).toBe("remuxed:TS");
    expect(await fs.readdir(dir)).toEqual(["clip.mp4"]);
  });

  it("keeps MPEG-TS as is for a .ts output", async () => {
    const fetcher = new FakeFetcher((request) => media(request, "TS", { contentType: "video/mp2t" }));
    const remuxer = new FakeRemuxer();

    const outcome = await makeExecutor({ fetcher, remuxer }).execute(job({ outputPath: path.join(dir, "clip.ts") }), {
      signal: new AbortController().signal
    });

    expect(outcome.status).toBe("completed");
    expect(remuxer.calls).toHaveLength(0);
    expect(await fs.readFile(path.join(dir, "clip.ts"), "utf8")).toBe("TS");
  });

  it("downloads an HLS stream: best variant, segments in order", async () => {
    const fetcher = new FakeFetcher((request) => {
      switch (new URL(request.url).pathname) {
        case "/live/master.m3u8":
          return media(request, "#EXTM3U\n#EXT-X-STREAM-INF:BANDWIDTH=100\nlow.m3u8\n#EXT-X-STREAM-INF:BANDWIDTH=900\nhigh.m3u8\n", {
            contentType: "application/vnd.apple.mpegurl"
          });
        case "/live/high.m3u8":
          return media(request, "#EXTM3U\n#EXTINF:4,\nseg0.ts\n#EXTINF:4,\nseg1.ts\n#EXT-X-ENDLIST\n", {
            contentType: "application/vnd.apple.mpegurl"
          });
        case "/live/seg0.ts":
          return media(request, "AAAA", { contentType: "video/mp2t" });
        case "/live/seg1.ts":
          return media(request, "BBBB", { contentType: "video/mp2t" });
        default:
          throw httpError(404);
      }
    });
    const cadence = new CadenceGuard({ threshold: 100, pauseMs: 0 });
    const governor = new RateGovernor(1_000_000);
    const throttleSpy = jest.spyOn(governor, "throttle");
    const target = job({ url: "https://cdn.example.test/live/master.m3u8", outputPath: path.join(dir, "live.ts") });

    const outcome = await makeExecutor({ fetcher, cadence, governor }).execute(target, {
      signal: new AbortController().signal
    });

    expect(outcome).toMatchObject({ status: "completed", bytes: 8, attempts: 1 });
    expect(fetcher.calls.map((call) => new URL(call.url).pathname)).toEqual([
      "/live/master.m3u8",
      "/live/high.m3u8",
      "/live/seg0.ts",
      "/live/seg1.ts"
    ]);
    expect(cadence.requestsSincePause).toBe(4);
    expect(throttleSpy).toHaveBeenCalledTimes(2);
    expect(await fs.readFile(target.outputPath, "utf8")).toBe("AAAABBBB");
  });

  it("fails an encrypted HLS playlist permanently", async () => {
    const fetcher = new FakeFetcher((request) =>
      media(request, "#EXTM3U\n#EXT-X-KEY:METHOD=AES-128,URI=\"k\"\nseg0.ts\n", { contentType: "application/x-mpegurl" })
    );

    const outcome = await makeExecutor({ fetcher }).execute(job(), { signal: new AbortController().signal });

    expect(outcome).toMatchObject({ status: "failed", errorClass: "permanent", attempts: 1 });
  });

  describe("remux retry policy", () => {
    const tsFetcher = () => new FakeFetcher((request) => media(request, "TS", { contentType: "video/mp2t" }));

    it("remux-only retries the remux on the fetched bytes, each retry counting as an attempt", async () => {
      const fetcher = tsFetcher();
      const remuxer = new FakeRemuxer(2);

      const outcome = await makeExecutor({ fetcher, remuxer }).execute(job({ retryBudget: 3 }), {
        signal: new AbortController().signal
      });

      expect(outcome).toMatchObject({ status: "completed", attempts: 3 });
      expect(fetcher.calls).toHaveLength(1);
      expect(remuxer.calls).toHaveLength(3);
    });

    it("remux-only fails once the attempts run out", async () => {
      const fetcher = tsFetcher();
      const remuxer = new FakeRemuxer(Number.POSITIVE_INFINITY);

      const outcome = await makeExecutor({ fetcher, remuxer }).execute(job({ retryBudget: 1 }), {
        signal: new AbortController().signal
      });

      expect(outcome).toMatchObject({
        status: "failed",
        errorClass: "transient",
        attempts: 2,
        reason: "ffmpeg exited with code 1"
      });
      expect(fetcher.calls).toHaveLength(1);
      expect(remuxer.calls).toHaveLength(2);
      expect(await leftovers()).toEqual([]);
    });

    it("refetch treats a remux failure as a failed attempt and downloads again", async () => {
      const fetcher = tsFetcher();
      const remuxer = new FakeRemuxer(1);
      const executor = makeExecutor({
        fetcher,
        remuxer,
        config: { backoff: { minDelayMs: 1, maxDelayMs: 1 }, overwrite: false, remuxRetryPolicy: "refetch" }
      });

      const outcome = await executor.execute(job(), { signal: new AbortController().signal });

      expect(outcome).toMatchObject({ status: "completed", attempts: 2 });
      expect(fetcher.calls).toHaveLength(2);
      expect(remuxer.calls).toHaveLength(2);
    });
  });

  it("raises DownloadFatalError when the disk is full and leaves no temp file", async () => {
    const fetcher = new FakeFetcher((request) => media(request, "TS", { contentType: "video/mp2t" }));
    const remuxer = new FakeRemuxer(1, () => systemError("ENOSPC"));
    const target = job();

    const error = await makeExecutor({ fetcher, remuxer }).execute(target, { signal: new AbortController().signal }).catch(
      (err: unknown) => err
    );

    expect(error).toBeInstanceOf(DownloadFatalError);
    expect(error).toMatchObject({ code: "disk_full", context: { jobId: target.id, outputPath: target.outputPath, attempt: 1 } });
    expect(await fs.readdir(dir)).toEqual([]);
  });

  it("returns cancelled mid-stream and removes the partial file", async () => {
    const controller = new AbortController();
    const body = new Readable({ read: () => undefined });
    body.push(Buffer.alloc(1024, 1));
    const fetcher = new FakeFetcher((request) => ({
      url: request.url,
      status: 200,
      contentType: "video/mp4",
      contentLength: 4096,
      body
    }));
    setTimeout(() => controller.abort(), 50);

    const outcome = await makeExecutor({ fetcher }).execute(job(), { signal: controller.signal });

    expect(outcome).toMatchObject({ status: "cancelled", attempts: 1 });
    expect(await fs.readdir(dir)).toEqual([]);
  });

  it("returns cancelled during a backoff sleep", async () => {
    const controller = new AbortController();
    const fetcher = new FakeFetcher(() => {
      throw httpError(503);
    });
    const executor = makeExecutor({
      fetcher,
      sleep: abortableSleep,
      config: { backoff: { minDelayMs: 60_000, maxDelayMs: 60_000, jitterRatio: 0 }, overwrite: false, remuxRetryPolicy: "remux-only" }
    });
    setTimeout(() => controller.abort(), 20);

    const started = Date.now();
    const outcome = await executor.execute(job(), { signal: controller.signal });

    expect(outcome).toMatchObject({ status: "cancelled", attempts: 1 });
    expect(Date.now() - started).toBeLessThan(5000);
    expect(fetcher.calls).toHaveLength(1);
  });

  it("does not clobber a file that appeared while downloading", async () => {
    const finalPath = path.join(dir, "clip.mp4");
    const fetcher = new FakeFetcher(async (request) => {
      await fs.writeFile(finalPath, "someone else");
      return media(request, "mine");
    });

    const outcome = await makeExecutor({ fetcher }).execute(job(), { signal: new AbortController().signal });

    expect(outcome).toMatchObject({
      status: "failed",
      errorClass: "permanent",
      attempts: 1,
      reason: `Output already exists: ${finalPath}`
    });
    expect(await fs.readFile(finalPath, "utf8")).toBe("someone else");
    expect(await leftovers()).toEqual([]);
  });
});
