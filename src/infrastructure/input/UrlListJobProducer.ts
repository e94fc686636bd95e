import path from "path";
import { createDownloadJob, InvalidJobError, type DownloadJob } from "../../core/jobs/DownloadJob";
import type { JobProducer, JobSink } from "../../ports/JobProducer";
import { throwIfAborted } from "../../shared/concurrency/abort";
import { DEFAULT_OUTPUT_EXTENSION, type ManifestDefaults } from "./ManifestJobProducer";

const pad = (value: number, width = 2): string => String(value).padStart(width, "0");

/**
 * Local-time stamp used to name direct downloads: `2024-03-09_14-05-07.042`.
 */
export const timestampName = (date: Date): string =>
  `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
  `_${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}` +
  `.${pad(date.getMilliseconds(), 3)}`;

/**
 * One job per URL given on the command line, saved under a timestamp name in
 * the output directory. URLs submitted within the same millisecond get a
 * `_<n>` suffix.
 */
export class UrlListJobProducer implements JobProducer {
  constructor(
    private readonly urls: readonly string[],
    private readonly defaults: ManifestDefaults,
    private readonly now: () => Date = () => new Date()
  ) {}

  async produce(sink: JobSink, signal: AbortSignal): Promise<void> {
    const usedNames = new Set<string>();

    for (const [index, url] of this.urls.entries()) {
      throwIfAborted(signal);

      const stamp = timestampName(this.now());
      let name = stamp;
      for (let n = 1; usedNames.has(name); n += 1) name = `${stamp}_${n}`;
      usedNames.add(name);

      let job: DownloadJob;
      try {
        job = createDownloadJob(
          {
            url,
            outputPath: path.join(this.defaults.outputDir, `${name}${DEFAULT_OUTPUT_EXTENSION}`),
            referer: this.defaults.referer
          },
          this.defaults
        );
      } catch (err) {
        if (!(err instanceof InvalidJobError)) throw err;
        console.warn(JSON.stringify({ event: "input.entry_skipped", position: index + 1, message: err.message }));
        continue;
      }

      await sink.submit(job);
    }
  }
}
