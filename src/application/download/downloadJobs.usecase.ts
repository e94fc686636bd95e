import type { JobProducer } from "../../ports/JobProducer";
import { isCancelledError, linkAbortController } from "../../shared/concurrency/abort";
import type { RunResult } from "./download.error-handler";
import { SchedulerClosedError, type DownloadScheduler } from "./DownloadScheduler";

/**
 * Feeds the scheduler from `producer` while it runs. The scheduler is closed as
 * soon as the producer settles; a producer failure is rethrown after the jobs
 * already submitted have drained.
 */
export const downloadJobs = async (
  deps: { scheduler: DownloadScheduler; producer: JobProducer; signal?: AbortSignal }
): Promise<RunResult> => {
  const { scheduler, producer } = deps;
  const { controller: producerController, dispose } = linkAbortController(deps.signal);

  const producerOutcome: { failed: boolean; error?: unknown } = { failed: false };
  const producing = producer
    .produce(scheduler, producerController.signal)
    .catch((err: unknown) => {
      // Both mean the run stopped first; the scheduler already accounts for it.
      if (isCancelledError(err) || err instanceof SchedulerClosedError) return;
      producerOutcome.failed = true;
      producerOutcome.error = err;
    })
    .finally(() => scheduler.close());

  let result: RunResult;
  try {
    result = await scheduler.run(deps.signal);
  } finally {
    producerController.abort();
    dispose();
    await producing;
  }

  console.log(JSON.stringify({
    event: "run.completed",
    completed: result.completed,
    skipped: result.skipped,
    failed: result.failed,
    interrupted: result.interrupted,
    notStarted: result.notStarted,
    cancelled: result.cancelled,
    fatal: result.fatalError?.code,
    durationMs: result.durationMs
  }));

  if (producerOutcome.failed) throw producerOutcome.error;
  return result;
};
