import { UnrecoverableError } from "bullmq";

import {
  type ImageJobData,
  JobError,
  type Ledger,
  type Logger,
  completeStage,
  toAppError,
} from "@imgpipe/shared";

import { type ModuleRegistry, resolveModule } from "./modules";
import type { ProcessingOutput } from "./types/processing";

/** The slice of a BullMQ Job the processor reads. */
export type ProcessorJob = {
  id?: string;
  name: string;
  data: ImageJobData;
  attemptsMade: number;
  opts: { attempts?: number };
};

export type ProcessorDeps = {
  modules: ModuleRegistry;
  ledger: Ledger;
  log: Logger;
};

/**
 * Runs one stage, then records its result against the content hash. A
 * failure is recorded only once the queue will not retry it any more, so a
 * stage that succeeds on a later attempt never counts as failed.
 */
export function createProcessor(deps: ProcessorDeps) {
  const { modules, ledger, log } = deps;

  return async function processImageJob(job: ProcessorJob): Promise<ProcessingOutput> {
    const mod = resolveModule(modules, job.name);
    if (!mod) {
      throw new UnrecoverableError(`Unknown stage: ${job.name}`);
    }

    const { sha256, storedPath } = job.data;
    const jobId = String(job.id ?? `${job.name}-${sha256}`);

    log.info({ jobId, stage: mod.type, sha256, storedPath }, "job_start");

    let output: ProcessingOutput;
    try {
      output = await mod.run({ sha256, storedPath, jobId });
    } catch (err) {
      const appErr = toAppError(err, "JOB_FAILED");
      const attempts = job.opts.attempts ?? 1;
      const lastAttempt = !appErr.retryable || job.attemptsMade + 1 >= attempts;

      log.error(
        { jobId, stage: mod.type, sha256, attempt: job.attemptsMade + 1, attempts, err: appErr },
        lastAttempt ? "job_failed" : "job_failed_will_retry",
      );

      if (lastAttempt) {
        await completeStage(ledger, sha256, mod.type, "failed", log);
      }

      const jobErr = new JobError({
        code: appErr.code,
        message: `${mod.type} failed for ${sha256}: ${appErr.message}`,
        retryable: appErr.retryable,
        details: { jobId, stage: mod.type, sha256 },
        cause: err,
      });
      if (!appErr.retryable) {
        // stop BullMQ from spending the remaining attempts
        throw new UnrecoverableError(jobErr.message);
      }
      throw jobErr;
    }

    await completeStage(ledger, sha256, mod.type, "success", log);
    log.info({ jobId, stage: mod.type, sha256 }, "job_done");
    return output;
  };
}
