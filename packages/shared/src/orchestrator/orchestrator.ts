import { randomUUID } from "node:crypto";

import { EnqueueError, errorMessage } from "../errors/appError";
import type { Ledger } from "../ledger/ledger";
import type { Logger } from "../logger";
import { PIPELINE_STAGES, type JobHandle, type Result, type StageName } from "../types";
import type { JobQueue } from "./jobQueue";

export type EnqueueResult = Result<JobHandle[], EnqueueError>;

/**
 * Job ids derive from the content hash, so the queue itself also refuses a
 * second set of jobs for the same content. BullMQ rejects ":" in custom ids.
 */
export function stageJobId(stage: StageName, sha256: string, run?: string): string {
  return run ? `${stage}-${sha256}-${run}` : `${stage}-${sha256}`;
}

export class JobOrchestrator {
  constructor(
    private readonly queue: JobQueue,
    private readonly ledger: Ledger,
    private readonly log: Logger,
  ) {}

  /** Call only when the ledger reported `wasNew` for this hash. */
  onNewContent(sha256: string, storedPath: string): Promise<EnqueueResult> {
    return this.enqueueAll(sha256, storedPath);
  }

  /**
   * Manual recovery for content that was recorded but never (fully)
   * processed: forgets earlier stage results and enqueues a fresh run.
   */
  async retrigger(sha256: string, storedPath: string): Promise<EnqueueResult> {
    await this.ledger.resetStages(sha256);
    return this.enqueueAll(sha256, storedPath, randomUUID().slice(0, 8));
  }

  private async enqueueAll(sha256: string, storedPath: string, run?: string): Promise<EnqueueResult> {
    const handles: JobHandle[] = [];

    for (const stage of PIPELINE_STAGES) {
      try {
        handles.push(
          await this.queue.enqueue(stage, { sha256, storedPath }, { jobId: stageJobId(stage, sha256, run) }),
        );
      } catch (err) {
        return {
          ok: false,
          error: new EnqueueError(
            `Failed to enqueue ${stage} job: ${errorMessage(err)}`,
            { sha256, stage, enqueued: handles.map((h) => h.jobId) },
            err,
          ),
        };
      }
    }

    this.log.info({ sha256, jobs: handles.map((h) => h.jobId) }, "jobs_enqueued");
    return { ok: true, value: handles };
  }
}
