import { Queue, type ConnectionOptions, type JobsOptions } from "bullmq";

import type { ImageJobData, JobHandle, StageName } from "../types";

export type EnqueueOptions = {
  jobId: string;
};

/** Queue collaborator: fire-and-forget, may reject on connection failure. */
export interface JobQueue {
  enqueue(name: StageName, data: ImageJobData, opts: EnqueueOptions): Promise<JobHandle>;
  close(): Promise<void>;
}

export type BullJobQueueOptions = {
  attempts: number;
  backoffMs: number;
};

export class BullJobQueue implements JobQueue {
  private readonly queue: Queue<ImageJobData, void, StageName>;
  private readonly defaults: JobsOptions;

  constructor(name: string, connection: ConnectionOptions, opts: BullJobQueueOptions) {
    this.queue = new Queue<ImageJobData, void, StageName>(name, { connection });
    this.defaults = {
      removeOnComplete: false,
      removeOnFail: false,
      attempts: opts.attempts,
      backoff: { type: "exponential", delay: opts.backoffMs },
    };
  }

  async enqueue(name: StageName, data: ImageJobData, opts: EnqueueOptions): Promise<JobHandle> {
    const job = await this.queue.add(name, data, { ...this.defaults, jobId: opts.jobId });
    return { jobId: String(job.id ?? opts.jobId), name };
  }

  close(): Promise<void> {
    return this.queue.close();
  }
}
