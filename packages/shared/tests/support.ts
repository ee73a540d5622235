import sharp from "sharp";

import type { EnqueueOptions, JobQueue } from "../src/orchestrator/jobQueue";
import type { ImageJobData, JobHandle, StageName } from "../src/types";

export function makePng(width: number, height: number): Promise<Buffer> {
  return sharp({ create: { width, height, channels: 3, background: { r: 200, g: 40, b: 40 } } })
    .png()
    .toBuffer();
}

export function makeJpeg(width: number, height: number): Promise<Buffer> {
  return sharp({ create: { width, height, channels: 3, background: { r: 20, g: 120, b: 220 } } })
    .jpeg()
    .toBuffer();
}

export type EnqueuedJob = { name: StageName; data: ImageJobData; jobId: string };

/** In-memory queue that, like BullMQ, ignores a jobId it has already seen. */
export class MemoryJobQueue implements JobQueue {
  jobs: EnqueuedJob[] = [];
  failOn: StageName | null = null;

  async enqueue(name: StageName, data: ImageJobData, opts: EnqueueOptions): Promise<JobHandle> {
    if (this.failOn === name) throw new Error("connect ECONNREFUSED 127.0.0.1:6379");
    if (!this.jobs.some((j) => j.jobId === opts.jobId)) {
      this.jobs.push({ name, data, jobId: opts.jobId });
    }
    return { jobId: opts.jobId, name };
  }

  async close(): Promise<void> {}
}
