import sharp from "sharp";

import type { EnqueueOptions, ImageJobData, JobHandle, JobQueue, StageName } from "@imgpipe/shared";

export function makePng(width: number, height: number): Promise<Buffer> {
  return sharp({ create: { width, height, channels: 3, background: { r: 200, g: 40, b: 40 } } })
    .png()
    .toBuffer();
}

const BOUNDARY = "----imgpipe-test-boundary";

export function multipart(filename: string, contentType: string, data: Buffer) {
  const head = Buffer.from(
    `--${BOUNDARY}\r\n` +
      `Content-Disposition: form-data; name="file"; filename="${filename}"\r\n` +
      `Content-Type: ${contentType}\r\n\r\n`,
  );
  const tail = Buffer.from(`\r\n--${BOUNDARY}--\r\n`);
  return {
    payload: Buffer.concat([head, data, tail]),
    headers: { "content-type": `multipart/form-data; boundary=${BOUNDARY}` },
  };
}

export type EnqueuedJob = { name: StageName; data: ImageJobData; jobId: string };

export class MemoryJobQueue implements JobQueue {
  jobs: EnqueuedJob[] = [];
  down = false;

  async enqueue(name: StageName, data: ImageJobData, opts: EnqueueOptions): Promise<JobHandle> {
    if (this.down) throw new Error("connect ECONNREFUSED 127.0.0.1:6379");
    if (!this.jobs.some((j) => j.jobId === opts.jobId)) {
      this.jobs.push({ name, data, jobId: opts.jobId });
    }
    return { jobId: opts.jobId, name };
  }

  async close(): Promise<void> {}
}
