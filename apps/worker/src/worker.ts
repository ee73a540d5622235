import "dotenv/config";
import { Worker } from "bullmq";

import {
  type ImageJobData,
  Ledger,
  type StageName,
  createContentStore,
  createLogger,
  createRedisConnection,
  loadConfig,
} from "@imgpipe/shared";

import { HttpCaptionModel } from "./caption/captionModel";
import { CaptionModelManager } from "./caption/modelManager";
import { createModules } from "./modules";
import { createProcessor } from "./processor";
import type { ProcessingOutput } from "./types/processing";

async function main() {
  const config = loadConfig();
  const log = createLogger("worker", config.logLevel);

  // ---------- Redis ----------
  const connection = createRedisConnection(config.redis);
  const ledger = new Ledger(connection);

  // ---------- Storage ----------
  const store = createContentStore(config.storage);

  // ---------- Caption model ----------
  const captions = new CaptionModelManager(() => new HttpCaptionModel(config.caption), log);
  await captions.warmup();

  const processor = createProcessor({
    modules: createModules({ store, ledger, captions, log }),
    ledger,
    log,
  });

  const worker = new Worker<ImageJobData, ProcessingOutput, StageName>(config.queueName, processor, {
    connection,
    concurrency: config.jobs.concurrency,
  });

  worker.on("completed", (job) => log.info({ jobId: job.id, stage: job.name }, "job_completed"));
  worker.on("failed", (job, err) =>
    log.error({ jobId: job?.id, stage: job?.name, attemptsMade: job?.attemptsMade, err }, "job_failed_event"),
  );
  worker.on("error", (err) => log.error({ err }, "worker_error"));

  const shutdown = async (signal: string) => {
    log.info({ signal }, "shutting down");
    await worker.close();
    await captions.close();
    await connection.quit();
    process.exit(0);
  };
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err) => {
        log.error({ err }, "shutdown failed");
        process.exit(1);
      });
    });
  }

  log.info({ queue: config.queueName, concurrency: config.jobs.concurrency }, "worker listening");
}

main().catch((err) => {
  createLogger("worker").fatal({ err }, "worker failed to start");
  process.exit(1);
});
