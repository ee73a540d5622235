import "dotenv/config";

import {
  BullJobQueue,
  JobOrchestrator,
  Ledger,
  SharpImageDecoder,
  createContentStore,
  createLogger,
  createRedisConnection,
  loadConfig,
} from "@imgpipe/shared";

import { buildApp } from "./app";

async function main() {
  const config = loadConfig();

  // -----------------------------
  // 1) Redis: ledger + queue
  // -----------------------------
  const connection = createRedisConnection(config.redis);
  const queue = new BullJobQueue(config.queueName, connection, {
    attempts: config.jobs.attempts,
    backoffMs: config.jobs.backoffMs,
  });
  const ledger = new Ledger(connection);

  // -----------------------------
  // 2) Storage
  // -----------------------------
  const store = createContentStore(config.storage);

  // -----------------------------
  // 3) Fastify app
  // -----------------------------
  const app = await buildApp({
    ledger,
    store,
    orchestrator: new JobOrchestrator(queue, ledger, createLogger("orchestrator", config.logLevel)),
    decoder: new SharpImageDecoder(),
    limits: config.limits,
    publicBaseUrl: config.http.publicBaseUrl,
    logLevel: config.logLevel,
  });

  const shutdown = async (signal: string) => {
    app.log.info({ signal }, "shutting down");
    await app.close();
    await queue.close();
    await connection.quit();
    process.exit(0);
  };
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err) => {
        app.log.error({ err }, "shutdown failed");
        process.exit(1);
      });
    });
  }

  await app.listen({ port: config.http.port, host: config.http.host });
}

main().catch((err) => {
  createLogger("api").fatal({ err }, "api failed to start");
  process.exit(1);
});
