import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import multipart from "@fastify/multipart";
import { ZodError } from "zod";

import {
  type ContentStore,
  type ImageDecoder,
  type JobOrchestrator,
  type Ledger,
  type LogLevel,
  StorageError,
  isAppError,
} from "@imgpipe/shared";

import { registerImageRoutes } from "./routes/images";
import { registerStatsRoutes } from "./routes/stats";
import { IngestionService } from "./services/ingestion";

export type AppDeps = {
  ledger: Ledger;
  store: ContentStore;
  orchestrator: JobOrchestrator;
  decoder: ImageDecoder;
  limits: { maxPixels: number; maxUploadBytes: number };
  publicBaseUrl?: string;
  logLevel?: LogLevel;
  now?: () => Date;
};

export async function buildApp(deps: AppDeps): Promise<FastifyInstance> {
  const app = Fastify({ logger: { level: deps.logLevel ?? "info" } });

  await app.register(cors, { origin: true });
  await app.register(multipart);

  app.setErrorHandler((err, req, reply) => {
    if (err instanceof ZodError) {
      return reply.code(400).send({ error: "Bad request", issues: err.issues });
    }
    if (err instanceof StorageError) {
      req.log.error({ err }, "storage_failed");
      return reply.code(500).send({ error: err.message, code: err.code });
    }
    if (isAppError(err)) {
      req.log.error({ err }, "request_failed");
      return reply.code(500).send({ error: err.message, code: err.code });
    }
    return reply.send(err);
  });

  app.get("/health", async () => ({ status: "ok" }));

  const ingestion = new IngestionService({
    ledger: deps.ledger,
    store: deps.store,
    orchestrator: deps.orchestrator,
    decoder: deps.decoder,
    limits: deps.limits,
    log: app.log,
    now: deps.now,
  });

  await registerImageRoutes(app, {
    ledger: deps.ledger,
    store: deps.store,
    orchestrator: deps.orchestrator,
    ingestion,
    maxUploadBytes: deps.limits.maxUploadBytes,
    publicBaseUrl: deps.publicBaseUrl,
  });
  await registerStatsRoutes(app, { ledger: deps.ledger });

  return app;
}
