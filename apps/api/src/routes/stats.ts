import type { FastifyInstance } from "fastify";

import { type Ledger, computeStats } from "@imgpipe/shared";

export async function registerStatsRoutes(app: FastifyInstance, deps: { ledger: Ledger }) {
  app.get("/api/stats", async (_req, reply) => reply.send(await computeStats(deps.ledger)));
}
