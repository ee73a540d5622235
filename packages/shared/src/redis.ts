import IORedis, { type Redis } from "ioredis";

import type { AppConfig } from "./config";

/**
 * BullMQ needs `maxRetriesPerRequest: null` on connections it blocks on,
 * so the same options are used for the ledger connection too.
 */
export function createRedisConnection(cfg: AppConfig["redis"]): Redis {
  return new IORedis(cfg.url, {
    maxRetriesPerRequest: null,
    ...(cfg.tls ? { tls: {} } : {}),
  });
}
