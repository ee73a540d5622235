import RedisMock from "ioredis-mock";
import { describe, expect, it } from "vitest";

import { Ledger } from "../src/ledger/ledger";
import { computeStats, summarizeOutcomes } from "../src/stats";
import type { ProcessingOutcome } from "../src/types";

function row(imageId: string, status: ProcessingOutcome["status"], start: string, end: string | null): ProcessingOutcome {
  return { imageId, status, startedAt: start, endedAt: end };
}

describe("summarizeOutcomes", () => {
  it("returns zeros for no rows", () => {
    expect(summarizeOutcomes([])).toEqual({
      total: 0,
      failed: 0,
      successRate: "0.00%",
      avgProcessingSeconds: 0,
    });
  });

  it("averages only completed rows and rates success over all rows", () => {
    const stats = summarizeOutcomes([
      row("a", "success", "2026-01-01T00:00:00.000Z", "2026-01-01T00:00:02.000Z"),
      row("b", "success", "2026-01-01T00:00:00.000Z", "2026-01-01T00:00:04.000Z"),
      row("c", "failed", "2026-01-01T00:00:00.000Z", "2026-01-01T00:00:09.000Z"),
      row("d", "pending", "2026-01-01T00:00:00.000Z", null),
    ]);

    expect(stats).toEqual({ total: 4, failed: 1, successRate: "50.00%", avgProcessingSeconds: 5 });
  });

  it("rounds the rate and the average to two decimals", () => {
    const stats = summarizeOutcomes([
      row("a", "success", "2026-01-01T00:00:00.000Z", "2026-01-01T00:00:01.000Z"),
      row("b", "failed", "2026-01-01T00:00:00.000Z", "2026-01-01T00:00:01.500Z"),
      row("c", "failed", "2026-01-01T00:00:00.000Z", "2026-01-01T00:00:02.000Z"),
    ]);

    expect(stats.successRate).toBe("33.33%");
    expect(stats.avgProcessingSeconds).toBe(1.5);
  });
});

describe("computeStats", () => {
  it("reads outcomes from the ledger", async () => {
    const redis = new RedisMock();
    await redis.flushall();
    const ledger = new Ledger(redis);

    await ledger.recordFailedAttempt(
      {
        imageId: "x",
        originalName: "evil.xlsx",
        processedAt: "2026-01-01T00:00:00.000Z",
        contentHash: null,
        storedPath: null,
        error: "Bad Extension .xlsx",
      },
      new Date("2026-01-01T00:00:00Z"),
    );

    expect(await computeStats(ledger)).toEqual({
      total: 1,
      failed: 1,
      successRate: "0.00%",
      avgProcessingSeconds: 0,
    });
  });
});
