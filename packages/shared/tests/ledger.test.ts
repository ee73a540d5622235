import RedisMock from "ioredis-mock";
import { beforeEach, describe, expect, it, vi } from "vitest";

import { Ledger } from "../src/ledger/ledger";
import { computeStats } from "../src/stats";
import type { ContentDescriptor, UploadAttempt } from "../src/types";

const HASH = "a".repeat(64);

const descriptor: ContentDescriptor = {
  width: 10,
  height: 10,
  format: "png",
  mimeType: "image/png",
  sizeBytes: 75,
};

function attempt(overrides: Partial<UploadAttempt> = {}): UploadAttempt {
  return {
    imageId: "img1",
    originalName: "dot.png",
    processedAt: "2026-01-01T00:00:00.000Z",
    contentHash: HASH,
    storedPath: "originals/abc.png",
    error: null,
    ...overrides,
  };
}

describe("Ledger", () => {
  const redis = new RedisMock();
  let ledger: Ledger;

  beforeEach(async () => {
    await redis.flushall();
    ledger = new Ledger(redis);
  });

  describe("getOrCreateContentRecord", () => {
    it("creates once and returns the stored record afterwards", async () => {
      const first = await ledger.getOrCreateContentRecord(HASH, descriptor, new Date("2026-01-01T00:00:00Z"));
      const second = await ledger.getOrCreateContentRecord(
        HASH,
        { ...descriptor, width: 999 },
        new Date("2026-02-01T00:00:00Z"),
      );

      expect(first.wasNew).toBe(true);
      expect(second.wasNew).toBe(false);
      expect(second.record).toEqual({
        sha256: HASH,
        ...descriptor,
        firstSeenAt: "2026-01-01T00:00:00.000Z",
        exif: null,
        caption: null,
      });
    });

    it("lets exactly one of many concurrent callers create the record", async () => {
      const results = await Promise.all(
        Array.from({ length: 25 }, () => ledger.getOrCreateContentRecord(HASH, descriptor)),
      );

      expect(results.filter((r) => r.wasNew)).toHaveLength(1);
      expect(new Set(results.map((r) => r.record.firstSeenAt)).size).toBe(1);
    });
  });

  describe("updateContentField", () => {
    it("writes exif and caption independently", async () => {
      await ledger.getOrCreateContentRecord(HASH, descriptor);

      expect(await ledger.updateContentField(HASH, "caption", "a red square")).toBe(true);
      expect(await ledger.updateContentField(HASH, "exif", "{}")).toBe(true);

      const record = await ledger.getContentRecord(HASH);
      expect(record?.caption).toBe("a red square");
      expect(record?.exif).toBe("{}");
    });

    it("refuses a hash with no content record", async () => {
      expect(await ledger.updateContentField(HASH, "caption", "x")).toBe(false);
      expect(await ledger.getContentRecord(HASH)).toBeNull();
    });
  });

  describe("attempts and outcomes", () => {
    it("records an accepted attempt with a pending outcome", async () => {
      const startedAt = new Date("2026-01-01T00:00:00Z");
      await ledger.recordUploadAttempt(attempt(), startedAt);

      expect(await ledger.getUploadAttempt("img1")).toEqual(attempt());
      expect(await ledger.getOutcome("img1")).toEqual({
        imageId: "img1",
        startedAt: "2026-01-01T00:00:00.000Z",
        endedAt: null,
        status: "pending",
      });
      expect(await ledger.listWaitingAttempts(HASH)).toEqual(["img1"]);
    });

    it("records a rejected attempt as already failed", async () => {
      const at = new Date("2026-01-01T00:00:05Z");
      await ledger.recordFailedAttempt(
        attempt({ contentHash: null, storedPath: null, error: "Empty upload" }),
        at,
      );

      expect((await ledger.getUploadAttempt("img1"))?.error).toBe("Empty upload");
      expect(await ledger.getOutcome("img1")).toEqual({
        imageId: "img1",
        startedAt: "2026-01-01T00:00:05.000Z",
        endedAt: "2026-01-01T00:00:05.000Z",
        status: "failed",
      });
    });

    it("sets a terminal outcome once", async () => {
      await ledger.recordUploadAttempt(attempt(), new Date("2026-01-01T00:00:00Z"));

      expect(await ledger.recordOutcome("img1", "success", new Date("2026-01-01T00:00:03Z"))).toBe(true);
      expect(await ledger.recordOutcome("img1", "failed", new Date("2026-01-01T00:00:09Z"))).toBe(false);

      expect(await ledger.getOutcome("img1")).toMatchObject({
        status: "success",
        endedAt: "2026-01-01T00:00:03.000Z",
      });
      expect((await ledger.getUploadAttempt("img1"))?.processedAt).toBe("2026-01-01T00:00:03.000Z");
    });

    it("leaves the outcome pending when the terminal write fails, so it can be retried", async () => {
      await ledger.recordUploadAttempt(attempt(), new Date("2026-01-01T00:00:00Z"));
      const multi = vi.spyOn(redis, "multi").mockImplementationOnce(() => {
        throw new Error("connection reset");
      });

      await expect(ledger.recordOutcome("img1", "success", new Date("2026-01-01T00:00:04Z"))).rejects.toThrow(
        "connection reset",
      );
      multi.mockRestore();

      expect(await ledger.getOutcome("img1")).toMatchObject({ status: "pending", endedAt: null });
      expect(await computeStats(ledger)).toEqual({
        total: 1,
        failed: 0,
        successRate: "0.00%",
        avgProcessingSeconds: 0,
      });

      expect(await ledger.recordOutcome("img1", "success", new Date("2026-01-01T00:00:04Z"))).toBe(true);
      expect(await ledger.getOutcome("img1")).toMatchObject({
        status: "success",
        endedAt: "2026-01-01T00:00:04.000Z",
      });
      expect((await ledger.getUploadAttempt("img1"))?.processedAt).toBe("2026-01-01T00:00:04.000Z");
    });

    it("ignores outcomes for unknown attempts", async () => {
      expect(await ledger.recordOutcome("missing", "success")).toBe(false);
      expect(await ledger.getOutcome("missing")).toBeNull();
    });

    it("lists attempts newest first", async () => {
      await ledger.recordUploadAttempt(attempt({ imageId: "old" }), new Date("2026-01-01T00:00:00Z"));
      await ledger.recordFailedAttempt(attempt({ imageId: "new", error: "Empty upload" }), new Date("2026-01-02T00:00:00Z"));

      expect((await ledger.listUploadAttempts()).map((a) => a.imageId)).toEqual(["new", "old"]);
      expect(await ledger.listOutcomes()).toHaveLength(2);
    });
  });

  describe("stage bookkeeping", () => {
    it("reads back every stage recorded so far", async () => {
      await ledger.recordStageResult(HASH, "thumbnail", "success");
      const results = await ledger.recordStageResult(HASH, "exif", "failed");

      expect(results).toEqual({ thumbnail: "success", exif: "failed" });
    });

    it("keeps the first settlement verdict", async () => {
      expect(await ledger.markSettled(HASH, "success")).toBe(true);
      expect(await ledger.markSettled(HASH, "failed")).toBe(false);
      expect(await ledger.getSettledStatus(HASH)).toBe("success");

      await ledger.resetStages(HASH);
      expect(await ledger.getSettledStatus(HASH)).toBeNull();
      expect(await ledger.getStageResults(HASH)).toEqual({});
    });
  });
});
