import RedisMock from "ioredis-mock";
import pino from "pino";
import { beforeEach, describe, expect, it } from "vitest";

import { Ledger } from "../src/ledger/ledger";
import { completeStage, decideSettlement, settleWaitingAttempts } from "../src/settlement";
import type { UploadAttempt } from "../src/types";

const HASH = "b".repeat(64);
const log = pino({ level: "silent" });

function accepted(imageId: string): UploadAttempt {
  return {
    imageId,
    originalName: `${imageId}.png`,
    processedAt: "2026-01-01T00:00:00.000Z",
    contentHash: HASH,
    storedPath: `originals/${imageId}.png`,
    error: null,
  };
}

describe("decideSettlement", () => {
  it("waits for all three stages", () => {
    expect(decideSettlement({})).toBeNull();
    expect(decideSettlement({ thumbnail: "success", exif: "success" })).toBeNull();
  });

  it("is failed when any stage failed", () => {
    expect(decideSettlement({ thumbnail: "failed", exif: "success", caption: "success" })).toBe("failed");
  });

  it("is success when every stage succeeded", () => {
    expect(decideSettlement({ thumbnail: "success", exif: "success", caption: "success" })).toBe("success");
  });
});

describe("completeStage", () => {
  const redis = new RedisMock();
  let ledger: Ledger;

  beforeEach(async () => {
    await redis.flushall();
    ledger = new Ledger(redis);
    await ledger.recordUploadAttempt(accepted("first"));
    await ledger.recordUploadAttempt(accepted("dup"));
  });

  it("leaves outcomes pending until the last stage lands", async () => {
    expect(await completeStage(ledger, HASH, "caption", "success", log)).toBeNull();
    expect(await completeStage(ledger, HASH, "thumbnail", "success", log)).toBeNull();

    expect((await ledger.getOutcome("first"))?.status).toBe("pending");
  });

  it("settles every waiting attempt when all stages succeed", async () => {
    await completeStage(ledger, HASH, "thumbnail", "success", log);
    await completeStage(ledger, HASH, "exif", "success", log);
    const status = await completeStage(ledger, HASH, "caption", "success", log);

    expect(status).toBe("success");
    expect((await ledger.getOutcome("first"))?.status).toBe("success");
    expect((await ledger.getOutcome("dup"))?.status).toBe("success");
    expect(await ledger.listWaitingAttempts(HASH)).toEqual([]);
  });

  it("fails the outcome when an earlier stage failed", async () => {
    await completeStage(ledger, HASH, "thumbnail", "failed", log);
    await completeStage(ledger, HASH, "exif", "success", log);
    await completeStage(ledger, HASH, "caption", "success", log);

    expect((await ledger.getOutcome("first"))?.status).toBe("failed");
  });

  it("settles a duplicate that arrives after settlement", async () => {
    await completeStage(ledger, HASH, "thumbnail", "success", log);
    await completeStage(ledger, HASH, "exif", "success", log);
    await completeStage(ledger, HASH, "caption", "success", log);

    await ledger.recordUploadAttempt(accepted("late"));
    expect((await ledger.getOutcome("late"))?.status).toBe("pending");

    expect(await settleWaitingAttempts(ledger, HASH, log)).toBe("success");
    expect((await ledger.getOutcome("late"))?.status).toBe("success");
  });

  it("does nothing for an unsettled hash", async () => {
    expect(await settleWaitingAttempts(ledger, HASH, log)).toBeNull();
    expect(await ledger.listWaitingAttempts(HASH)).toHaveLength(2);
  });
});
