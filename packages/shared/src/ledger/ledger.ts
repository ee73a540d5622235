import type { Redis } from "ioredis";

import type {
  ContentDescriptor,
  ContentField,
  ContentRecord,
  ProcessingOutcome,
  StageName,
  StageStatus,
  UploadAttempt,
} from "../types";
import { keys } from "./keys";
import {
  ContentFieldsSchema,
  OutcomeHashSchema,
  SettledSchema,
  StagesSchema,
  StoredContentSchema,
  UploadHashSchema,
} from "./schemas";

export type StageResults = Partial<Record<StageName, StageStatus>>;

export type GetOrCreateResult = {
  record: ContentRecord;
  wasNew: boolean;
};

/** Redis hashes cannot hold null; absent fields read back as null. */
function compact(obj: Record<string, string | number | null>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(obj)) {
    if (v !== null) out[k] = String(v);
  }
  return out;
}

function isEmpty(obj: Record<string, string>): boolean {
  return Object.keys(obj).length === 0;
}

/**
 * Durable record of content (keyed by sha256), upload attempts and their
 * processing outcomes.
 *
 * The content row is written with `SET NX`, so "check existence, then
 * insert" is a single linearizable step per hash.
 */
export class Ledger {
  constructor(private readonly redis: Redis) {}

  // ---------- content ----------

  async getOrCreateContentRecord(
    sha256: string,
    descriptor: ContentDescriptor,
    now: Date = new Date(),
  ): Promise<GetOrCreateResult> {
    const stored = { sha256, ...descriptor, firstSeenAt: now.toISOString() };

    const res = await this.redis.set(keys.content(sha256), JSON.stringify(stored), "NX");
    if (res === "OK") {
      return { record: { ...stored, exif: null, caption: null }, wasNew: true };
    }

    const existing = await this.getContentRecord(sha256);
    if (!existing) {
      throw new Error(`Content record ${sha256} vanished after insert conflict`);
    }
    return { record: existing, wasNew: false };
  }

  async getContentRecord(sha256: string): Promise<ContentRecord | null> {
    const [raw, fields] = await Promise.all([
      this.redis.get(keys.content(sha256)),
      this.redis.hgetall(keys.contentFields(sha256)),
    ]);
    if (raw === null) return null;

    const stored = StoredContentSchema.parse(JSON.parse(raw));
    const derived = ContentFieldsSchema.parse(fields);
    return { ...stored, ...derived };
  }

  /** Returns false when no content record exists for the hash. */
  async updateContentField(sha256: string, field: ContentField, value: string): Promise<boolean> {
    const exists = await this.redis.exists(keys.content(sha256));
    if (!exists) return false;
    await this.redis.hset(keys.contentFields(sha256), field, value);
    return true;
  }

  // ---------- upload attempts & outcomes ----------

  /**
   * Accepted upload: writes the attempt, its pending outcome and, when it
   * references content, its place in that content's waiting set, in one
   * transaction.
   */
  async recordUploadAttempt(attempt: UploadAttempt, startedAt: Date = new Date()): Promise<void> {
    const tx = this.redis
      .multi()
      .hset(keys.upload(attempt.imageId), compact(attempt))
      .zadd(keys.uploads(), startedAt.getTime(), attempt.imageId)
      .hset(keys.outcome(attempt.imageId), {
        imageId: attempt.imageId,
        startedAt: startedAt.toISOString(),
      })
      .sadd(keys.outcomes(), attempt.imageId);

    if (attempt.contentHash) {
      tx.sadd(keys.waiting(attempt.contentHash), attempt.imageId);
    }
    await tx.exec();
  }

  /** Rejected upload: attempt plus an already-terminal failed outcome. */
  async recordFailedAttempt(attempt: UploadAttempt, at: Date = new Date()): Promise<void> {
    const ts = at.toISOString();
    await this.redis
      .multi()
      .hset(keys.upload(attempt.imageId), compact(attempt))
      .zadd(keys.uploads(), at.getTime(), attempt.imageId)
      .hset(keys.outcome(attempt.imageId), {
        imageId: attempt.imageId,
        startedAt: ts,
        endedAt: ts,
        status: "failed",
      })
      .sadd(keys.outcomes(), attempt.imageId)
      .exec();
  }

  /**
   * Terminal transition. `endedAt`, `status` and the attempt's `settledAt`
   * are each HSETNX'd in one transaction: the first caller writes all three,
   * later calls change nothing and return false. A transaction that fails
   * leaves the outcome pending, so the call can simply be repeated.
   */
  async recordOutcome(imageId: string, status: StageStatus, at: Date = new Date()): Promise<boolean> {
    const key = keys.outcome(imageId);
    if (!(await this.redis.exists(key))) return false;

    const ts = at.toISOString();
    const res = await this.redis
      .multi()
      .hsetnx(key, "endedAt", ts)
      .hsetnx(key, "status", status)
      .hsetnx(keys.upload(imageId), "settledAt", ts)
      .exec();

    const claim = res?.[0];
    if (!claim || claim[0]) {
      throw new Error(`Failed to record outcome for ${imageId}`, { cause: claim?.[0] });
    }
    return claim[1] === 1;
  }

  async getUploadAttempt(imageId: string): Promise<UploadAttempt | null> {
    const raw = await this.redis.hgetall(keys.upload(imageId));
    return isEmpty(raw) ? null : UploadHashSchema.parse(raw);
  }

  /** Newest first. */
  async listUploadAttempts(): Promise<UploadAttempt[]> {
    const ids = await this.redis.zrevrange(keys.uploads(), 0, -1);
    const rows = await Promise.all(ids.map((id) => this.getUploadAttempt(id)));
    return rows.filter((r): r is UploadAttempt => r !== null);
  }

  async getOutcome(imageId: string): Promise<ProcessingOutcome | null> {
    const raw = await this.redis.hgetall(keys.outcome(imageId));
    return isEmpty(raw) ? null : OutcomeHashSchema.parse(raw);
  }

  async listOutcomes(): Promise<ProcessingOutcome[]> {
    const ids = await this.redis.smembers(keys.outcomes());
    const rows = await Promise.all(ids.map((id) => this.getOutcome(id)));
    return rows.filter((r): r is ProcessingOutcome => r !== null);
  }

  // ---------- stage bookkeeping ----------

  /** Writes one stage result and reads back every result recorded so far. */
  async recordStageResult(sha256: string, stage: StageName, status: StageStatus): Promise<StageResults> {
    const key = keys.stages(sha256);
    const res = await this.redis.multi().hset(key, stage, status).hgetall(key).exec();
    const readBack = res?.[1];
    if (!readBack || readBack[0]) {
      throw new Error(`Failed to record stage ${stage} for ${sha256}`, { cause: readBack?.[0] });
    }
    return StagesSchema.parse(readBack[1]);
  }

  async getStageResults(sha256: string): Promise<StageResults> {
    return StagesSchema.parse(await this.redis.hgetall(keys.stages(sha256)));
  }

  /** First verdict wins; returns whether this call set it. */
  async markSettled(sha256: string, status: StageStatus): Promise<boolean> {
    const res = await this.redis.set(keys.settled(sha256), status, "NX");
    return res === "OK";
  }

  async getSettledStatus(sha256: string): Promise<StageStatus | null> {
    const raw = await this.redis.get(keys.settled(sha256));
    return raw === null ? null : SettledSchema.parse(raw);
  }

  async resetStages(sha256: string): Promise<void> {
    await this.redis.del(keys.stages(sha256), keys.settled(sha256));
  }

  async addWaitingAttempt(sha256: string, imageId: string): Promise<void> {
    await this.redis.sadd(keys.waiting(sha256), imageId);
  }

  async listWaitingAttempts(sha256: string): Promise<string[]> {
    return this.redis.smembers(keys.waiting(sha256));
  }

  async removeWaitingAttempt(sha256: string, imageId: string): Promise<void> {
    await this.redis.srem(keys.waiting(sha256), imageId);
  }
}
