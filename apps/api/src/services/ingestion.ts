import { randomUUID } from "node:crypto";

import {
  type ContentRecord,
  type ContentStore,
  type ImageDecoder,
  type JobHandle,
  type JobOrchestrator,
  type Ledger,
  type Logger,
  type ProcessingOutcome,
  type RawUpload,
  type UploadAttempt,
  type ValidatedUpload,
  StorageError,
  ValidationError,
  isOversized,
  settleWaitingAttempts,
  validateUpload,
} from "@imgpipe/shared";

export type ProcessingDisposition = "queued" | "duplicate" | "enqueue_failed";

export type UploadView = {
  attempt: UploadAttempt;
  content: ContentRecord | null;
  outcome: ProcessingOutcome | null;
  processing?: ProcessingDisposition;
  jobs?: JobHandle[];
};

export type IngestionDeps = {
  ledger: Ledger;
  store: ContentStore;
  orchestrator: JobOrchestrator;
  decoder: ImageDecoder;
  limits: { maxPixels: number; maxUploadBytes: number };
  log: Logger;
  now?: () => Date;
};

export function newImageId(): string {
  return randomUUID().replace(/-/g, "");
}

/**
 * upload -> validate -> store -> dedup -> record attempt -> enqueue (new
 * content only). Every call leaves exactly one UploadAttempt behind.
 */
export class IngestionService {
  private readonly now: () => Date;

  constructor(private readonly deps: IngestionDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  async ingest(upload: RawUpload): Promise<UploadView> {
    const imageId = newImageId();
    const at = this.now();

    let v: ValidatedUpload;
    try {
      v = await validateUpload(upload, {
        decoder: this.deps.decoder,
        maxPixels: this.deps.limits.maxPixels,
        maxBytes: this.deps.limits.maxUploadBytes,
      });
    } catch (err) {
      if (err instanceof ValidationError) return this.rejectAs(imageId, upload.filename, err, at);
      throw err;
    }

    if (isOversized(v)) {
      const err = new ValidationError("OVERSIZED_IMAGE", "Image exceeds pixel limit");
      return this.rejectAs(imageId, upload.filename, err, at);
    }

    const storedPath = await this.storeOriginal(imageId, upload.filename, v, at);
    const sha256 = v.contentHash;

    const { record, wasNew } = await this.deps.ledger.getOrCreateContentRecord(
      sha256,
      {
        width: v.width,
        height: v.height,
        format: v.format,
        mimeType: v.mimeType,
        sizeBytes: v.bytes.length,
      },
      at,
    );

    const attempt: UploadAttempt = {
      imageId,
      originalName: upload.filename,
      processedAt: at.toISOString(),
      contentHash: sha256,
      storedPath,
      error: null,
    };
    await this.deps.ledger.recordUploadAttempt(attempt, at);

    let processing: ProcessingDisposition = "duplicate";
    let jobs: JobHandle[] = [];

    if (wasNew) {
      const res = await this.deps.orchestrator.onNewContent(sha256, storedPath);
      if (res.ok) {
        processing = "queued";
        jobs = res.value;
      } else {
        // content stays recorded; POST /reprocess recovers it
        this.deps.log.error({ sha256, imageId, err: res.error }, "enqueue_failed");
        processing = "enqueue_failed";
      }
    } else {
      this.deps.log.info({ sha256, imageId }, "duplicate_upload");
      await settleWaitingAttempts(this.deps.ledger, sha256, this.deps.log);
    }

    return {
      attempt,
      content: record,
      outcome: await this.deps.ledger.getOutcome(imageId),
      processing,
      jobs,
    };
  }

  /** Records a rejection that happened before the bytes reached the validator. */
  reject(filename: string, err: ValidationError): Promise<UploadView> {
    return this.rejectAs(newImageId(), filename, err, this.now());
  }

  private async rejectAs(imageId: string, filename: string, err: ValidationError, at: Date): Promise<UploadView> {
    const attempt: UploadAttempt = {
      imageId,
      originalName: filename,
      processedAt: at.toISOString(),
      contentHash: null,
      storedPath: null,
      error: err.message,
    };
    await this.deps.ledger.recordFailedAttempt(attempt, at);
    this.deps.log.info({ imageId, filename, code: err.code }, "upload_rejected");

    return { attempt, content: null, outcome: await this.deps.ledger.getOutcome(imageId) };
  }

  private async storeOriginal(imageId: string, filename: string, v: ValidatedUpload, at: Date): Promise<string> {
    try {
      return await this.deps.store.store(v.bytes, filename);
    } catch (err) {
      const storageErr =
        err instanceof StorageError ? err : new StorageError("Failed to save image", { imageId }, err);

      await this.deps.ledger.recordFailedAttempt(
        {
          imageId,
          originalName: filename,
          processedAt: at.toISOString(),
          contentHash: null,
          storedPath: null,
          error: storageErr.message,
        },
        at,
      );
      this.deps.log.error({ imageId, err: storageErr }, "store_failed");
      throw storageErr;
    }
  }
}
