import sharp from "sharp";

import type { ContentDescriptor, Ledger, UploadAttempt } from "@imgpipe/shared";

import type { CaptionModel } from "../src/caption/captionModel";

export const HASH = "c".repeat(64);

export function makePng(width: number, height: number): Promise<Buffer> {
  return sharp({ create: { width, height, channels: 3, background: { r: 20, g: 120, b: 200 } } })
    .png()
    .toBuffer();
}

export const descriptor: ContentDescriptor = {
  width: 10,
  height: 10,
  format: "png",
  mimeType: "image/png",
  sizeBytes: 100,
};

export function accepted(imageId: string, storedPath = `originals/${imageId}.png`): UploadAttempt {
  return {
    imageId,
    originalName: `${imageId}.png`,
    processedAt: "2026-01-01T00:00:00.000Z",
    contentHash: HASH,
    storedPath,
    error: null,
  };
}

/** Content row plus one attempt waiting on it. */
export async function seed(ledger: Ledger, imageId = "img-1"): Promise<void> {
  await ledger.getOrCreateContentRecord(HASH, descriptor);
  await ledger.recordUploadAttempt(accepted(imageId));
}

export class StubCaptionModel implements CaptionModel {
  warmups = 0;
  closed = false;
  seen: string[] = [];

  constructor(private readonly text: string) {}

  async caption(_image: Buffer, mimeType: string): Promise<string> {
    this.seen.push(mimeType);
    return this.text;
  }

  async warmup(): Promise<void> {
    this.warmups += 1;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
