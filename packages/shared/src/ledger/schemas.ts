import { z } from "zod";

import type { StageName, StageStatus } from "../types";

const nullable = z
  .string()
  .optional()
  .transform((v) => (v === undefined || v === "" ? null : v));

export const StoredContentSchema = z.object({
  sha256: z.string(),
  width: z.number().int().min(0),
  height: z.number().int().min(0),
  format: z.enum(["jpeg", "png", ""]),
  mimeType: z.string(),
  sizeBytes: z.number().int().min(0),
  firstSeenAt: z.string(),
});

export const ContentFieldsSchema = z.object({
  exif: nullable,
  caption: nullable,
});

/** `settledAt` is written with the terminal outcome and replaces `processedAt`. */
export const UploadHashSchema = z
  .object({
    imageId: z.string(),
    originalName: z.string(),
    processedAt: z.string(),
    settledAt: z.string().optional(),
    contentHash: nullable,
    storedPath: nullable,
    error: nullable,
  })
  .transform(({ settledAt, ...attempt }) => ({ ...attempt, processedAt: settledAt ?? attempt.processedAt }));

export const OutcomeHashSchema = z.object({
  imageId: z.string(),
  startedAt: z.string(),
  endedAt: nullable,
  // absent until the terminal transition
  status: z.enum(["pending", "success", "failed"]).default("pending"),
});

const stageStatus = z.enum(["success", "failed"]);

export const StagesSchema = z.object({
  thumbnail: stageStatus.optional(),
  exif: stageStatus.optional(),
  caption: stageStatus.optional(),
}) satisfies z.ZodType<Partial<Record<StageName, StageStatus>>>;

export const SettledSchema = stageStatus;
