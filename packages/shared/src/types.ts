export const PIPELINE_STAGES = ["thumbnail", "exif", "caption"] as const;

export type StageName = (typeof PIPELINE_STAGES)[number];

export type StageStatus = "success" | "failed";

export type OutcomeStatus = "pending" | StageStatus;

export const THUMBNAIL_SIZES = {
  small: 256,
  medium: 768,
} as const;

export type ThumbnailSize = keyof typeof THUMBNAIL_SIZES;

export type ImageFormat = "jpeg" | "png" | "";

export type ContentDescriptor = {
  width: number;
  height: number;
  format: ImageFormat;
  mimeType: string;
  sizeBytes: number;
};

export type ContentRecord = ContentDescriptor & {
  sha256: string;
  firstSeenAt: string;
  /** serialized ExifMap, written by the exif job */
  exif: string | null;
  caption: string | null;
};

export type ContentField = "exif" | "caption";

export type UploadAttempt = {
  imageId: string;
  originalName: string;
  processedAt: string;
  contentHash: string | null;
  storedPath: string | null;
  error: string | null;
};

export type ProcessingOutcome = {
  imageId: string;
  startedAt: string;
  endedAt: string | null;
  status: OutcomeStatus;
};

export type ImageJobData = {
  sha256: string;
  storedPath: string;
};

export type JobHandle = {
  jobId: string;
  name: StageName;
};

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export type Stats = {
  total: number;
  failed: number;
  successRate: string;
  avgProcessingSeconds: number;
};
