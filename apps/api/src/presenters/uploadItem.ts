import {
  type ExifMap,
  type ImageFormat,
  type OutcomeStatus,
  type ThumbnailSize,
  parseExif,
} from "@imgpipe/shared";

import type { ProcessingDisposition, UploadView } from "../services/ingestion";

export type ImageMetadata = {
  width: number;
  height: number;
  format: ImageFormat;
  sizeBytes: number;
  sha256: string;
  firstUpload: string;
  exif: ExifMap | null;
  caption: string | null;
};

type Empty = Record<string, never>;

export type UploadItem = {
  status: "success" | "failed";
  data: {
    imageId: string;
    originalName: string;
    processedAt: string;
    outcome: OutcomeStatus;
    metadata: ImageMetadata | Empty;
    thumbnails: Record<ThumbnailSize, string> | Empty;
    processing?: ProcessingDisposition;
  };
  error: string | null;
};

export function thumbnailLinks(baseUrl: string, imageId: string): Record<ThumbnailSize, string> {
  const base = baseUrl.replace(/\/+$/, "");
  const link = (size: ThumbnailSize) => `${base}/api/images/${imageId}/thumbnails/${size}`;
  return { small: link("small"), medium: link("medium") };
}

export function presentUpload(view: UploadView, baseUrl: string): UploadItem {
  const { attempt, content, outcome } = view;
  const base = {
    imageId: attempt.imageId,
    originalName: attempt.originalName,
    processedAt: attempt.processedAt,
    outcome: outcome?.status ?? (attempt.error ? "failed" : "pending"),
    ...(view.processing ? { processing: view.processing } : {}),
  } satisfies Partial<UploadItem["data"]>;

  if (!content || attempt.error) {
    return {
      status: "failed",
      data: { ...base, metadata: {}, thumbnails: {} },
      error: attempt.error ?? "unknown error",
    };
  }

  return {
    status: "success",
    data: {
      ...base,
      metadata: {
        width: content.width,
        height: content.height,
        format: content.format,
        sizeBytes: content.sizeBytes,
        sha256: content.sha256,
        firstUpload: content.firstSeenAt,
        exif: content.exif === null ? null : parseExif(content.exif),
        caption: content.caption,
      },
      thumbnails: thumbnailLinks(baseUrl, attempt.imageId),
    },
    error: null,
  };
}
