import { createHash } from "node:crypto";

import { ValidationError } from "../errors/appError";
import type { ImageFormat } from "../types";
import type { ImageDecoder } from "./imageDecoder";
import {
  ALLOWED_EXTENSIONS,
  ALLOWED_MIME_TYPES,
  extensionOf,
  matchesSignature,
} from "./signatures";

export type RawUpload = {
  filename: string;
  contentType: string;
  bytes: Buffer;
};

export type ValidatedUpload = {
  extension: string;
  mimeType: string;
  bytes: Buffer;
  /** sha256 hex of the raw bytes */
  contentHash: string;
  /** 0 when the header exceeded the pixel ceiling */
  width: number;
  height: number;
  format: ImageFormat;
};

export type ValidatorOptions = {
  decoder: ImageDecoder;
  maxPixels: number;
  maxBytes: number;
};

export function sha256Hex(data: Buffer): string {
  return createHash("sha256").update(data).digest("hex");
}

export function isOversized(v: ValidatedUpload): boolean {
  return v.width === 0 || v.height === 0;
}

async function inspectImage(
  data: Buffer,
  decoder: ImageDecoder,
  maxPixels: number,
): Promise<{ width: number; height: number; format: ImageFormat }> {
  try {
    const dims = await decoder.decodeDimensionsOnly(data);
    if (dims.width * dims.height > maxPixels) {
      return { width: 0, height: 0, format: "" };
    }
    await decoder.decodeFull(data);
    return dims;
  } catch (err) {
    throw new ValidationError("CORRUPT_IMAGE", "Invalid or corrupted image", err);
  }
}

/** Extension and MIME checks; needs no bytes, so callers can run it before reading the body. */
export function checkDeclaredType(filename: string, contentType: string): { extension: string; mimeType: string } {
  const extension = extensionOf(filename);
  if (!ALLOWED_EXTENSIONS.has(extension)) {
    throw new ValidationError("BAD_EXTENSION", `Bad Extension ${extension || "none"}`);
  }

  const mimeType = contentType.trim().toLowerCase();
  if (!ALLOWED_MIME_TYPES.has(mimeType)) {
    throw new ValidationError("BAD_MIME_TYPE", `Bad MIME type: ${mimeType || "(none)"}`);
  }
  return { extension, mimeType };
}

/**
 * Checks run cheapest first and stop at the first failure; the decoder is
 * only reached once the declared type and the magic bytes agree.
 */
export async function validateUpload(
  upload: RawUpload,
  opts: ValidatorOptions,
): Promise<ValidatedUpload> {
  const { extension, mimeType } = checkDeclaredType(upload.filename, upload.contentType);

  const data = upload.bytes;
  if (data.length === 0) {
    throw new ValidationError("EMPTY_UPLOAD", "Empty upload");
  }
  if (data.length > opts.maxBytes) {
    throw new ValidationError("UPLOAD_TOO_LARGE", `Upload exceeds ${opts.maxBytes} bytes`);
  }

  if (!matchesSignature(mimeType, data)) {
    throw new ValidationError("SIGNATURE_MISMATCH", "File bytes do not match image type");
  }

  const { width, height, format } = await inspectImage(data, opts.decoder, opts.maxPixels);

  return {
    extension,
    mimeType,
    bytes: data,
    contentHash: sha256Hex(data),
    width,
    height,
    format,
  };
}
