import { randomUUID } from "node:crypto";
import type { Readable } from "node:stream";

import type { ThumbnailSize } from "../types";

export interface ContentStore {
  /** Stores an original under a fresh id; returns its path. */
  store(bytes: Buffer, suggestedName: string): Promise<string>;
  /** Writes a derived artifact under a caller-chosen key. */
  put(key: string, bytes: Buffer, contentType: string): Promise<string>;
  read(path: string): Promise<Buffer>;
  exists(path: string): Promise<boolean>;
  open(path: string): Promise<Readable>;
  /** Direct time-limited link, or null when the backend cannot issue one. */
  signedUrl(path: string, expiresInSec: number): Promise<string | null>;
}

export function originalKey(suggestedName: string): string {
  const base = suggestedName.split(/[\\/]/).pop() ?? "";
  const dot = base.lastIndexOf(".");
  const ext = dot > 0 ? base.slice(dot).toLowerCase() : "";
  return `originals/${randomUUID().replace(/-/g, "")}${ext}`;
}

export function thumbnailKey(sha256: string, size: ThumbnailSize): string {
  return `thumbnails/${size}/${sha256}.jpeg`;
}
