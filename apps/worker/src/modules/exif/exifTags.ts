import exifReader from "exif-reader";

import { type ExifMap, JobError, toExifMap } from "@imgpipe/shared";

/** IFDs whose tags are lifted to the top level; GPS keeps its own group. */
const FLAT_GROUPS = ["Image", "Photo", "Iop"];

function asRecord(v: unknown): Record<string, unknown> | null {
  if (!v || typeof v !== "object" || Array.isArray(v) || Buffer.isBuffer(v)) return null;
  return Object.fromEntries(Object.entries(v));
}

export function extractExifMap(exif: Buffer): ExifMap {
  let parsed: Record<string, unknown> | null;
  try {
    parsed = asRecord(exifReader(exif));
  } catch (err) {
    throw new JobError({
      code: "EXIF_UNREADABLE",
      message: `EXIF block could not be parsed: ${err instanceof Error ? err.message : String(err)}`,
      retryable: false,
      cause: err,
    });
  }
  if (!parsed) return {};

  const tags: Record<string, unknown> = {};
  for (const group of FLAT_GROUPS) {
    Object.assign(tags, asRecord(parsed[group]) ?? {});
  }
  const gps = asRecord(parsed.GPSInfo);
  if (gps) tags.GPSInfo = gps;

  return toExifMap(tags);
}
