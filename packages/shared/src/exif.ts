import { z } from "zod";

export type ExifBytes = { $hex: string };

export type ExifValue = string | number | boolean | ExifBytes | ExifValue[] | ExifMap;

export type ExifMap = { [tag: string]: ExifValue };

const ExifValueSchema: z.ZodType<ExifValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.object({ $hex: z.string().regex(/^[0-9a-f]*$/) }).strict(),
    z.array(ExifValueSchema),
    z.record(ExifValueSchema),
  ]),
);

const ExifMapSchema = z.record(ExifValueSchema);

function isPlainObject(v: unknown): v is Record<string, unknown> {
  if (v === null || typeof v !== "object") return false;
  const proto = Object.getPrototypeOf(v);
  return proto === Object.prototype || proto === null;
}

/**
 * Maps whatever an EXIF parser hands back onto the closed ExifValue set.
 * Binary becomes `{ $hex }`, dates become ISO strings; null, undefined and
 * non-finite numbers are dropped.
 */
export function toExifValue(v: unknown): ExifValue | undefined {
  if (typeof v === "string" || typeof v === "boolean") return v;
  if (typeof v === "number") return Number.isFinite(v) ? v : undefined;
  if (typeof v === "bigint") return v.toString();
  if (v instanceof Date) return Number.isNaN(v.getTime()) ? undefined : v.toISOString();
  if (Buffer.isBuffer(v) || v instanceof Uint8Array) return { $hex: Buffer.from(v).toString("hex") };
  if (Array.isArray(v)) {
    return v.map(toExifValue).filter((x): x is ExifValue => x !== undefined);
  }
  if (isPlainObject(v)) return toExifMap(v);
  return undefined;
}

export function toExifMap(obj: Record<string, unknown>): ExifMap {
  const out: ExifMap = {};
  for (const [k, raw] of Object.entries(obj)) {
    const v = toExifValue(raw);
    if (v !== undefined) out[k] = v;
  }
  return out;
}

export function serializeExif(map: ExifMap): string {
  return JSON.stringify(map);
}

/** Unreadable payloads come back as `{ _raw: text }` rather than throwing. */
export function parseExif(text: string): ExifMap {
  try {
    const parsed = ExifMapSchema.safeParse(JSON.parse(text));
    if (parsed.success) return parsed.data;
  } catch {
    // fall through
  }
  return { _raw: text };
}
