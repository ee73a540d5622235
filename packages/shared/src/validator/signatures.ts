export const ALLOWED_EXTENSIONS: ReadonlySet<string> = new Set([".jpg", ".jpeg", ".png"]);

export const ALLOWED_MIME_TYPES: ReadonlySet<string> = new Set(["image/jpeg", "image/png"]);

const SIGNATURES: Record<string, Uint8Array[]> = {
  "image/jpeg": [Uint8Array.of(0xff, 0xd8, 0xff)],
  "image/png": [Uint8Array.of(0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a)],
};

export function extensionOf(filename: string): string {
  const base = filename.split(/[\\/]/).pop() ?? "";
  const dot = base.lastIndexOf(".");
  // ".png" alone is a dotfile, not an extension
  if (dot <= 0) return "";
  return base.slice(dot).toLowerCase();
}

export function matchesSignature(mimeType: string, data: Uint8Array): boolean {
  const candidates = SIGNATURES[mimeType] ?? [];
  return candidates.some(
    (sig) => data.length >= sig.length && sig.every((b, i) => data[i] === b),
  );
}
