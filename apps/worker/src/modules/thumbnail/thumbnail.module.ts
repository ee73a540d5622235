import sharp from "sharp";

import { THUMBNAIL_SIZES, type ThumbnailSize, thumbnailKey } from "@imgpipe/shared";

import type { ModuleDeps, ProcessingInput, ProcessingModule } from "../../types/processing";

const SIZES: ThumbnailSize[] = ["small", "medium"];

export async function renderThumbnail(original: Buffer, bound: number): Promise<Buffer> {
  return sharp(original)
    .resize(bound, bound, { fit: "inside", withoutEnlargement: true })
    .flatten({ background: "#ffffff" })
    .jpeg({ quality: 85, mozjpeg: true })
    .toBuffer();
}

export function createThumbnailModule(deps: Pick<ModuleDeps, "store" | "log">): ProcessingModule {
  return {
    type: "thumbnail",

    async run(input: ProcessingInput) {
      const original = await deps.store.read(input.storedPath);

      const wrote: string[] = [];
      for (const size of SIZES) {
        const jpeg = await renderThumbnail(original, THUMBNAIL_SIZES[size]);
        wrote.push(await deps.store.put(thumbnailKey(input.sha256, size), jpeg, "image/jpeg"));
      }

      deps.log.info({ sha256: input.sha256, wrote }, "thumbnail_made");
      return { ok: true, stage: "thumbnail", wrote };
    },
  };
}
