import sharp from "sharp";

import type { ModuleDeps, ProcessingInput, ProcessingModule } from "../../types/processing";

const MAX_EDGE = 1024;

export function createCaptionModule(deps: Pick<ModuleDeps, "store" | "ledger" | "captions" | "log">): ProcessingModule {
  return {
    type: "caption",

    async run(input: ProcessingInput) {
      const original = await deps.store.read(input.storedPath);
      const prepared = await sharp(original)
        .resize(MAX_EDGE, MAX_EDGE, { fit: "inside", withoutEnlargement: true })
        .flatten({ background: "#ffffff" })
        .jpeg({ quality: 90 })
        .toBuffer();

      const model = await deps.captions.acquire();
      const caption = (await model.caption(prepared, "image/jpeg")).trim();

      await deps.ledger.updateContentField(input.sha256, "caption", caption);
      deps.log.info({ sha256: input.sha256, caption }, "caption_made");

      return { ok: true, stage: "caption", wrote: ["caption"], meta: { caption } };
    },
  };
}
