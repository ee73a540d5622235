import sharp from "sharp";

import { type ExifMap, serializeExif } from "@imgpipe/shared";

import type { ModuleDeps, ProcessingInput, ProcessingModule } from "../../types/processing";
import { extractExifMap } from "./exifTags";

export function createExifModule(deps: Pick<ModuleDeps, "store" | "ledger" | "log">): ProcessingModule {
  return {
    type: "exif",

    async run(input: ProcessingInput) {
      deps.log.info({ sha256: input.sha256, storedPath: input.storedPath }, "exif_job_start");

      const original = await deps.store.read(input.storedPath);
      const meta = await sharp(original).metadata();
      const tags: ExifMap = meta.exif ? extractExifMap(meta.exif) : {};
      const payload = serializeExif(tags);

      const updated = await deps.ledger.updateContentField(input.sha256, "exif", payload);
      deps.log.info(
        { sha256: input.sha256, tagCount: Object.keys(tags).length, updated },
        "exif_db_updated",
      );

      return {
        ok: true,
        stage: "exif",
        wrote: ["exif"],
        meta: { tagCount: String(Object.keys(tags).length) },
      };
    },
  };
}
