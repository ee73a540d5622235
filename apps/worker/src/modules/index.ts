import type { StageName } from "@imgpipe/shared";

import type { ModuleDeps, ProcessingModule } from "../types/processing";
import { createCaptionModule } from "./caption/caption.module";
import { createExifModule } from "./exif/exif.module";
import { createThumbnailModule } from "./thumbnail/thumbnail.module";

export type ModuleRegistry = Record<StageName, ProcessingModule>;

export function createModules(deps: ModuleDeps): ModuleRegistry {
  return {
    thumbnail: createThumbnailModule(deps),
    exif: createExifModule(deps),
    caption: createCaptionModule(deps),
  };
}

export function resolveModule(modules: ModuleRegistry, name: string): ProcessingModule | null {
  const key = name.trim();
  return key === "thumbnail" || key === "exif" || key === "caption" ? modules[key] : null;
}
