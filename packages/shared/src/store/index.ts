import type { AppConfig } from "../config";
import type { ContentStore } from "./contentStore";
import { LocalContentStore } from "./localContentStore";
import { S3ContentStore, createR2Client } from "./s3ContentStore";

export * from "./contentStore";
export { LocalContentStore } from "./localContentStore";
export { S3ContentStore, createR2Client } from "./s3ContentStore";

export function createContentStore(cfg: AppConfig["storage"]): ContentStore {
  if (cfg.driver === "s3") {
    return new S3ContentStore(createR2Client(cfg.r2), cfg.r2.bucket);
  }
  return new LocalContentStore(cfg.mediaDir);
}
