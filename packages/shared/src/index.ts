export * from "./types";
export * from "./config";
export * from "./logger";
export * from "./redis";
export * from "./errors/appError";
export * from "./exif";
export * from "./stats";
export * from "./settlement";

export * from "./validator/validator";
export * from "./validator/imageDecoder";
export { extensionOf, matchesSignature, ALLOWED_EXTENSIONS, ALLOWED_MIME_TYPES } from "./validator/signatures";

export * from "./store";

export { Ledger } from "./ledger/ledger";
export type { GetOrCreateResult, StageResults } from "./ledger/ledger";

export * from "./orchestrator/jobQueue";
export * from "./orchestrator/orchestrator";
