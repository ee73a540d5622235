export type AppErrorShape = {
  code: string;
  message: string;
  retryable: boolean;
  details?: Record<string, unknown>;
  cause?: unknown;
};

export class AppError extends Error {
  code: string;
  retryable: boolean;
  details?: Record<string, unknown>;

  constructor(opts: AppErrorShape) {
    super(opts.message);
    this.name = "AppError";
    this.code = opts.code;
    this.retryable = opts.retryable;
    this.details = opts.details;
    this.cause = opts.cause;
  }

  toJSON() {
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      details: this.details,
    };
  }
}

export type ValidationCode =
  | "BAD_EXTENSION"
  | "BAD_MIME_TYPE"
  | "EMPTY_UPLOAD"
  | "UPLOAD_TOO_LARGE"
  | "SIGNATURE_MISMATCH"
  | "CORRUPT_IMAGE"
  | "OVERSIZED_IMAGE";

export class ValidationError extends AppError {
  declare code: ValidationCode;

  constructor(code: ValidationCode, message: string, cause?: unknown) {
    super({ code, message, retryable: false, cause });
    this.name = "ValidationError";
  }
}

export class StorageError extends AppError {
  constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
    super({ code: "STORAGE_FAILED", message, retryable: false, details, cause });
    this.name = "StorageError";
  }
}

export class EnqueueError extends AppError {
  constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
    super({ code: "ENQUEUE_FAILED", message, retryable: true, details, cause });
    this.name = "EnqueueError";
  }
}

export class JobError extends AppError {
  constructor(opts: AppErrorShape) {
    super(opts);
    this.name = "JobError";
  }
}

export function isAppError(err: unknown): err is AppError {
  return err instanceof AppError;
}

function errorCode(err: unknown): string | undefined {
  if (err && typeof err === "object" && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function toAppError(err: unknown, fallbackCode = "PROCESSING_FAILED"): AppError {
  if (isAppError(err)) return err;

  const msg = errorMessage(err);
  const msgLower = msg.toLowerCase();
  const details = err instanceof Error && err.stack ? { stack: err.stack } : undefined;

  if (msgLower.includes("timed out") || msgLower.includes("timeout")) {
    return new AppError({ code: "TIMED_OUT", message: msg, retryable: true, details, cause: err });
  }

  const code = errorCode(err);
  const retryable =
    code === "ECONNRESET" ||
    code === "ECONNREFUSED" ||
    code === "ETIMEDOUT" ||
    code === "ENOTFOUND" ||
    msgLower.includes("too many requests") ||
    msg.includes("429");

  return new AppError({
    code: retryable ? "RETRYABLE" : fallbackCode,
    message: msg,
    retryable,
    details,
    cause: err,
  });
}
