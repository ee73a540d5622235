import { z } from "zod";

const flag = z
  .enum(["true", "false", "1", "0", ""])
  .default("false")
  .transform((v) => v === "true" || v === "1");

const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : undefined));

const EnvSchema = z
  .object({
    REDIS_URL: z.string().trim().min(1).default("redis://127.0.0.1:6379"),
    REDIS_TLS: flag,
    QUEUE_NAME: z.string().trim().min(1).default("image-jobs"),

    STORAGE_DRIVER: z.enum(["local", "s3"]).default("local"),
    MEDIA_DIR: z.string().trim().min(1).default("media"),
    R2_ACCOUNT_ID: optionalText,
    R2_ACCESS_KEY_ID: optionalText,
    R2_SECRET_ACCESS_KEY: optionalText,
    R2_BUCKET: optionalText,

    MAX_PIXELS: z.coerce.number().int().positive().default(50_000_000),
    MAX_UPLOAD_BYTES: z.coerce.number().int().positive().default(100 * 1024 * 1024),

    JOB_ATTEMPTS: z.coerce.number().int().min(1).default(3),
    JOB_BACKOFF_MS: z.coerce.number().int().min(0).default(2000),
    WORKER_CONCURRENCY: z.coerce.number().int().min(1).default(4),

    CAPTION_API_URL: z.string().trim().url().default("http://127.0.0.1:8080/caption"),
    CAPTION_API_TOKEN: optionalText,
    CAPTION_HEALTH_URL: z.string().trim().url().optional(),
    CAPTION_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),

    HOST: z.string().trim().min(1).default("127.0.0.1"),
    PORT: z.coerce.number().int().min(0).max(65535).default(3000),
    PUBLIC_BASE_URL: z.string().trim().url().optional(),
    LOG_LEVEL: z
      .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
      .default("info"),
  })
  .superRefine((env, ctx) => {
    if (env.STORAGE_DRIVER !== "s3") return;
    for (const key of ["R2_ACCOUNT_ID", "R2_ACCESS_KEY_ID", "R2_SECRET_ACCESS_KEY", "R2_BUCKET"] as const) {
      if (!env[key]) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: "required when STORAGE_DRIVER=s3",
        });
      }
    }
  });

export type R2Config = {
  accountId: string;
  accessKeyId: string;
  secretAccessKey: string;
  bucket: string;
};

export type AppConfig = {
  redis: { url: string; tls: boolean };
  queueName: string;
  storage: { driver: "local"; mediaDir: string } | { driver: "s3"; r2: R2Config };
  limits: { maxPixels: number; maxUploadBytes: number };
  jobs: { attempts: number; backoffMs: number; concurrency: number };
  caption: { url: string; token?: string; healthUrl?: string; timeoutMs: number };
  http: { host: string; port: number; publicBaseUrl?: string };
  logLevel: z.infer<typeof EnvSchema>["LOG_LEVEL"];
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const lines = parsed.error.issues.map((i) => `${i.path.join(".") || "env"}: ${i.message}`);
    throw new ConfigError(`Invalid environment:\n${lines.join("\n")}`);
  }
  const e = parsed.data;

  let storage: AppConfig["storage"] = { driver: "local", mediaDir: e.MEDIA_DIR };
  if (e.STORAGE_DRIVER === "s3" && e.R2_ACCOUNT_ID && e.R2_ACCESS_KEY_ID && e.R2_SECRET_ACCESS_KEY && e.R2_BUCKET) {
    storage = {
      driver: "s3",
      r2: {
        accountId: e.R2_ACCOUNT_ID,
        accessKeyId: e.R2_ACCESS_KEY_ID,
        secretAccessKey: e.R2_SECRET_ACCESS_KEY,
        bucket: e.R2_BUCKET,
      },
    };
  }

  return {
    redis: { url: e.REDIS_URL, tls: e.REDIS_TLS },
    queueName: e.QUEUE_NAME,
    storage,
    limits: { maxPixels: e.MAX_PIXELS, maxUploadBytes: e.MAX_UPLOAD_BYTES },
    jobs: { attempts: e.JOB_ATTEMPTS, backoffMs: e.JOB_BACKOFF_MS, concurrency: e.WORKER_CONCURRENCY },
    caption: {
      url: e.CAPTION_API_URL,
      token: e.CAPTION_API_TOKEN,
      healthUrl: e.CAPTION_HEALTH_URL,
      timeoutMs: e.CAPTION_TIMEOUT_MS,
    },
    http: { host: e.HOST, port: e.PORT, publicBaseUrl: e.PUBLIC_BASE_URL },
    logLevel: e.LOG_LEVEL,
  };
}
