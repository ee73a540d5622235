import { Readable } from "node:stream";

import {
  GetObjectCommand,
  HeadObjectCommand,
  PutObjectCommand,
  S3Client,
} from "@aws-sdk/client-s3";
import { getSignedUrl } from "@aws-sdk/s3-request-presigner";

import type { R2Config } from "../config";
import { StorageError } from "../errors/appError";
import { type ContentStore, originalKey } from "./contentStore";

export function createR2Client(r2: R2Config): S3Client {
  return new S3Client({
    region: "auto",
    endpoint: `https://${r2.accountId}.r2.cloudflarestorage.com`,
    credentials: {
      accessKeyId: r2.accessKeyId,
      secretAccessKey: r2.secretAccessKey,
    },
    forcePathStyle: true,
    requestChecksumCalculation: "WHEN_REQUIRED",
    responseChecksumValidation: "WHEN_REQUIRED",
  });
}

function isNotFound(err: unknown): boolean {
  if (!err || typeof err !== "object") return false;
  const name = "name" in err ? err.name : undefined;
  const status =
    "$metadata" in err && err.$metadata && typeof err.$metadata === "object" && "httpStatusCode" in err.$metadata
      ? err.$metadata.httpStatusCode
      : undefined;
  return name === "NotFound" || name === "NoSuchKey" || status === 404;
}

/** S3-compatible bucket store (Cloudflare R2 in production). */
export class S3ContentStore implements ContentStore {
  constructor(
    private readonly s3: S3Client,
    private readonly bucket: string,
  ) {}

  store(bytes: Buffer, suggestedName: string): Promise<string> {
    return this.put(originalKey(suggestedName), bytes, "application/octet-stream");
  }

  async put(key: string, bytes: Buffer, contentType: string): Promise<string> {
    try {
      await this.s3.send(
        new PutObjectCommand({ Bucket: this.bucket, Key: key, Body: bytes, ContentType: contentType }),
      );
      return key;
    } catch (err) {
      // PutObject is all-or-nothing, there is no partial object to remove
      throw new StorageError("Failed to save image", { key, bucket: this.bucket }, err);
    }
  }

  async read(key: string): Promise<Buffer> {
    const stream = await this.open(key);
    const chunks: Buffer[] = [];
    for await (const chunk of stream) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
    }
    return Buffer.concat(chunks);
  }

  async exists(key: string): Promise<boolean> {
    try {
      await this.s3.send(new HeadObjectCommand({ Bucket: this.bucket, Key: key }));
      return true;
    } catch (err) {
      if (isNotFound(err)) return false;
      throw new StorageError(`Failed to check ${key}`, { key, bucket: this.bucket }, err);
    }
  }

  async open(key: string): Promise<Readable> {
    let body: unknown;
    try {
      const resp = await this.s3.send(new GetObjectCommand({ Bucket: this.bucket, Key: key }));
      body = resp.Body;
    } catch (err) {
      throw new StorageError(`Failed to read ${key}`, { key, bucket: this.bucket }, err);
    }
    if (!(body instanceof Readable)) {
      throw new StorageError(`GetObject returned empty body for ${key}`, { key, bucket: this.bucket });
    }
    return body;
  }

  signedUrl(key: string, expiresInSec: number): Promise<string | null> {
    return getSignedUrl(this.s3, new GetObjectCommand({ Bucket: this.bucket, Key: key }), {
      expiresIn: expiresInSec,
    });
  }
}
