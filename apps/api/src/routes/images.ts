import type { FastifyInstance, FastifyRequest } from "fastify";
import { z } from "zod";

import {
  type ContentStore,
  type JobOrchestrator,
  type Ledger,
  type ThumbnailSize,
  ValidationError,
  checkDeclaredType,
  thumbnailKey,
} from "@imgpipe/shared";

import { presentUpload } from "../presenters/uploadItem";
import type { IngestionService } from "../services/ingestion";

export type ImageRouteDeps = {
  ledger: Ledger;
  store: ContentStore;
  orchestrator: JobOrchestrator;
  ingestion: IngestionService;
  maxUploadBytes: number;
  publicBaseUrl?: string;
};

const ImageParams = z.object({
  imageId: z.string().trim().min(1),
});

const ThumbnailParams = ImageParams.extend({ size: z.string() });

const ThumbnailSizeSchema = z.enum(["small", "medium"]) satisfies z.ZodType<ThumbnailSize>;

const SIGNED_URL_TTL_SEC = 60 * 10;

function isFileTooLarge(err: unknown): boolean {
  return !!err && typeof err === "object" && "code" in err && err.code === "FST_REQ_FILE_TOO_LARGE";
}

export async function registerImageRoutes(app: FastifyInstance, deps: ImageRouteDeps) {
  const { ledger, store, orchestrator, ingestion } = deps;

  const baseUrl = (req: FastifyRequest) => deps.publicBaseUrl ?? `${req.protocol}://${req.hostname}`;

  async function loadView(imageId: string) {
    const attempt = await ledger.getUploadAttempt(imageId);
    if (!attempt) return null;
    const [content, outcome] = await Promise.all([
      attempt.contentHash ? ledger.getContentRecord(attempt.contentHash) : Promise.resolve(null),
      ledger.getOutcome(imageId),
    ]);
    return { attempt, content, outcome };
  }

  app.post("/api/images", async (req, reply) => {
    const file = await req.file({ limits: { fileSize: deps.maxUploadBytes, files: 1 } });
    if (!file) return reply.code(400).send({ error: "file field is required" });

    const filename = file.filename || "upload";

    try {
      checkDeclaredType(filename, file.mimetype);
    } catch (err) {
      if (!(err instanceof ValidationError)) throw err;
      file.file.resume();
      const view = await ingestion.reject(filename, err);
      return reply.send(presentUpload(view, baseUrl(req)));
    }

    let bytes: Buffer;
    try {
      bytes = await file.toBuffer();
    } catch (err) {
      if (!isFileTooLarge(err)) throw err;
      const view = await ingestion.reject(
        filename,
        new ValidationError("UPLOAD_TOO_LARGE", `Upload exceeds ${deps.maxUploadBytes} bytes`),
      );
      return reply.send(presentUpload(view, baseUrl(req)));
    }

    const view = await ingestion.ingest({ filename, contentType: file.mimetype, bytes });
    return reply.send(presentUpload(view, baseUrl(req)));
  });

  app.get("/api/images", async (req, reply) => {
    const attempts = await ledger.listUploadAttempts();
    const views = await Promise.all(attempts.map((a) => loadView(a.imageId)));
    const items = views.flatMap((v) => (v ? [presentUpload(v, baseUrl(req))] : []));
    return reply.send(items);
  });

  app.get("/api/images/:imageId", async (req, reply) => {
    const { imageId } = ImageParams.parse(req.params);
    const view = await loadView(imageId);
    if (!view) return reply.code(404).send({ error: "Image not found" });
    return reply.send(presentUpload(view, baseUrl(req)));
  });

  app.get("/api/images/:imageId/thumbnails/:size", async (req, reply) => {
    const { imageId, size: rawSize } = ThumbnailParams.parse(req.params);
    const size = ThumbnailSizeSchema.safeParse(rawSize);
    if (!size.success) return reply.code(400).send({ error: "Invalid thumbnail size" });

    const attempt = await ledger.getUploadAttempt(imageId);
    if (!attempt) return reply.code(404).send({ error: "Image not found" });
    if (!attempt.contentHash) return reply.code(404).send({ error: "No thumbnail for failed upload" });

    const key = thumbnailKey(attempt.contentHash, size.data);
    if (!(await store.exists(key))) {
      return reply.code(404).send({ error: "Thumbnail not generated yet" });
    }

    const signed = await store.signedUrl(key, SIGNED_URL_TTL_SEC);
    if (signed) return reply.redirect(signed);

    return reply
      .header("Cache-Control", "public, max-age=31536000, immutable")
      .header("Content-Disposition", `inline; filename="${attempt.contentHash}_${size.data}.jpeg"`)
      .type("image/jpeg")
      .send(await store.open(key));
  });

  app.post("/api/images/:imageId/reprocess", async (req, reply) => {
    const { imageId } = ImageParams.parse(req.params);
    const attempt = await ledger.getUploadAttempt(imageId);
    if (!attempt) return reply.code(404).send({ error: "Image not found" });
    if (!attempt.contentHash || !attempt.storedPath) {
      return reply.code(409).send({ error: "Upload failed; nothing to reprocess" });
    }

    const res = await orchestrator.retrigger(attempt.contentHash, attempt.storedPath);
    if (!res.ok) {
      req.log.error({ imageId, sha256: attempt.contentHash, err: res.error }, "reprocess_enqueue_failed");
      return reply.code(503).send({ error: res.error.message, code: res.error.code });
    }

    return reply.code(202).send({ imageId, sha256: attempt.contentHash, jobs: res.value });
  });
}
