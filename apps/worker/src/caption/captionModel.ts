import { z } from "zod";

import { AppError, errorMessage } from "@imgpipe/shared";

/** Black-box captioner: image in, one line of text out. */
export interface CaptionModel {
  caption(image: Buffer, mimeType: string): Promise<string>;
  warmup(): Promise<void>;
  close(): Promise<void>;
}

export type HttpCaptionModelOptions = {
  url: string;
  token?: string;
  healthUrl?: string;
  timeoutMs: number;
};

// plain `{ caption }` or the Hugging Face image-to-text shape
const CaptionResponse = z.union([
  z.object({ caption: z.string() }).transform((r) => r.caption),
  z
    .array(z.object({ generated_text: z.string() }))
    .min(1)
    .transform((r) => r[0].generated_text),
]);

function isRetryableHttp(status: number) {
  return status === 429 || (status >= 500 && status <= 599);
}

async function safeReadText(resp: Response): Promise<string> {
  try {
    return await resp.text();
  } catch {
    return "";
  }
}

/** Captions by POSTing the image bytes to an inference endpoint. */
export class HttpCaptionModel implements CaptionModel {
  private readonly inflight = new Set<AbortController>();

  constructor(private readonly opts: HttpCaptionModelOptions) {}

  private headers(contentType?: string): Record<string, string> {
    const h: Record<string, string> = { Accept: "application/json" };
    if (contentType) h["Content-Type"] = contentType;
    if (this.opts.token) h.Authorization = `Bearer ${this.opts.token}`;
    return h;
  }

  private async request(url: string, init: { method: string; body?: Buffer; contentType?: string }) {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.opts.timeoutMs);
    this.inflight.add(controller);

    try {
      const resp = await fetch(url, {
        method: init.method,
        headers: this.headers(init.contentType),
        body: init.body,
        signal: controller.signal,
        redirect: "follow",
      });

      if (resp.status === 401 || resp.status === 403) {
        const txt = await safeReadText(resp);
        throw new AppError({
          code: "BAD_INPUT",
          message: `Caption service auth/config error: HTTP ${resp.status}${txt ? ` | ${txt}` : ""}`,
          retryable: false,
          details: { url, status: resp.status },
        });
      }

      if (!resp.ok) {
        const txt = await safeReadText(resp);
        const retry = isRetryableHttp(resp.status);
        throw new AppError({
          code: retry ? "NETWORK" : "PROVIDER_ERROR",
          message: `Caption service HTTP error ${resp.status}: ${txt || resp.statusText}`,
          retryable: retry,
          details: { url, status: resp.status },
        });
      }

      return resp;
    } catch (err) {
      if (err instanceof AppError) throw err;
      if (controller.signal.aborted) {
        throw new AppError({
          code: "TIMED_OUT",
          message: `Caption request aborted after ${this.opts.timeoutMs}ms or on shutdown`,
          retryable: true,
          details: { url },
          cause: err,
        });
      }
      throw new AppError({
        code: "NETWORK",
        message: `Network/provider failure: ${errorMessage(err)}`,
        retryable: true,
        details: { url },
        cause: err,
      });
    } finally {
      clearTimeout(timer);
      this.inflight.delete(controller);
    }
  }

  async caption(image: Buffer, mimeType: string): Promise<string> {
    const resp = await this.request(this.opts.url, { method: "POST", body: image, contentType: mimeType });

    let json: unknown;
    try {
      json = await resp.json();
    } catch (err) {
      throw new AppError({
        code: "PROVIDER_ERROR",
        message: "Caption service returned invalid JSON",
        retryable: true,
        details: { url: this.opts.url },
        cause: err,
      });
    }

    const parsed = CaptionResponse.safeParse(json);
    if (!parsed.success) {
      throw new AppError({
        code: "PROVIDER_ERROR",
        message: "Caption service response has no caption",
        retryable: false,
        details: { url: this.opts.url, issues: parsed.error.issues },
      });
    }
    return parsed.data;
  }

  /** Pings the health endpoint when one is configured. */
  async warmup(): Promise<void> {
    if (!this.opts.healthUrl) return;
    await this.request(this.opts.healthUrl, { method: "GET" });
  }

  async close(): Promise<void> {
    for (const c of this.inflight) c.abort();
    this.inflight.clear();
  }
}
