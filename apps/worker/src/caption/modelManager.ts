import type { Logger } from "@imgpipe/shared";

import type { CaptionModel } from "./captionModel";

export type CaptionModelFactory = () => CaptionModel | Promise<CaptionModel>;

/**
 * Process-scoped owner of the caption model. The model is built and warmed
 * once, on first `acquire()` or an explicit `warmup()` at boot; a failed load
 * is forgotten so the next acquire tries again.
 */
export class CaptionModelManager {
  private loading: Promise<CaptionModel> | null = null;

  constructor(
    private readonly factory: CaptionModelFactory,
    private readonly log: Logger,
  ) {}

  acquire(): Promise<CaptionModel> {
    if (!this.loading) {
      this.loading = this.load().catch((err: unknown) => {
        this.loading = null;
        throw err;
      });
    }
    return this.loading;
  }

  async warmup(): Promise<void> {
    this.log.info("caption_model_warmup_start");
    await this.acquire();
    this.log.info("caption_model_warm");
  }

  async close(): Promise<void> {
    const pending = this.loading;
    this.loading = null;
    if (!pending) return;

    let model: CaptionModel;
    try {
      model = await pending;
    } catch (err) {
      this.log.warn({ err }, "caption_model_never_loaded");
      return;
    }
    await model.close();
  }

  private async load(): Promise<CaptionModel> {
    const model = await this.factory();
    await model.warmup();
    return model;
  }
}
