import type { ContentStore, Ledger, Logger, StageName } from "@imgpipe/shared";

import type { CaptionModelManager } from "../caption/modelManager";

export type ProcessingInput = {
  sha256: string;
  /** content store path of the original */
  storedPath: string;
  jobId: string;
};

export type ProcessingOutput = {
  ok: true;
  stage: StageName;
  /** store paths or ledger fields the module wrote */
  wrote: string[];
  meta?: Record<string, string>;
};

export interface ProcessingModule {
  type: StageName;
  run(input: ProcessingInput): Promise<ProcessingOutput>;
}

export type ModuleDeps = {
  store: ContentStore;
  ledger: Ledger;
  captions: CaptionModelManager;
  log: Logger;
};
