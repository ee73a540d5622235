import type { Ledger, StageResults } from "./ledger/ledger";
import type { Logger } from "./logger";
import { PIPELINE_STAGES, type StageName, type StageStatus } from "./types";

/** Null until every stage has reported; then failed if any stage failed. */
export function decideSettlement(results: StageResults): StageStatus | null {
  const statuses = PIPELINE_STAGES.map((s) => results[s]);
  if (statuses.some((s) => s === undefined)) return null;
  return statuses.includes("failed") ? "failed" : "success";
}

/**
 * Gives every attempt still waiting on `sha256` the hash's terminal status.
 * Safe to call from any number of places: outcomes are set once, and an
 * unsettled hash is left alone.
 */
export async function settleWaitingAttempts(
  ledger: Ledger,
  sha256: string,
  log: Logger,
): Promise<StageStatus | null> {
  const status = await ledger.getSettledStatus(sha256);
  if (!status) return null;

  for (const imageId of await ledger.listWaitingAttempts(sha256)) {
    const changed = await ledger.recordOutcome(imageId, status);
    await ledger.removeWaitingAttempt(sha256, imageId);
    if (changed) log.info({ sha256, imageId, status }, "outcome_settled");
  }
  return status;
}

/** Called by the worker once a stage has finished for good. */
export async function completeStage(
  ledger: Ledger,
  sha256: string,
  stage: StageName,
  status: StageStatus,
  log: Logger,
): Promise<StageStatus | null> {
  const results = await ledger.recordStageResult(sha256, stage, status);
  const verdict = decideSettlement(results);
  if (!verdict) return null;

  if (await ledger.markSettled(sha256, verdict)) {
    log.info({ sha256, status: verdict, stages: results }, "content_settled");
  }
  return settleWaitingAttempts(ledger, sha256, log);
}
