import type { Ledger } from "./ledger/ledger";
import type { ProcessingOutcome, Stats } from "./types";

export function summarizeOutcomes(rows: ProcessingOutcome[]): Stats {
  const total = rows.length;
  const failed = rows.filter((r) => r.status === "failed").length;
  const succeeded = rows.filter((r) => r.status === "success").length;

  const durations: number[] = [];
  for (const r of rows) {
    if (r.endedAt === null) continue;
    const ms = Date.parse(r.endedAt) - Date.parse(r.startedAt);
    if (Number.isFinite(ms)) durations.push(ms / 1000);
  }

  const avg = durations.length ? durations.reduce((a, b) => a + b, 0) / durations.length : 0;

  return {
    total,
    failed,
    successRate: total ? `${((succeeded / total) * 100).toFixed(2)}%` : "0.00%",
    avgProcessingSeconds: Math.round(avg * 100) / 100,
  };
}

export async function computeStats(ledger: Ledger): Promise<Stats> {
  return summarizeOutcomes(await ledger.listOutcomes());
}
