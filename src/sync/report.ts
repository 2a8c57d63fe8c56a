import type {
  DuplicateTargetRecord,
  RejectedItem,
  RunReport,
  SyncResult,
} from "@/sync/types";

export function buildReport(
  runId: string,
  startedAt: string,
  results: SyncResult[],
  duplicates: DuplicateTargetRecord[],
  rejected: RejectedItem[],
  dryRun = false,
): RunReport {
  return {
    runId,
    startedAt,
    completedAt: new Date().toISOString(),
    dryRun,
    results,
    duplicates,
    rejected,
    counts: {
      created: results.filter((r) => r.action === "created").length,
      updated: results.filter((r) => r.action === "updated").length,
      skipped: results.filter((r) => r.action === "skipped").length,
      failed: results.filter((r) => r.action === "failed").length,
      duplicates: duplicates.length,
      rejected: rejected.length,
    },
  };
}

/** One line for logs and the scheduler's run history. */
export function formatSummary(report: RunReport): string {
  const { created, updated, skipped, failed, duplicates, rejected } = report.counts;
  const status = failed > 0 ? "FAILED" : "OK";
  const prefix = report.dryRun ? "Sync plan" : "Sync";
  return `${prefix} ${status}: created=${created} updated=${updated} skipped=${skipped} failed=${failed} duplicates=${duplicates} rejected=${rejected}`;
}

/** Non-zero whenever at least one item failed to write. */
export function exitCodeFor(report: RunReport): number {
  return report.counts.failed > 0 ? 1 : 0;
}
