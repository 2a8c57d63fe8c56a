import * as p from "@clack/prompts";
import { planSync, runSync } from "@/sync";
import type { SyncDependencies, SyncOptions } from "@/sync";
import type { RunReport, SourceKind } from "@/sync/types";
import { SOURCE_KINDS } from "@/sync/types";
import { getEnv } from "@/sync/config/env";
import { createDependencies, optionsFromEnv } from "@/sync/config/runtime";
import { exitCodeFor } from "@/sync/report";
import { logger } from "@/sync/logger";
import { errorMessage } from "@/sync/errors";

interface CategoryInfo {
  key: SourceKind;
  label: string;
  newCount: number;
  changedCount: number;
}

const LABELS: Record<SourceKind, string> = {
  issue: "Issues",
  project: "Projects",
};

export function getCategoryInfo(plan: RunReport): CategoryInfo[] {
  return SOURCE_KINDS.map((kind) => {
    const results = plan.results.filter((r) => r.kind === kind);
    return {
      key: kind,
      label: LABELS[kind],
      newCount: results.filter((r) => r.action === "created").length,
      changedCount: results.filter((r) => r.action === "updated").length,
    };
  });
}

export function formatCategoryLine(cat: CategoryInfo): string {
  const total = cat.newCount + cat.changedCount;
  if (total === 0) return `${cat.label}: no changes`;
  const parts: string[] = [];
  if (cat.newCount > 0) parts.push(`${cat.newCount} new`);
  if (cat.changedCount > 0) parts.push(`${cat.changedCount} updated`);
  return `${cat.label}: ${parts.join(", ")}`;
}

/** Returns the process exit code. */
export async function runInteractiveSync(dryRun: boolean): Promise<number> {
  p.intro("Linear → Google Calendar");

  let deps: SyncDependencies;
  let options: SyncOptions;
  try {
    const env = getEnv();
    // Prompts own the terminal; keep the logger to warnings and errors
    logger.level = env.SYNC_LOG_LEVEL === "debug" ? "debug" : "warn";
    deps = createDependencies(env);
    options = { ...optionsFromEnv(env), dryRun: dryRun || env.SYNC_DRY_RUN };
  } catch (error) {
    p.log.error(errorMessage(error));
    p.outro("Set up your .env.local file and try again.");
    return 1;
  }

  const planSpinner = p.spinner();
  planSpinner.start("Comparing Linear with Google Calendar...");

  let plan: RunReport;
  try {
    plan = await planSync(deps, options);
    planSpinner.stop("Comparison done.");
  } catch (error) {
    planSpinner.stop("Comparison failed.");
    p.log.error(errorMessage(error));
    p.outro("Sync could not start. Check your settings and try again.");
    return 1;
  }

  if (plan.counts.duplicates > 0) {
    p.log.warn(`${plan.counts.duplicates} duplicate calendar event(s) carry the same Linear id. Clean them up by hand.`);
  }
  if (plan.counts.rejected > 0) {
    p.log.warn(`${plan.counts.rejected} Linear item(s) could not be mapped and will be skipped.`);
  }

  const categories = getCategoryInfo(plan);
  const withChanges = categories.filter((c) => c.newCount + c.changedCount > 0);

  if (withChanges.length === 0) {
    p.log.success("Everything is up to date!");
    p.outro("Nothing to sync.");
    return 0;
  }

  p.log.info("Changes detected:");
  for (const cat of categories) {
    p.log.message(`  ${formatCategoryLine(cat)}`);
  }

  if (options.dryRun) {
    p.log.warn("Dry run: nothing will be written to Google Calendar.");
    p.outro("Done!");
    return 0;
  }

  const selected = await p.multiselect({
    message: "What would you like to sync?",
    options: withChanges.map((cat) => ({
      value: cat.key,
      label: `${cat.label} (${cat.newCount + cat.changedCount} items)`,
    })),
    initialValues: withChanges.map((c) => c.key),
  });

  if (p.isCancel(selected)) {
    p.outro("Sync cancelled.");
    return 0;
  }

  const syncSpinner = p.spinner();
  syncSpinner.start("Syncing...");

  let report: RunReport;
  try {
    report = await runSync(deps, { ...options, kinds: selected });
    syncSpinner.stop("Sync finished.");
  } catch (error) {
    syncSpinner.stop("Sync failed.");
    p.log.error(errorMessage(error));
    p.outro("Done!");
    return 1;
  }

  const { created, updated, failed } = report.counts;
  const total = created + updated;
  if (failed > 0) {
    p.log.warn(`${total} synced, ${failed} failed. Check the log for details.`);
  } else if (total > 0) {
    p.log.success(`${total} events synced successfully.`);
  } else {
    p.log.info("No events were written.");
  }

  for (const cat of getCategoryInfo(report)) {
    const f = report.results.filter((r) => r.kind === cat.key && r.action === "failed").length;
    const parts: string[] = [];
    if (cat.newCount > 0) parts.push(`${cat.newCount} created`);
    if (cat.changedCount > 0) parts.push(`${cat.changedCount} updated`);
    if (f > 0) parts.push(`${f} failed`);
    if (parts.length > 0) {
      p.log.message(`  ${cat.label}: ${parts.join(", ")}`);
    }
  }

  p.outro("Done!");
  return exitCodeFor(report);
}
