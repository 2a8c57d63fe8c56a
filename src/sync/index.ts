import { randomUUID } from "crypto";
import type {
  CalendarStore,
  EventDraft,
  RejectedItem,
  RunReport,
  SourceItem,
  SourceKind,
  SourceReader,
} from "@/sync/types";
import { SOURCE_KINDS } from "@/sync/types";
import { createChildLogger } from "@/sync/logger";
import { MappingError, SourceFetchError, errorMessage } from "@/sync/errors";
import { mapSourceItem } from "@/sync/mapper/record-mapper";
import { computeWindow } from "@/sync/reconcile/window";
import { buildIndex } from "@/sync/reconcile/index-builder";
import { reconcile } from "@/sync/reconcile/reconciler";
import type { RetryHooks, RetryPolicy } from "@/sync/reconcile/retry";
import { buildReport, formatSummary } from "@/sync/report";

const log = createChildLogger("sync-engine");

export interface SyncDependencies {
  source: SourceReader;
  store: CalendarStore;
}

export interface SyncOptions {
  dryRun?: boolean;
  kinds?: readonly SourceKind[];
  timeZone?: string;
  windowPaddingDays?: number;
  retryPolicy?: RetryPolicy;
  retryHooks?: RetryHooks;
  now?: () => Date;
}

export interface MappedItems {
  drafts: EventDraft[];
  rejected: RejectedItem[];
  /** Items with no start and no due date; they produce no event. */
  unscheduled: number;
}

/** Fetch source items. Any failure is fatal for the run. */
export async function fetchSourceItems(
  source: SourceReader,
  kinds: readonly SourceKind[] = SOURCE_KINDS,
): Promise<SourceItem[]> {
  log.info("Fetching Linear items...", { kinds });
  try {
    const items = await source.fetchItems(kinds);
    log.info("Linear items fetched", { count: items.length });
    return items;
  } catch (error) {
    if (error instanceof SourceFetchError) throw error;
    throw new SourceFetchError(`Failed to fetch source items: ${errorMessage(error)}`, error);
  }
}

/** Map every item; rejections are collected, never thrown. */
export function mapItems(items: SourceItem[], timeZone: string): MappedItems {
  const drafts: EventDraft[] = [];
  const rejected: RejectedItem[] = [];
  let unscheduled = 0;

  for (const item of items) {
    try {
      const draft = mapSourceItem(item, { timeZone });
      if (draft) {
        drafts.push(draft);
      } else {
        unscheduled++;
        log.debug("Skipping item without a date", { sourceId: item.sourceId, kind: item.kind });
      }
    } catch (error) {
      if (!(error instanceof MappingError)) throw error;
      log.warn("Rejected source item", { sourceId: error.sourceId, reason: error.message });
      rejected.push({ sourceId: error.sourceId, reason: error.message });
    }
  }

  return { drafts, rejected, unscheduled };
}

/**
 * One run: fetch, map, index the calendar, reconcile, report.
 * The index is complete before the first write is issued.
 */
export async function runSync(deps: SyncDependencies, options: SyncOptions = {}): Promise<RunReport> {
  const runId = randomUUID();
  const startedAt = new Date().toISOString();
  const dryRun = options.dryRun ?? false;
  const kinds = options.kinds ?? SOURCE_KINDS;
  const now = options.now ?? (() => new Date());

  log.info("Starting sync run", { runId, dryRun, kinds });

  const items = await fetchSourceItems(deps.source, kinds);
  const { drafts, rejected, unscheduled } = mapItems(items, options.timeZone ?? "UTC");
  log.info("Items mapped", { drafts: drafts.length, rejected: rejected.length, unscheduled });

  if (drafts.length === 0) {
    const report = buildReport(runId, startedAt, [], [], rejected, dryRun);
    log.info(formatSummary(report), { runId });
    return report;
  }

  const window = computeWindow(drafts, now(), options.windowPaddingDays ?? 365);
  const index = await buildIndex(deps.store, window);

  const results = await reconcile(index, drafts, deps.store, {
    dryRun,
    retryPolicy: options.retryPolicy,
    retryHooks: options.retryHooks,
  });

  const report = buildReport(runId, startedAt, results, index.duplicates, rejected, dryRun);
  if (report.counts.failed > 0) {
    log.error(formatSummary(report), { runId, counts: report.counts });
  } else {
    log.info(formatSummary(report), { runId, counts: report.counts });
  }
  return report;
}

/** Same pipeline with writes suppressed. */
export function planSync(deps: SyncDependencies, options: SyncOptions = {}): Promise<RunReport> {
  return runSync(deps, { ...options, dryRun: true });
}
