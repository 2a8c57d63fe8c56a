import type {
  CalendarEventRecord,
  CalendarStore,
  DuplicateTargetRecord,
  TimeWindow,
} from "@/sync/types";
import { IndexBuildError, errorMessage } from "@/sync/errors";
import { IDENTITY_TAG_KEY } from "@/sync/mapper/record-mapper";
import { createChildLogger } from "@/sync/logger";

const log = createChildLogger("index-builder");

export interface ReconciliationIndex {
  events: Map<string, CalendarEventRecord>;
  duplicates: DuplicateTargetRecord[];
  /** Events listed in the window, tagged or not. */
  scanned: number;
}

/**
 * List the target calendar inside `window` and index every event we created
 * by its Linear id. Events without the identity tag belong to someone else and
 * are ignored. When two events carry the same tag the first one listed wins;
 * the rest are reported, never deleted.
 */
export async function buildIndex(
  store: CalendarStore,
  window: TimeWindow,
): Promise<ReconciliationIndex> {
  let listed: CalendarEventRecord[];
  try {
    listed = await store.listEvents(window);
  } catch (error) {
    throw new IndexBuildError(`Failed to list target calendar events: ${errorMessage(error)}`, error);
  }

  const events = new Map<string, CalendarEventRecord>();
  const duplicates: DuplicateTargetRecord[] = [];

  for (const event of listed) {
    const sourceId = event.tags[IDENTITY_TAG_KEY];
    if (!sourceId) continue;

    const kept = events.get(sourceId);
    if (kept) {
      duplicates.push({ sourceId, keptEventId: kept.id, duplicateEventId: event.id });
      log.warn("Duplicate tagged event in target calendar", {
        sourceId,
        keptEventId: kept.id,
        duplicateEventId: event.id,
      });
      continue;
    }
    events.set(sourceId, event);
  }

  log.info("Reconciliation index built", {
    ...window,
    scanned: listed.length,
    tagged: events.size,
    duplicates: duplicates.length,
  });

  return { events, duplicates, scanned: listed.length };
}
