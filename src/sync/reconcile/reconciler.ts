import type {
  CalendarEventRecord,
  CalendarStore,
  EventDraft,
  SyncResult,
} from "@/sync/types";
import { WriteError, errorMessage } from "@/sync/errors";
import { createChildLogger } from "@/sync/logger";
import { diffEventContent } from "./change-detector";
import type { ReconciliationIndex } from "./index-builder";
import {
  DEFAULT_RETRY_POLICY,
  RetryExhaustedError,
  withRetry,
  type RetryHooks,
  type RetryPolicy,
} from "./retry";

const log = createChildLogger("reconciler");

export interface ReconcileOptions {
  dryRun?: boolean;
  retryPolicy?: RetryPolicy;
  retryHooks?: RetryHooks;
}

/**
 * Upsert each draft against the index: create when the tag is unknown,
 * update when the synced fields differ, skip otherwise.
 *
 * Drafts are independent. A write that still fails after retries is recorded
 * as `failed` and the loop moves on. Nothing is ever deleted.
 */
export async function reconcile(
  index: ReconciliationIndex,
  drafts: EventDraft[],
  store: CalendarStore,
  options: ReconcileOptions = {},
): Promise<SyncResult[]> {
  const dryRun = options.dryRun ?? false;
  const policy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;
  const results: SyncResult[] = [];

  for (const draft of drafts) {
    const sourceId = draft.identityTag;
    const existing = index.events.get(sourceId);

    if (existing) {
      const changedFields = diffEventContent(existing, draft);
      if (changedFields.length === 0) {
        log.debug("Event unchanged", { sourceId, eventId: existing.id });
        results.push(result(draft, "skipped", { eventId: existing.id }));
        continue;
      }

      if (dryRun) {
        results.push(result(draft, "updated", { eventId: existing.id, changedFields, dryRun }));
        continue;
      }

      try {
        const { attempts } = await write(sourceId, policy, options.retryHooks, () =>
          store.updateEvent(existing.id, draft),
        );
        index.events.set(sourceId, toRecord(existing.id, draft));
        log.info("Updated event", { sourceId, eventId: existing.id, changedFields });
        results.push(result(draft, "updated", { eventId: existing.id, changedFields, attempts }));
      } catch (error) {
        results.push(failure(draft, error));
      }
      continue;
    }

    if (dryRun) {
      results.push(result(draft, "created", { dryRun }));
      continue;
    }

    try {
      const { value: eventId, attempts } = await write(sourceId, policy, options.retryHooks, () =>
        store.createEvent(draft),
      );
      // Later drafts with the same tag in this run now update instead of creating again
      index.events.set(sourceId, toRecord(eventId, draft));
      log.info("Created event", { sourceId, eventId });
      results.push(result(draft, "created", { eventId, attempts }));
    } catch (error) {
      results.push(failure(draft, error));
    }
  }

  return results;
}

async function write<T>(
  sourceId: string,
  policy: RetryPolicy,
  hooks: RetryHooks | undefined,
  operation: () => Promise<T>,
): Promise<{ value: T; attempts: number }> {
  try {
    return await withRetry(operation, policy, {
      ...hooks,
      onRetry: (info) => {
        log.warn("Write failed, retrying", {
          sourceId,
          attempt: info.attempt,
          delayMs: info.delayMs,
          error: errorMessage(info.error),
        });
        hooks?.onRetry?.(info);
      },
    });
  } catch (error) {
    if (error instanceof RetryExhaustedError) {
      throw new WriteError(sourceId, error.attempts, error.cause);
    }
    throw new WriteError(sourceId, 1, error);
  }
}

function failure(draft: EventDraft, error: unknown): SyncResult {
  const attempts = error instanceof WriteError ? error.attempts : undefined;
  log.error("Write failed", { sourceId: draft.identityTag, attempts, error: errorMessage(error) });
  return result(draft, "failed", { attempts, error: errorMessage(error) });
}

function result(
  draft: EventDraft,
  action: SyncResult["action"],
  extra: Partial<Omit<SyncResult, "sourceId" | "kind" | "action" | "timestamp">> = {},
): SyncResult {
  return {
    sourceId: draft.identityTag,
    kind: draft.kind,
    action,
    ...extra,
    timestamp: new Date().toISOString(),
  };
}

function toRecord(id: string, draft: EventDraft): CalendarEventRecord {
  return {
    id,
    title: draft.title,
    description: draft.description,
    start: draft.start,
    end: draft.end,
    tags: draft.tags,
  };
}
