import type { CalendarEventRecord, EventContent, EventTime } from "@/sync/types";

/**
 * Compare an existing event against a draft on the synced fields only.
 * Returns the names of the fields that differ; empty means no write is needed.
 */
export function diffEventContent(
  existing: CalendarEventRecord,
  draft: EventContent,
): (keyof EventContent)[] {
  const changed: (keyof EventContent)[] = [];
  if (existing.title !== draft.title) changed.push("title");
  if (normalizeText(existing.description) !== normalizeText(draft.description)) {
    changed.push("description");
  }
  if (!sameTime(existing.start, draft.start)) changed.push("start");
  if (!sameTime(existing.end, draft.end)) changed.push("end");
  return changed;
}

/**
 * Two times are equal when both are all-day on the same date, or both are
 * timed at the same instant. Offsets and zone labels Google echoes back in a
 * different form do not count as a change.
 */
export function sameTime(a: EventTime | undefined, b: EventTime | undefined): boolean {
  if (!a || !b) return a === b;
  if ("date" in a && "date" in b) return a.date === b.date;
  if ("dateTime" in a && "dateTime" in b) {
    return Date.parse(a.dateTime) === Date.parse(b.dateTime);
  }
  return false;
}

function normalizeText(value: string | undefined): string {
  return (value ?? "").replace(/\r\n/g, "\n").trim();
}
