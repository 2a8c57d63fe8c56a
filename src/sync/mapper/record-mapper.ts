import type { EventDraft, EventTime, SourceItem } from "@/sync/types";
import { MappingError } from "@/sync/errors";
import { addDays, addHours, parseSourceTime, type SourceTime } from "./time";

/** Private extended-property key that carries the Linear id. */
export const IDENTITY_TAG_KEY = "linear_id";
export const KIND_TAG_KEY = "linear_kind";
export const URL_TAG_KEY = "linear_url";

export interface MapperOptions {
  /** IANA zone attached to timed events. */
  timeZone: string;
}

/**
 * Turn a source item into a calendar event draft.
 *
 * Returns null for items with neither a start nor a due date: those are not
 * scheduled and produce no event. Throws MappingError for items that have a
 * date but cannot be represented (blank title, unparseable date).
 */
export function mapSourceItem(item: SourceItem, options: MapperOptions): EventDraft | null {
  if (!item.start && !item.end) return null;

  const title = item.title?.trim();
  if (!title) {
    throw new MappingError(item.sourceId, `Source item ${item.sourceId} has no title`);
  }

  const start = parseField(item, "start");
  const end = parseField(item, "end");
  const anchor = start ?? end;
  if (!anchor) return null;
  const timing = buildTiming(anchor, start, end, options.timeZone);

  const tags: Record<string, string> = {
    [IDENTITY_TAG_KEY]: item.sourceId,
    [KIND_TAG_KEY]: item.kind,
  };
  if (item.url) tags[URL_TAG_KEY] = item.url;

  return {
    identityTag: item.sourceId,
    kind: item.kind,
    title: buildTitle(item, title),
    description: buildDescription(item),
    start: timing.start,
    end: timing.end,
    tags,
  };
}

export function buildTitle(item: SourceItem, title: string): string {
  if (item.kind === "project") return `[Project] ${title}`;
  return item.reference ? `[${item.reference}] ${title}` : title;
}

export function buildDescription(item: SourceItem): string {
  const meta = [
    item.status ? `Status: ${item.status}` : "",
    item.container ? `Project: ${item.container}` : "",
  ].filter(Boolean);

  return [item.description?.trim() ?? "", meta.join("\n"), item.url ?? ""]
    .filter(Boolean)
    .join("\n\n");
}

function parseField(item: SourceItem, field: "start" | "end"): SourceTime | null {
  const raw = item[field];
  if (!raw) return null;
  const parsed = parseSourceTime(raw);
  if (!parsed) {
    throw new MappingError(item.sourceId, `Source item ${item.sourceId} has an invalid ${field} date: ${raw}`);
  }
  return parsed;
}

/** `anchor` is the start when present, otherwise the due date. */
function buildTiming(
  anchor: SourceTime,
  start: SourceTime | null,
  end: SourceTime | null,
  timeZone: string,
): { start: EventTime; end: EventTime } {
  if (anchor.kind === "date" || start?.kind === "date" || end?.kind === "date") {
    const first = (start ?? anchor).date;
    let last = (end ?? anchor).date;
    if (last < first) last = first;
    // Google treats the all-day end date as exclusive
    return { start: { date: first }, end: { date: addDays(last, 1) } };
  }

  const begin = anchor.instant;
  const finish =
    start && end?.kind === "dateTime" && end.instant.getTime() > begin.getTime()
      ? end.instant
      : addHours(begin, 1);

  return {
    start: { dateTime: begin.toISOString(), timeZone },
    end: { dateTime: finish.toISOString(), timeZone },
  };
}
