import type { calendar_v3 } from "googleapis";
import type { CalendarEventRecord, EventDraft, EventTime } from "@/sync/types";

/** Google event -> record. Events without an id cannot be updated and are dropped. */
export function toCalendarEventRecord(event: calendar_v3.Schema$Event): CalendarEventRecord | null {
  if (!event.id) return null;
  return {
    id: event.id,
    title: event.summary ?? "",
    description: event.description ?? "",
    start: toEventTime(event.start),
    end: toEventTime(event.end),
    tags: { ...(event.extendedProperties?.private ?? {}) },
  };
}

export function toEventTime(
  value: calendar_v3.Schema$EventDateTime | undefined,
): EventTime | undefined {
  if (!value) return undefined;
  if (value.dateTime) {
    return value.timeZone
      ? { dateTime: value.dateTime, timeZone: value.timeZone }
      : { dateTime: value.dateTime };
  }
  if (value.date) return { date: value.date };
  return undefined;
}

/**
 * For patches the unused field is sent as null so an event can switch
 * between all-day and timed.
 */
export function toGoogleDateTime(
  time: EventTime,
  clearOther = false,
): calendar_v3.Schema$EventDateTime {
  if ("date" in time) {
    return clearOther ? { date: time.date, dateTime: null, timeZone: null } : { date: time.date };
  }
  const timed: calendar_v3.Schema$EventDateTime = { dateTime: time.dateTime };
  if (time.timeZone) timed.timeZone = time.timeZone;
  if (clearOther) timed.date = null;
  return timed;
}

/** Request body carrying only the fields this sync owns. */
export function toEventBody(draft: EventDraft, mode: "insert" | "patch" = "insert"): calendar_v3.Schema$Event {
  const clearOther = mode === "patch";
  return {
    summary: draft.title,
    description: draft.description,
    start: toGoogleDateTime(draft.start, clearOther),
    end: toGoogleDateTime(draft.end, clearOther),
    extendedProperties: { private: { ...draft.tags } },
  };
}
