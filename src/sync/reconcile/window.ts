import type { EventDraft, EventTime, TimeWindow } from "@/sync/types";
import { shiftDays } from "@/sync/mapper/time";

/**
 * The reconciliation window: from the earlier of `now` and the earliest draft
 * start to the later of `now` and the latest draft end, padded on both sides.
 * Padding covers events whose source date moved since they were created.
 */
export function computeWindow(drafts: EventDraft[], now: Date, paddingDays: number): TimeWindow {
  let min = now.getTime();
  let max = now.getTime();

  for (const draft of drafts) {
    min = Math.min(min, toMillis(draft.start));
    max = Math.max(max, toMillis(draft.end));
  }

  return {
    timeMin: shiftDays(new Date(min), -paddingDays).toISOString(),
    timeMax: shiftDays(new Date(max), paddingDays).toISOString(),
  };
}

function toMillis(time: EventTime): number {
  return "date" in time ? Date.parse(`${time.date}T00:00:00Z`) : Date.parse(time.dateTime);
}
