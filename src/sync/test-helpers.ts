/**
 * In-process stand-ins for Linear and Google Calendar, shared by the tests.
 */

import type {
  CalendarEventRecord,
  CalendarStore,
  EventDraft,
  EventTime,
  SourceItem,
  SourceKind,
  SourceReader,
  TimeWindow,
} from "@/sync/types";

type WriteOp = "create" | "update";

export class InMemoryCalendarStore implements CalendarStore {
  events: CalendarEventRecord[];
  listCalls: TimeWindow[] = [];
  creates: EventDraft[] = [];
  updates: Array<{ eventId: string; draft: EventDraft }> = [];
  /** Counts every attempt, including ones that threw. */
  writeAttempts = 0;
  listError: Error | null = null;
  /** Throw from here to simulate a failed write. */
  onWrite: ((draft: EventDraft, op: WriteOp) => void) | null = null;
  private nextId = 1;

  constructor(seed: CalendarEventRecord[] = []) {
    this.events = seed.map((e) => ({ ...e, tags: { ...e.tags } }));
  }

  async listEvents(window: TimeWindow): Promise<CalendarEventRecord[]> {
    this.listCalls.push(window);
    if (this.listError) throw this.listError;
    const min = Date.parse(window.timeMin);
    const max = Date.parse(window.timeMax);
    return this.events
      .filter((e) => {
        if (!e.start) return false;
        const start = timeOf(e.start);
        return start >= min && start < max;
      })
      .map((e) => ({ ...e, tags: { ...e.tags } }));
  }

  async createEvent(draft: EventDraft): Promise<string> {
    this.writeAttempts++;
    this.onWrite?.(draft, "create");
    const id = `evt-${this.nextId++}`;
    this.events.push({
      id,
      title: draft.title,
      description: draft.description,
      start: draft.start,
      end: draft.end,
      tags: { ...draft.tags },
    });
    this.creates.push(draft);
    return id;
  }

  async updateEvent(eventId: string, draft: EventDraft): Promise<void> {
    this.writeAttempts++;
    this.onWrite?.(draft, "update");
    const event = this.events.find((e) => e.id === eventId);
    if (!event) throw Object.assign(new Error(`Not found: ${eventId}`), { status: 404 });
    event.title = draft.title;
    event.description = draft.description;
    event.start = draft.start;
    event.end = draft.end;
    event.tags = { ...event.tags, ...draft.tags };
    this.updates.push({ eventId, draft });
  }

  taggedWith(sourceId: string): CalendarEventRecord[] {
    return this.events.filter((e) => e.tags.linear_id === sourceId);
  }
}

export class StaticSourceReader implements SourceReader {
  items: SourceItem[];
  error: Error | null = null;
  requestedKinds: SourceKind[][] = [];

  constructor(items: SourceItem[]) {
    this.items = items;
  }

  async fetchItems(kinds: readonly SourceKind[]): Promise<SourceItem[]> {
    this.requestedKinds.push([...kinds]);
    if (this.error) throw this.error;
    return this.items.filter((item) => kinds.includes(item.kind));
  }
}

export function issue(overrides: Partial<SourceItem> & { sourceId: string }): SourceItem {
  return {
    kind: "issue",
    reference: "ENG-1",
    title: "Write release notes",
    url: `https://linear.app/acme/issue/${overrides.sourceId}`,
    end: "2025-03-14",
    ...overrides,
  };
}

export function draft(overrides: Partial<EventDraft> & { identityTag: string }): EventDraft {
  return {
    kind: "issue",
    title: "[ENG-1] Write release notes",
    description: "",
    start: { date: "2025-03-14" },
    end: { date: "2025-03-15" },
    tags: { linear_id: overrides.identityTag, linear_kind: "issue" },
    ...overrides,
  };
}

/** A transient failure: no HTTP status, like a dropped connection. */
export function networkError(message = "socket hang up"): Error {
  return Object.assign(new Error(message), { code: "ECONNRESET" });
}

export const noSleep = async (): Promise<void> => {};

function timeOf(time: EventTime): number {
  return "date" in time ? Date.parse(`${time.date}T00:00:00Z`) : Date.parse(time.dateTime);
}
