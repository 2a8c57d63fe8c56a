import type { calendar_v3 } from "googleapis";
import type { CalendarEventRecord, CalendarStore, EventDraft, TimeWindow } from "@/sync/types";
import { createChildLogger } from "@/sync/logger";
import { toCalendarEventRecord, toEventBody } from "./mappers";

const log = createChildLogger("google-calendar");

const PAGE_SIZE = 2500;

/** The slice of `calendar.events` this store calls. */
export interface EventsApi {
  list(params: calendar_v3.Params$Resource$Events$List): Promise<{ data: calendar_v3.Schema$Events }>;
  insert(params: calendar_v3.Params$Resource$Events$Insert): Promise<{ data: calendar_v3.Schema$Event }>;
  patch(params: calendar_v3.Params$Resource$Events$Patch): Promise<{ data: calendar_v3.Schema$Event }>;
}

/** CalendarStore over one Google calendar (`primary` by default). */
export class GoogleCalendarStore implements CalendarStore {
  private events: EventsApi;
  readonly calendarId: string;

  constructor(events: EventsApi, calendarId = "primary") {
    this.events = events;
    this.calendarId = calendarId;
  }

  static fromClient(client: calendar_v3.Calendar, calendarId?: string): GoogleCalendarStore {
    return new GoogleCalendarStore(client.events, calendarId);
  }

  /** Every event overlapping the window, across all pages. */
  async listEvents(window: TimeWindow): Promise<CalendarEventRecord[]> {
    const records: CalendarEventRecord[] = [];
    let pageToken: string | undefined;
    let pages = 0;

    do {
      const response = await this.events.list({
        calendarId: this.calendarId,
        timeMin: window.timeMin,
        timeMax: window.timeMax,
        singleEvents: true,
        maxResults: PAGE_SIZE,
        pageToken,
      });
      pages++;

      for (const item of response.data.items ?? []) {
        const record = toCalendarEventRecord(item);
        if (record) records.push(record);
      }
      pageToken = response.data.nextPageToken ?? undefined;
    } while (pageToken);

    log.debug("Listed calendar events", { calendarId: this.calendarId, pages, count: records.length });
    return records;
  }

  async createEvent(draft: EventDraft): Promise<string> {
    const response = await this.events.insert({
      calendarId: this.calendarId,
      requestBody: toEventBody(draft, "insert"),
    });
    if (!response.data.id) {
      throw new Error(`Google Calendar returned no id for ${draft.identityTag}`);
    }
    return response.data.id;
  }

  async updateEvent(eventId: string, draft: EventDraft): Promise<void> {
    await this.events.patch({
      calendarId: this.calendarId,
      eventId,
      requestBody: toEventBody(draft, "patch"),
    });
  }
}
