import { describe, it, expect, vi } from "vitest";
import type { calendar_v3 } from "googleapis";
import { draft } from "@/sync/test-helpers";
import { GoogleCalendarStore, type EventsApi } from "./client";

const window = { timeMin: "2025-01-01T00:00:00.000Z", timeMax: "2026-01-01T00:00:00.000Z" };

function fakeEvents(pages: calendar_v3.Schema$Events[] = []) {
  let page = 0;
  const api = {
    list: vi.fn(async (_params: calendar_v3.Params$Resource$Events$List) => {
      const data = pages[Math.min(page, pages.length - 1)] ?? {};
      page++;
      return { data };
    }),
    insert: vi.fn(async (_params: calendar_v3.Params$Resource$Events$Insert) => ({
      data: { id: "new-id" } satisfies calendar_v3.Schema$Event,
    })),
    patch: vi.fn(async (_params: calendar_v3.Params$Resource$Events$Patch) => ({
      data: {} satisfies calendar_v3.Schema$Event,
    })),
  } satisfies EventsApi;
  return api;
}

describe("GoogleCalendarStore", () => {
  it("lists every page of the window", async () => {
    const events = fakeEvents([
      { items: [{ id: "a", summary: "A", extendedProperties: { private: { linear_id: "iss-1" } } }], nextPageToken: "p2" },
      { items: [{ id: "b", summary: "B" }, { summary: "no id" }] },
    ]);
    const store = new GoogleCalendarStore(events, "team@group.calendar.google.com");

    const records = await store.listEvents(window);

    expect(records.map((r) => r.id)).toEqual(["a", "b"]);
    expect(records[0]?.tags).toEqual({ linear_id: "iss-1" });
    expect(events.list).toHaveBeenCalledTimes(2);
    expect(events.list.mock.calls[0]?.[0]).toMatchObject({
      calendarId: "team@group.calendar.google.com",
      timeMin: window.timeMin,
      timeMax: window.timeMax,
      singleEvents: true,
      maxResults: 2500,
      pageToken: undefined,
    });
    expect(events.list.mock.calls[1]?.[0]).toMatchObject({ pageToken: "p2" });
  });

  it("inserts into the primary calendar by default", async () => {
    const events = fakeEvents();
    const store = new GoogleCalendarStore(events);

    const id = await store.createEvent(draft({ identityTag: "iss-1" }));

    expect(id).toBe("new-id");
    expect(events.insert.mock.calls[0]?.[0]).toMatchObject({
      calendarId: "primary",
      requestBody: { summary: "[ENG-1] Write release notes", extendedProperties: { private: { linear_id: "iss-1" } } },
    });
  });

  it("patches only the synced fields", async () => {
    const events = fakeEvents();
    const store = new GoogleCalendarStore(events);

    await store.updateEvent("evt-7", draft({ identityTag: "iss-1", title: "Renamed" }));

    const params = events.patch.mock.calls[0]?.[0];
    expect(params?.eventId).toBe("evt-7");
    expect(Object.keys(params?.requestBody ?? {}).sort()).toEqual([
      "description",
      "end",
      "extendedProperties",
      "start",
      "summary",
    ]);
  });

  it("propagates API errors", async () => {
    const events = fakeEvents();
    events.insert.mockRejectedValueOnce(Object.assign(new Error("Rate Limit Exceeded"), { code: 429 }));
    const store = new GoogleCalendarStore(events);

    await expect(store.createEvent(draft({ identityTag: "iss-1" }))).rejects.toThrow("Rate Limit Exceeded");
  });
});
