import { describe, it, expect } from "vitest";
import { IndexBuildError } from "@/sync/errors";
import { InMemoryCalendarStore } from "@/sync/test-helpers";
import type { CalendarEventRecord } from "@/sync/types";
import { buildIndex } from "./index-builder";

const window = { timeMin: "2025-01-01T00:00:00.000Z", timeMax: "2026-01-01T00:00:00.000Z" };

function event(id: string, tags: Record<string, string>, date = "2025-05-01"): CalendarEventRecord {
  return { id, title: id, description: "", start: { date }, end: { date }, tags };
}

describe("buildIndex", () => {
  it("indexes tagged events by Linear id and ignores untagged ones", async () => {
    const store = new InMemoryCalendarStore([
      event("evt-a", { linear_id: "iss-1" }),
      event("evt-b", {}),
      event("evt-c", { other: "x" }),
      event("evt-d", { linear_id: "iss-2" }),
    ]);

    const index = await buildIndex(store, window);

    expect([...index.events.keys()]).toEqual(["iss-1", "iss-2"]);
    expect(index.events.get("iss-1")?.id).toBe("evt-a");
    expect(index.scanned).toBe(4);
    expect(index.duplicates).toEqual([]);
  });

  it("keeps the first listed event per tag and flags the rest", async () => {
    const store = new InMemoryCalendarStore([
      event("evt-first", { linear_id: "iss-1" }),
      event("evt-second", { linear_id: "iss-1" }),
      event("evt-third", { linear_id: "iss-1" }),
    ]);

    const index = await buildIndex(store, window);

    expect(index.events.get("iss-1")?.id).toBe("evt-first");
    expect(index.duplicates).toEqual([
      { sourceId: "iss-1", keptEventId: "evt-first", duplicateEventId: "evt-second" },
      { sourceId: "iss-1", keptEventId: "evt-first", duplicateEventId: "evt-third" },
    ]);
    expect(store.events).toHaveLength(3);
  });

  it("passes the window through to the store", async () => {
    const store = new InMemoryCalendarStore([event("evt-old", { linear_id: "iss-9" }, "2020-01-01")]);

    const index = await buildIndex(store, window);

    expect(store.listCalls).toEqual([window]);
    expect(index.events.size).toBe(0);
  });

  it("fails the run when listing fails", async () => {
    const store = new InMemoryCalendarStore();
    store.listError = new Error("quotaExceeded");

    await expect(buildIndex(store, window)).rejects.toBeInstanceOf(IndexBuildError);
    await expect(buildIndex(store, window)).rejects.toThrow(
      "Failed to list target calendar events: quotaExceeded",
    );
  });
});
