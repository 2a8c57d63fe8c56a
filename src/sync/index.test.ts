import { describe, it, expect } from "vitest";
import { IndexBuildError, SourceFetchError } from "@/sync/errors";
import { InMemoryCalendarStore, StaticSourceReader, issue, noSleep } from "@/sync/test-helpers";
import type { SourceItem } from "@/sync/types";
import { mapItems, planSync, runSync, type SyncOptions } from "./index";

const options: SyncOptions = {
  timeZone: "UTC",
  windowPaddingDays: 30,
  now: () => new Date("2025-03-01T00:00:00.000Z"),
  retryPolicy: { maxAttempts: 3, baseDelayMs: 1, factor: 2, maxDelayMs: 4 },
  retryHooks: { sleep: noSleep },
};

const items: SourceItem[] = [
  issue({ sourceId: "iss-1", reference: "ENG-1", title: "Ship", end: "2025-03-10" }),
  issue({ sourceId: "iss-2", reference: "ENG-2", title: "Plan", end: undefined }),
  issue({ sourceId: "iss-3", reference: "ENG-3", title: "", end: "2025-03-11" }),
  { sourceId: "prj-1", kind: "project", title: "Launch", start: "2025-03-01", end: "2025-03-31" },
];

describe("runSync", () => {
  it("creates events for dated items and reports the rest", async () => {
    const source = new StaticSourceReader(items);
    const store = new InMemoryCalendarStore();

    const report = await runSync({ source, store }, options);

    expect(report.counts).toEqual({
      created: 2,
      updated: 0,
      skipped: 0,
      failed: 0,
      duplicates: 0,
      rejected: 1,
    });
    expect(report.rejected).toEqual([{ sourceId: "iss-3", reason: "Source item iss-3 has no title" }]);
    expect(report.results.map((r) => r.sourceId)).toEqual(["iss-1", "prj-1"]);
    expect(store.events.map((e) => e.title)).toEqual(["[ENG-1] Ship", "[Project] Launch"]);
  });

  it("is idempotent across runs", async () => {
    const source = new StaticSourceReader(items);
    const store = new InMemoryCalendarStore();

    await runSync({ source, store }, options);
    const writes = store.writeAttempts;
    const second = await runSync({ source, store }, options);

    expect(store.writeAttempts).toBe(writes);
    expect(second.counts.skipped).toBe(2);
    expect(second.counts.created).toBe(0);
  });

  it("picks up a source edit as an update", async () => {
    const source = new StaticSourceReader(items);
    const store = new InMemoryCalendarStore();
    await runSync({ source, store }, options);

    source.items = items.map((i) => (i.sourceId === "iss-1" ? { ...i, end: "2025-03-12" } : i));
    const report = await runSync({ source, store }, options);

    expect(report.counts).toMatchObject({ created: 0, updated: 1, skipped: 1 });
    expect(store.taggedWith("iss-1")[0]?.start).toEqual({ date: "2025-03-12" });
  });

  it("only fetches the selected kinds", async () => {
    const source = new StaticSourceReader(items);
    const store = new InMemoryCalendarStore();

    const report = await runSync({ source, store }, { ...options, kinds: ["project"] });

    expect(source.requestedKinds).toEqual([["project"]]);
    expect(report.results.map((r) => r.sourceId)).toEqual(["prj-1"]);
  });

  it("aborts when the source cannot be fetched", async () => {
    const source = new StaticSourceReader(items);
    source.error = new Error("ETIMEDOUT");
    const store = new InMemoryCalendarStore();

    await expect(runSync({ source, store }, options)).rejects.toBeInstanceOf(SourceFetchError);
    expect(store.listCalls).toHaveLength(0);
  });

  it("aborts before any write when the index cannot be built", async () => {
    const source = new StaticSourceReader(items);
    const store = new InMemoryCalendarStore();
    store.listError = new Error("invalid_grant");

    await expect(runSync({ source, store }, options)).rejects.toBeInstanceOf(IndexBuildError);
    expect(store.writeAttempts).toBe(0);
  });

  it("skips the calendar entirely when nothing is scheduled", async () => {
    const source = new StaticSourceReader([issue({ sourceId: "iss-9", end: undefined })]);
    const store = new InMemoryCalendarStore();

    const report = await runSync({ source, store }, options);

    expect(store.listCalls).toHaveLength(0);
    expect(report.counts).toEqual({
      created: 0,
      updated: 0,
      skipped: 0,
      failed: 0,
      duplicates: 0,
      rejected: 0,
    });
  });

  it("surfaces duplicate tagged events without touching them", async () => {
    const source = new StaticSourceReader(items.slice(0, 1));
    const record = {
      title: "[ENG-1] Ship",
      description: "https://linear.app/acme/issue/iss-1",
      start: { date: "2025-03-10" },
      end: { date: "2025-03-11" },
      tags: { linear_id: "iss-1" },
    };
    const store = new InMemoryCalendarStore([
      { id: "evt-a", ...record },
      { id: "evt-b", ...record },
    ]);

    const report = await runSync({ source, store }, options);

    expect(report.counts).toMatchObject({ skipped: 1, duplicates: 1 });
    expect(report.duplicates).toEqual([{ sourceId: "iss-1", keptEventId: "evt-a", duplicateEventId: "evt-b" }]);
    expect(store.events).toHaveLength(2);
  });
});

describe("planSync", () => {
  it("reports the plan without writing", async () => {
    const source = new StaticSourceReader(items);
    const store = new InMemoryCalendarStore();

    const report = await planSync({ source, store }, options);

    expect(report.dryRun).toBe(true);
    expect(report.counts.created).toBe(2);
    expect(store.writeAttempts).toBe(0);
  });
});

describe("mapItems", () => {
  it("separates drafts, rejections and unscheduled items", () => {
    const mapped = mapItems(items, "UTC");
    expect(mapped.drafts.map((d) => d.identityTag)).toEqual(["iss-1", "prj-1"]);
    expect(mapped.rejected.map((r) => r.sourceId)).toEqual(["iss-3"]);
    expect(mapped.unscheduled).toBe(1);
  });
});
