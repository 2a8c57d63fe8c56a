import { describe, it, expect } from "vitest";
import { addDays, parseSourceTime } from "./time";

describe("parseSourceTime", () => {
  it("parses a calendar date", () => {
    expect(parseSourceTime("2025-12-31")).toEqual({ kind: "date", date: "2025-12-31" });
  });

  it("rejects a date that rolls over", () => {
    expect(parseSourceTime("2025-02-29")).toBeNull();
  });

  it("keeps the written date of a date-time with an offset", () => {
    const parsed = parseSourceTime("2025-03-01T23:00:00-05:00");
    expect(parsed).toEqual({
      kind: "dateTime",
      instant: new Date("2025-03-02T04:00:00.000Z"),
      date: "2025-03-01",
    });
  });

  it("rejects free text", () => {
    expect(parseSourceTime("next tuesday")).toBeNull();
  });
});

describe("addDays", () => {
  it("crosses month and year boundaries", () => {
    expect(addDays("2024-02-28", 1)).toBe("2024-02-29");
    expect(addDays("2025-12-31", 1)).toBe("2026-01-01");
  });
});
