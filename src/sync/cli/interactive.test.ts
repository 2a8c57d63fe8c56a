import { describe, it, expect } from "vitest";
import { buildReport } from "@/sync/report";
import type { SyncResult } from "@/sync/types";
import { formatCategoryLine, getCategoryInfo } from "./interactive";

function result(sourceId: string, kind: SyncResult["kind"], action: SyncResult["action"]): SyncResult {
  return { sourceId, kind, action, dryRun: true, timestamp: "2025-01-01T00:00:00.000Z" };
}

describe("getCategoryInfo", () => {
  it("splits planned creates and updates by kind", () => {
    const plan = buildReport(
      "run-1",
      "2025-01-01T00:00:00.000Z",
      [
        result("iss-1", "issue", "created"),
        result("iss-2", "issue", "updated"),
        result("iss-3", "issue", "skipped"),
        result("prj-1", "project", "created"),
      ],
      [],
      [],
      true,
    );

    expect(getCategoryInfo(plan)).toEqual([
      { key: "issue", label: "Issues", newCount: 1, changedCount: 1 },
      { key: "project", label: "Projects", newCount: 1, changedCount: 0 },
    ]);
  });
});

describe("formatCategoryLine", () => {
  it("describes each category", () => {
    expect(formatCategoryLine({ key: "issue", label: "Issues", newCount: 2, changedCount: 1 })).toBe(
      "Issues: 2 new, 1 updated",
    );
    expect(formatCategoryLine({ key: "project", label: "Projects", newCount: 0, changedCount: 0 })).toBe(
      "Projects: no changes",
    );
  });
});
