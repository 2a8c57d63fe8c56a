import type { SourceItem } from "@/sync/types";
import type { LinearIssueResponse, LinearProjectResponse } from "./types";

export function mapIssue(raw: LinearIssueResponse): SourceItem {
  return {
    sourceId: raw.id,
    kind: "issue",
    reference: raw.identifier || undefined,
    title: raw.title ?? undefined,
    description: raw.description || undefined,
    url: raw.url || undefined,
    end: raw.dueDate || undefined,
    status: raw.state?.name || undefined,
    container: raw.project?.name || undefined,
  };
}

export function mapProject(raw: LinearProjectResponse): SourceItem {
  return {
    sourceId: raw.id,
    kind: "project",
    title: raw.name ?? undefined,
    description: raw.description || undefined,
    url: raw.url || undefined,
    start: raw.startDate || undefined,
    end: raw.targetDate || undefined,
    status: raw.state || undefined,
  };
}
