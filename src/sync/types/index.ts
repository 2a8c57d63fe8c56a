export type SourceKind = "issue" | "project";

export const SOURCE_KINDS: readonly SourceKind[] = ["issue", "project"];

/** Snapshot of a Linear issue or project for the duration of one run. */
export interface SourceItem {
  sourceId: string;
  kind: SourceKind;
  /** Human identifier such as `ENG-42`; projects have none. */
  reference?: string;
  title?: string;
  description?: string;
  url?: string;
  /** ISO date (`YYYY-MM-DD`) or date-time. */
  start?: string;
  /** Due date for issues, target date for projects. */
  end?: string;
  status?: string;
  container?: string;
}

/** Google Calendar's own start/end shape. */
export type EventTime =
  | { date: string }
  | { dateTime: string; timeZone?: string };

export type EventTags = Record<string, string>;

export interface EventContent {
  title: string;
  description: string;
  start: EventTime;
  end: EventTime;
}

/** Normalized calendar payload produced from one source item. */
export interface EventDraft extends EventContent {
  identityTag: string;
  kind: SourceKind;
  tags: EventTags;
}

/** An event already in the target calendar, without store-managed fields. */
export interface CalendarEventRecord {
  id: string;
  title: string;
  description: string;
  start?: EventTime;
  end?: EventTime;
  tags: EventTags;
}

export interface TimeWindow {
  timeMin: string;
  timeMax: string;
}

export type SyncAction = "created" | "updated" | "skipped" | "failed";

export interface SyncResult {
  sourceId: string;
  kind: SourceKind;
  action: SyncAction;
  eventId?: string;
  /** Fields that differed, for updates. */
  changedFields?: (keyof EventContent)[];
  attempts?: number;
  error?: string;
  dryRun?: boolean;
  timestamp: string;
}

export interface DuplicateTargetRecord {
  sourceId: string;
  keptEventId: string;
  duplicateEventId: string;
}

export interface RejectedItem {
  sourceId: string;
  reason: string;
}

export interface RunCounts {
  created: number;
  updated: number;
  skipped: number;
  failed: number;
  duplicates: number;
  rejected: number;
}

export interface RunReport {
  runId: string;
  startedAt: string;
  completedAt: string;
  dryRun: boolean;
  results: SyncResult[];
  duplicates: DuplicateTargetRecord[];
  rejected: RejectedItem[];
  counts: RunCounts;
}

/** Write/read surface of the target calendar. */
export interface CalendarStore {
  listEvents(window: TimeWindow): Promise<CalendarEventRecord[]>;
  createEvent(draft: EventDraft): Promise<string>;
  updateEvent(eventId: string, draft: EventDraft): Promise<void>;
}

/** Read surface of the source system. */
export interface SourceReader {
  fetchItems(kinds: readonly SourceKind[]): Promise<SourceItem[]>;
}
