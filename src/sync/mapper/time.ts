const DATE_ONLY = /^(\d{4})-(\d{2})-(\d{2})$/;
const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

export type SourceTime =
  | { kind: "date"; date: string }
  | { kind: "dateTime"; instant: Date; date: string };

/** Parse a Linear date (`YYYY-MM-DD`) or ISO date-time. Returns null when unparseable. */
export function parseSourceTime(value: string): SourceTime | null {
  const trimmed = value.trim();
  const match = DATE_ONLY.exec(trimmed);
  if (match) {
    const [, y, m, d] = match;
    const utc = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
    // Rejects rollovers such as 2025-02-30
    if (utc.toISOString().slice(0, 10) !== trimmed) return null;
    return { kind: "date", date: trimmed };
  }

  if (!trimmed.includes("T")) return null;
  const ms = Date.parse(trimmed);
  if (Number.isNaN(ms)) return null;
  // The calendar date as written, before any offset conversion
  return { kind: "dateTime", instant: new Date(ms), date: trimmed.slice(0, 10) };
}

export function addDays(date: string, days: number): string {
  const ms = Date.parse(`${date}T00:00:00Z`) + days * DAY_MS;
  return new Date(ms).toISOString().slice(0, 10);
}

export function addHours(instant: Date, hours: number): Date {
  return new Date(instant.getTime() + hours * HOUR_MS);
}

export function shiftDays(instant: Date, days: number): Date {
  return new Date(instant.getTime() + days * DAY_MS);
}
