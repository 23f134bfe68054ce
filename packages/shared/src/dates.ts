/** A half-open contribution window `[from, to)`. */
export interface DateWindow {
  from: Date;
  to: Date;
}

/** Format a Date as an ISO 8601 UTC timestamp without fractional seconds. */
export function toGitHubTimestamp(d: Date): string {
  return d.toISOString().replace(/\.\d{3}Z$/, "Z");
}

/** Parse an ISO 8601 timestamp, rejecting anything Date cannot read. */
export function parseTimestamp(s: string): Date {
  const d = new Date(s);
  if (isNaN(d.getTime())) {
    throw new Error(`Invalid timestamp: ${s}`);
  }
  return d;
}

/** Midnight UTC on January 1st of the year after `d`. */
export function startOfNextYearUTC(d: Date): Date {
  return new Date(Date.UTC(d.getUTCFullYear() + 1, 0, 1));
}

/**
 * Split `[start, end]` into consecutive windows that break on calendar
 * year boundaries (UTC). Each window begins where the previous one ended.
 * Returns an empty array when `start` is not before `end`.
 */
export function yearWindows(start: Date, end: Date): DateWindow[] {
  const windows: DateWindow[] = [];
  let from = start;
  while (from.getTime() < end.getTime()) {
    const boundary = startOfNextYearUTC(from);
    const to = boundary.getTime() < end.getTime() ? boundary : end;
    windows.push({ from, to });
    from = to;
  }
  return windows;
}
