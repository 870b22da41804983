// dates.ts
//
// Calendar dates as YYYY-MM-DD strings. All arithmetic runs in UTC so the
// local timezone never shifts a day.

import { ValidationError } from "./errors.ts";

export type DateFilter = "none" | "weekendsOnly" | "weekdaysOnly";

const DAY_MS = 24 * 60 * 60 * 1000;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

export function parseIsoDate(value: string): Date {
  const m = ISO_DATE.exec(value.trim());
  if (!m) throw new ValidationError(`Invalid date "${value}", expected YYYY-MM-DD`);

  const [year, month, day] = [Number(m[1]), Number(m[2]), Number(m[3])];
  const date = new Date(Date.UTC(year, month - 1, day));
  // Date.UTC rolls 2026-02-30 over into March
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    throw new ValidationError(`Invalid date "${value}"`);
  }
  return date;
}

export function formatIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function addDays(date: string, days: number): string {
  return formatIsoDate(new Date(parseIsoDate(date).getTime() + days * DAY_MS));
}

function matchesFilter(day: number, filter: DateFilter): boolean {
  const weekend = day === 0 || day === 6;
  if (filter === "weekendsOnly") return weekend;
  if (filter === "weekdaysOnly") return !weekend;
  return true;
}

/** Every calendar day from start to end, both inclusive, that passes the filter. */
export function generateDateRange(start: string, end: string, filter: DateFilter = "none"): string[] {
  const from = parseIsoDate(start);
  const to = parseIsoDate(end);

  const dates: string[] = [];
  for (let t = from.getTime(); t <= to.getTime(); t += DAY_MS) {
    const current = new Date(t);
    if (matchesFilter(current.getUTCDay(), filter)) dates.push(formatIsoDate(current));
  }
  return dates;
}

export function resolveDateFilter(flags: { weekendsOnly?: boolean; weekdaysOnly?: boolean }): DateFilter {
  if (flags.weekendsOnly && flags.weekdaysOnly) {
    throw new ValidationError("--weekends-only and --weekdays-only cannot be combined");
  }
  if (flags.weekendsOnly) return "weekendsOnly";
  if (flags.weekdaysOnly) return "weekdaysOnly";
  return "none";
}

/** "2026-03-15, 2026-03-16" -> validated, trimmed dates in the given order. */
export function parseDateList(value: string): string[] {
  return value
    .split(",")
    .map((d) => d.trim())
    .filter((d) => d.length > 0)
    .map((d) => formatIsoDate(parseIsoDate(d)));
}
