import type { DayKey } from "./types.js";

const STORED_DATE = /^(\d{4})[-/](\d{1,2})[-/](\d{1,2})(?:[ T].*)?$/;

function pad2(n: number) {
  return String(n).padStart(2, "0");
}

/** Local calendar day of `now` as YYYY-MM-DD. */
export function dayKeyOf(now: Date): DayKey {
  return `${now.getFullYear()}-${pad2(now.getMonth() + 1)}-${pad2(now.getDate())}`;
}

/**
 * Canonicalizes a stored Date cell. Accepts YYYY-MM-DD, YYYY/MM/DD, unpadded
 * month/day and a trailing time part ("2024-01-05 00:00:00").
 * Returns null for anything that is not a real calendar day.
 */
export function normalizeDayKey(raw: string): DayKey | null {
  const m = raw.trim().match(STORED_DATE);
  if (!m) return null;

  const y = Number(m[1]);
  const mo = Number(m[2]);
  const d = Number(m[3]);
  if (mo < 1 || mo > 12 || d < 1) return null;

  // day 0 of the next month = last day of this one
  const daysInMonth = new Date(Date.UTC(y, mo, 0)).getUTCDate();
  if (d > daysInMonth) return null;

  return `${String(y).padStart(4, "0")}-${pad2(mo)}-${pad2(d)}`;
}
