const CALENDAR_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const MS_PER_DAY = 86_400_000;

/** Milliseconds since epoch of a `YYYY-MM-DD` date at UTC midnight, or null if it is not a real date. */
function calendarDateToUtcMs(value: string): number | null {
  const match = CALENDAR_DATE.exec(value);
  if (!match) return null;
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (year < 1) return null;
  // setUTCFullYear, unlike Date.UTC, keeps years 0-99 as written.
  const check = new Date(0);
  check.setUTCFullYear(year, month - 1, day);
  // 2024-02-30 rolls over to March; reject anything that moved.
  if (
    check.getUTCFullYear() !== year ||
    check.getUTCMonth() !== month - 1 ||
    check.getUTCDate() !== day
  ) {
    return null;
  }
  return check.getTime();
}

export function isCalendarDate(value: string): boolean {
  return calendarDateToUtcMs(value) !== null;
}

/**
 * Whole nights between two calendar dates, truncated toward zero and
 * floored at zero.
 */
export function nightsBetween(checkIn: string, checkOut: string): number {
  const from = calendarDateToUtcMs(checkIn);
  const to = calendarDateToUtcMs(checkOut);
  if (from === null || to === null) {
    throw new RangeError(`Invalid calendar date range ${checkIn}..${checkOut}`);
  }
  return Math.max(Math.trunc((to - from) / MS_PER_DAY), 0);
}

/** The UTC calendar date (`YYYY-MM-DD`) an instant falls on. */
export function toUtcCalendarDate(instant: Date): string {
  return instant.toISOString().slice(0, 10);
}

/** Half-open UTC range `[start, end)` covering one calendar day. */
export function utcDayRange(day: string): { start: Date; end: Date } {
  const ms = calendarDateToUtcMs(day);
  if (ms === null) {
    throw new RangeError(`Invalid calendar date ${day}`);
  }
  return { start: new Date(ms), end: new Date(ms + MS_PER_DAY) };
}

/** True when the half-open stays `[aIn, aOut)` and `[bIn, bOut)` share a night. */
export function staysOverlap(aIn: string, aOut: string, bIn: string, bOut: string): boolean {
  return aIn < bOut && bIn < aOut;
}
