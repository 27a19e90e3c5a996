// Calendar and instant helpers shared by the guardrail and the resolver

const MS_PER_DAY = 24 * 60 * 60 * 1000;

const DATE_ONLY = /^(\d{4})-(\d{2})-(\d{2})$/;
const DATE_TIME = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})(?::(\d{2})(?:\.\d{1,3})?)?(Z|[+-]\d{2}:\d{2})$/;

/**
 * Parses a date (YYYY-MM-DD, read as midnight UTC) or an ISO date-time with
 * an explicit offset, and returns the canonical UTC instant string.
 * Returns null for anything else, including impossible calendar dates.
 */
export function toCanonicalInstant(value: string): string | null {
  const dateOnly = DATE_ONLY.exec(value);
  const dateTime = dateOnly ? null : DATE_TIME.exec(value);
  const parts = dateOnly ?? dateTime;
  if (!parts) {
    return null;
  }

  const [, year, month, day] = parts;
  if (!isRealCalendarDate(Number(year), Number(month), Number(day))) {
    return null;
  }

  if (dateTime) {
    const [, , , , hour, minute, second = '0'] = dateTime;
    if (Number(hour) > 23 || Number(minute) > 59 || Number(second) > 59) {
      return null;
    }
  }

  const time = Date.parse(dateOnly ? `${value}T00:00:00Z` : value);
  return Number.isNaN(time) ? null : new Date(time).toISOString();
}

export function isCalendarDate(value: string): boolean {
  const parts = DATE_ONLY.exec(value);
  return parts !== null && isRealCalendarDate(Number(parts[1]), Number(parts[2]), Number(parts[3]));
}

function isRealCalendarDate(year: number, month: number, day: number): boolean {
  const date = new Date(Date.UTC(year, month - 1, day));
  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
}

/** UTC calendar date (YYYY-MM-DD) of a canonical instant. */
export function toCalendarDate(instant: string): string {
  return instant.slice(0, 10);
}

/**
 * Whole days billed for a stay: the elapsed time rounded up to the next
 * full day, never less than one.
 */
export function stayDays(arrivalDate: string, departureDate: string): number {
  const elapsed = Date.parse(departureDate) - Date.parse(arrivalDate);
  return Math.max(1, Math.ceil(elapsed / MS_PER_DAY));
}

/** Half-open [from, to) containment on YYYY-MM-DD strings; null `to` is open. */
export function isWithinRange(date: string, from: string, to: string | null): boolean {
  return date >= from && (to === null || date < to);
}

/** True when two half-open date ranges share at least one day. */
export function rangesIntersect(
  a: { effectiveFrom: string; effectiveTo: string | null },
  b: { effectiveFrom: string; effectiveTo: string | null }
): boolean {
  const aEndsAfterBStarts = a.effectiveTo === null || a.effectiveTo > b.effectiveFrom;
  const bEndsAfterAStarts = b.effectiveTo === null || b.effectiveTo > a.effectiveFrom;
  return aEndsAfterBStarts && bEndsAfterAStarts;
}
