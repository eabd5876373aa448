const ISO_DATE_PREFIX = /^(\d{4})-(\d{2})-(\d{2})/;

export interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

export function utcDateStamp(now: Date = new Date()): string {
  return now.toISOString().slice(0, 10);
}

export function calendarDateOf(now: Date): CalendarDate {
  return { year: now.getUTCFullYear(), month: now.getUTCMonth() + 1, day: now.getUTCDate() };
}

export function parseCalendarDate(value: unknown): CalendarDate | null {
  if (typeof value !== 'string') {
    return null;
  }
  const match = ISO_DATE_PREFIX.exec(value.trim());
  if (!match) {
    return null;
  }
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const candidate = new Date(Date.UTC(year, month - 1, day));
  if (
    candidate.getUTCFullYear() !== year ||
    candidate.getUTCMonth() !== month - 1 ||
    candidate.getUTCDate() !== day
  ) {
    return null;
  }
  return { year, month, day };
}

/** Completed years from `from` to `to`; negative when `from` is in the future. */
export function wholeYearsBetween(from: CalendarDate, to: CalendarDate): number {
  let years = to.year - from.year;
  if (to.month < from.month || (to.month === from.month && to.day < from.day)) {
    years -= 1;
  }
  return years;
}
