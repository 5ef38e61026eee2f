/**
 * Pro Forma — Calendar helpers
 *
 * Dates travel as ISO `YYYY-MM-DD` strings and are computed in UTC so a run
 * never depends on the host time zone.
 */

const MS_PER_DAY = 86_400_000;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

export function parseIsoDate(value: string): Date {
  const m = ISO_DATE.exec(value);
  if (!m) throw new RangeError(`Not an ISO date: ${value}`);
  const [year, month, day] = [Number(m[1]), Number(m[2]), Number(m[3])];
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    throw new RangeError(`Not a calendar date: ${value}`);
  }
  return date;
}

export function isIsoDate(value: string): boolean {
  try {
    parseIsoDate(value);
    return true;
  } catch {
    return false;
  }
}

export function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function daysInMonth(year: number, monthIndex: number): number {
  return new Date(Date.UTC(year, monthIndex + 1, 0)).getUTCDate();
}

/**
 * Add calendar months, clamping to month end (Mar 31 + 1 month = Apr 30).
 * Always offset from the anchor, never chained, so Mar 31 + 2 = May 31.
 */
export function addMonths(isoDate: string, months: number): string {
  const base = parseIsoDate(isoDate);
  const total = base.getUTCMonth() + months;
  const year = base.getUTCFullYear() + Math.floor(total / 12);
  const monthIndex = ((total % 12) + 12) % 12;
  const day = Math.min(base.getUTCDate(), daysInMonth(year, monthIndex));
  return toIsoDate(new Date(Date.UTC(year, monthIndex, day)));
}

export function daysBetween(fromIso: string, toIso: string): number {
  return Math.round((parseIsoDate(toIso).getTime() - parseIsoDate(fromIso).getTime()) / MS_PER_DAY);
}

/** Period dates 0..count-1, each offset from the acquisition date. */
export function buildPeriodDates(acquisitionDate: string, count: number): string[] {
  const dates: string[] = [];
  for (let t = 0; t < count; t++) dates.push(addMonths(acquisitionDate, t));
  return dates;
}
