/** Genealogical partial date: `YYYY`, `YYYY-MM` or `YYYY-MM-DD`. */
export const PARTIAL_DATE_PATTERN = '^\\d{4}(-(0[1-9]|1[0-2])(-(0[1-9]|[12]\\d|3[01]))?)?$';

const PARTIAL_DATE = new RegExp(PARTIAL_DATE_PATTERN);

export function isPartialDate(value: string): boolean {
  return PARTIAL_DATE.test(value);
}

/**
 * Compares two partial dates on their common precision, so `1990` and
 * `1990-05-01` compare equal.
 */
export function comparePartialDates(a: string, b: string): number {
  const length = Math.min(a.length, b.length);
  const left = a.slice(0, length);
  const right = b.slice(0, length);
  if (left === right) return 0;
  return left < right ? -1 : 1;
}

export interface DateInterval {
  start: string | null;
  end: string | null;
}

/** Closed intervals; a missing bound is open-ended. */
export function intervalsOverlap(a: DateInterval, b: DateInterval): boolean {
  const startsBeforeOtherEnds = (start: string | null, end: string | null) =>
    start === null || end === null || comparePartialDates(start, end) <= 0;
  return startsBeforeOtherEnds(a.start, b.end) && startsBeforeOtherEnds(b.start, a.end);
}

/** Sort helper: dated values first in ascending order, undated last. */
export function compareOptionalDates(a: string | null, b: string | null): number {
  if (a === b) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  return a < b ? -1 : 1;
}
