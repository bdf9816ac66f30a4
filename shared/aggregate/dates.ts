import { format, getISOWeek, getISOWeekYear, isValid, parse } from 'date-fns';

export const RECORD_DATE_FORMAT = 'yyyy-MM-dd';

const RECORD_DATE_SHAPE = /^\d{4}-\d{1,2}-\d{1,2}$/;
const PARSE_BASE = new Date(2000, 0, 1);

/** Parses a `YYYY-MM-DD` record date as local midnight; anything else is null. */
export function parseRecordDate(value: unknown): Date | null {
  if (typeof value !== 'string') {
    return null;
  }
  const trimmed = value.trim();
  if (!RECORD_DATE_SHAPE.test(trimmed)) {
    return null;
  }
  const parsed = parse(trimmed, RECORD_DATE_FORMAT, PARSE_BASE);
  return isValid(parsed) ? parsed : null;
}

export function formatRecordDate(date: Date): string {
  return format(date, RECORD_DATE_FORMAT);
}

export type IsoWeek = {
  year: number;
  week: number;
};

export function isoWeekOf(date: Date): IsoWeek {
  return { year: getISOWeekYear(date), week: getISOWeek(date) };
}

export function isoWeekId(date: Date): string {
  const { year, week } = isoWeekOf(date);
  return `${year}-W${String(week).padStart(2, '0')}`;
}

export function sameIsoWeek(a: Date, b: Date): boolean {
  return getISOWeekYear(a) === getISOWeekYear(b) && getISOWeek(a) === getISOWeek(b);
}

export function sameDay(a: Date, b: Date): boolean {
  return a.getFullYear() === b.getFullYear() && a.getMonth() === b.getMonth() && a.getDate() === b.getDate();
}
