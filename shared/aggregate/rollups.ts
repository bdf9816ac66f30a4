import { getDaysInMonth } from 'date-fns';

import { formatRecordDate, parseRecordDate, sameDay, sameIsoWeek } from './dates';
import type { DatedAmount, MonthlyDay, MonthlyGrid, TaggedLog } from './types';

/** Whole units, as logged; non-finite amounts contribute nothing. */
function amountOf(record: DatedAmount): number {
  const value = Number(record.amount);
  return Number.isFinite(value) ? Math.trunc(value) : 0;
}

function sumWhere(records: readonly DatedAmount[], matches: (date: Date) => boolean): number {
  let total = 0;
  for (const record of records) {
    const date = parseRecordDate(record.date);
    if (!date || !matches(date)) {
      continue;
    }
    total += amountOf(record);
  }
  return total;
}

/** Sum of amounts dated in the same ISO week (week-year and week number) as `referenceDate`. */
export function weeklyTotal(records: readonly DatedAmount[], referenceDate: Date = new Date()): number {
  return sumWhere(records, (date) => sameIsoWeek(date, referenceDate));
}

export function dailyTotal(records: readonly DatedAmount[], referenceDate: Date = new Date()): number {
  return sumWhere(records, (date) => sameDay(date, referenceDate));
}

export function weeklyTotalsByLog(
  logs: Readonly<Record<string, readonly DatedAmount[]>>,
  names: readonly string[],
  referenceDate: Date = new Date(),
): Record<string, number> {
  const totals: Record<string, number> = {};
  for (const name of names) {
    totals[name] = weeklyTotal(logs[name] ?? [], referenceDate);
  }
  return totals;
}

/** Concatenates logs in argument order. No deduplication. */
export function combine<R extends DatedAmount>(...logs: ReadonlyArray<readonly R[]>): R[] {
  const merged: R[] = [];
  for (const log of logs) {
    merged.push(...log);
  }
  return merged;
}

/**
 * Buckets every subject's records by day of the given month (1-12). Every day
 * of the month is present; `tags` lists each contributing subject once, in
 * subject order. An invalid year or month yields an empty grid.
 */
export function monthlyGrid(subjects: readonly TaggedLog[], year: number, month: number): MonthlyGrid {
  const grid: MonthlyGrid = {};
  if (!Number.isInteger(year) || !Number.isInteger(month) || month < 1 || month > 12) {
    return grid;
  }
  const first = new Date(year, month - 1, 1);
  const days = getDaysInMonth(first);
  for (let day = 1; day <= days; day += 1) {
    const entry: MonthlyDay = {
      date: formatRecordDate(new Date(year, month - 1, day)),
      total: 0,
      tags: [],
    };
    grid[day] = entry;
  }
  for (const subject of subjects) {
    for (const record of subject.records) {
      const date = parseRecordDate(record.date);
      if (!date || date.getFullYear() !== year || date.getMonth() !== month - 1) {
        continue;
      }
      const entry = grid[date.getDate()];
      if (!entry) {
        continue;
      }
      entry.total += amountOf(record);
      if (!entry.tags.includes(subject.tag)) {
        entry.tags.push(subject.tag);
      }
    }
  }
  return grid;
}
