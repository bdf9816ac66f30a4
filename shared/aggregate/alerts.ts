import { DEFAULT_CONFIG, type LoadThresholds } from '../core/config';
import { dailyTotal, weeklyTotal } from './rollups';
import type { DatedAmount, LoadAlert, WeeklyBand } from './types';

export function loadAlerts(
  records: readonly DatedAmount[],
  referenceDate: Date = new Date(),
  thresholds: LoadThresholds = DEFAULT_CONFIG.loadThresholds,
): LoadAlert[] {
  const alerts: LoadAlert[] = [];
  const daily = dailyTotal(records, referenceDate);
  if (daily > thresholds.dailyMinutes) {
    alerts.push({ kind: 'high-daily', severity: 'red', total: daily, threshold: thresholds.dailyMinutes });
  }
  const weekly = weeklyTotal(records, referenceDate);
  if (weekly > thresholds.weeklyMinutes) {
    alerts.push({ kind: 'high-weekly', severity: 'yellow', total: weekly, threshold: thresholds.weeklyMinutes });
  }
  return alerts;
}

const BANDS: ReadonlyArray<{ min: number; band: WeeklyBand }> = [
  { min: 300, band: 'excellent' },
  { min: 240, band: 'very-good' },
  { min: 180, band: 'good' },
  { min: 120, band: 'high' },
];

export function weeklyBand(total: number): WeeklyBand {
  for (const { min, band } of BANDS) {
    if (total >= min) {
      return band;
    }
  }
  return 'light';
}
