import { z } from 'zod';

export type DatedAmount = {
  date: string;
  amount: number;
};

/**
 * Older logs carry the metric as `minutes`; it is lifted into `amount` and a
 * record without either counts as zero. Other attributes pass through.
 */
function liftLegacyAmount(raw: unknown): unknown {
  if (!raw || typeof raw !== 'object' || Array.isArray(raw)) {
    return raw;
  }
  const record: Record<string, unknown> = { ...raw };
  if (typeof record.amount === 'number') {
    return record;
  }
  const { minutes, ...rest } = record;
  const numeric = typeof minutes === 'number' || typeof minutes === 'string' ? Number(minutes) : 0;
  return { ...rest, amount: Number.isFinite(numeric) ? numeric : 0 };
}

export const MetricRecordSchema = z.preprocess(
  liftLegacyAmount,
  z
    .object({
      date: z.string(),
      amount: z.number(),
    })
    .passthrough(),
);

export type MetricRecord = z.infer<typeof MetricRecordSchema>;

/** A log keeps whichever entries parse; malformed entries are dropped rather than failing the document. */
export const MetricLogSchema = z.array(z.unknown()).transform((items) => {
  const records: MetricRecord[] = [];
  for (const item of items) {
    const parsed = MetricRecordSchema.safeParse(item);
    if (parsed.success) {
      records.push(parsed.data);
    }
  }
  return records;
});

export const MetricLogsSchema = z.record(MetricLogSchema);

export type MetricLogs = Record<string, MetricRecord[]>;

export type TaggedLog<R extends DatedAmount = DatedAmount> = {
  tag: string;
  records: readonly R[];
};

export type MonthlyDay = {
  date: string;
  total: number;
  tags: string[];
};

export type MonthlyGrid = Record<number, MonthlyDay>;

export type LoadAlertKind = 'high-daily' | 'high-weekly';

export type LoadAlert = {
  kind: LoadAlertKind;
  severity: 'red' | 'yellow';
  total: number;
  threshold: number;
};

export type WeeklyBand = 'excellent' | 'very-good' | 'good' | 'high' | 'light';
