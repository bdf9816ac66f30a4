import { z } from 'zod';

import { MetricLogsSchema } from '../aggregate/types';

export const ShareSnapshotSchema = z.object({
  code: z.string().min(1),
  identity: z.string().min(1),
  generatedAt: z.string(),
  week: z.string(),
  logs: MetricLogsSchema,
  weeklyTotals: z.record(z.number()),
});

export type ShareSnapshot = z.infer<typeof ShareSnapshotSchema>;
