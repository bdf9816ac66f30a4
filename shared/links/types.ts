import { z } from 'zod';

import type { MonthlyGrid } from '../aggregate/types';

export const TeamSchema = z.object({
  code: z.string().min(1),
  name: z.string(),
  coach: z.string().nullable().default(null),
  roster: z.array(z.string()).default([]),
  createdAt: z.string().optional(),
});

export type Team = z.infer<typeof TeamSchema>;

export const FamilyChildSchema = z.object({
  identity: z.string().min(1),
  color: z.string(),
});

export type FamilyChild = z.infer<typeof FamilyChildSchema>;

export const FamilySchema = z.object({
  code: z.string().min(1),
  name: z.string(),
  children: z.array(FamilyChildSchema).default([]),
  createdAt: z.string().optional(),
});

export type Family = z.infer<typeof FamilySchema>;

export type TeamOverviewRow = {
  identity: string;
  color: string | null;
  weeklyTotal: number;
  found: boolean;
};

export type TeamOverview = {
  code: string;
  name: string;
  week: string;
  rows: TeamOverviewRow[];
};

export type FamilyWeekChild = {
  identity: string;
  color: string;
  weeklyTotal: number;
  found: boolean;
};

export type FamilyWeek = {
  code: string;
  name: string;
  week: string;
  children: FamilyWeekChild[];
  month: MonthlyGrid;
};
