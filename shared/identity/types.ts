import { z } from 'zod';

import { MetricLogsSchema, type MetricRecord } from '../aggregate/types';

export const FamilyContactSchema = z.object({
  parentName: z.string().default(''),
  parentEmail: z.string().default(''),
  phone: z.string().default(''),
  notes: z.string().default(''),
});

export type FamilyContact = z.infer<typeof FamilyContactSchema>;

export const AthleteProfileSchema = z.object({
  identity: z.string().min(1),
  pin: z.string(),
  color: z.string(),
  createdAt: z.string().optional(),
  teams: z.array(z.string()).default([]),
  logs: MetricLogsSchema.default({}),
  family: FamilyContactSchema.optional(),
});

export type AthleteProfile = z.infer<typeof AthleteProfileSchema>;

export const CoachAccountSchema = z.object({
  identity: z.string().min(1),
  pin: z.string(),
  createdAt: z.string().optional(),
});

export type CoachAccount = z.infer<typeof CoachAccountSchema>;

export type AthleteSeed = {
  color?: string;
  teams?: string[];
  logs?: Record<string, MetricRecord[]>;
  family?: Partial<FamilyContact>;
};

export type RecordInput = {
  date: string;
  amount: number;
  [attribute: string]: unknown;
};
