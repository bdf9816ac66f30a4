import { z } from 'zod';

export const PlanTargetTypeSchema = z.enum(['team', 'athlete']);

export type PlanTargetType = z.infer<typeof PlanTargetTypeSchema>;

/** Index entry for an uploaded plan; `file` is an opaque reference to the stored upload. */
export const TrainingPlanSchema = z.object({
  file: z.string().min(1),
  title: z.string(),
  uploadedAt: z.string(),
  assignedTo: z.string(),
  type: PlanTargetTypeSchema,
  uploadedBy: z.string(),
});

export type TrainingPlan = z.infer<typeof TrainingPlanSchema>;

export const PlanIndexSchema = z.object({
  plans: z.array(TrainingPlanSchema).default([]),
});

export type PlanIndex = z.infer<typeof PlanIndexSchema>;

export type PlanTarget = { type: 'team'; code: string } | { type: 'athlete'; identity: string };

export type PlanMeta = {
  file: string;
  title?: string;
};

/** Plans visible to an athlete from one source: their own assignments or one team. */
export type PlanGroup = {
  type: PlanTargetType;
  assignedTo: string;
  plans: TrainingPlan[];
};
