import { z } from 'zod';

export type CodeNamespace = 'team' | 'family' | 'share';

export const CodeIndexSchema = z.object({
  codes: z.array(z.string()),
});

export type CodeIndex = z.infer<typeof CodeIndexSchema>;
