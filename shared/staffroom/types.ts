import { z } from 'zod';

export const StaffroomMessageSchema = z.object({
  id: z.string(),
  author: z.string(),
  teamCode: z.string().nullable().default(null),
  text: z.string(),
  postedAt: z.string(),
});

export type StaffroomMessage = z.infer<typeof StaffroomMessageSchema>;

export const StaffroomBoardSchema = z.object({
  messages: z.array(StaffroomMessageSchema).default([]),
});

export type StaffroomBoard = z.infer<typeof StaffroomBoardSchema>;

export type ListMessagesOptions = {
  teamCode?: string;
  limit?: number;
};
