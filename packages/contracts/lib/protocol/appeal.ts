import { z } from 'zod';

export const justificationSchema = z.object({
  text: z.string().trim().min(1).max(500),
});

export type Justification = z.infer<typeof justificationSchema>;

export const justificationOutcomeSchema = z.enum(['accepted', 'rejected', 'stale']);

export type JustificationOutcome = z.infer<typeof justificationOutcomeSchema>;
