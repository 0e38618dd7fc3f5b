import { z } from 'zod';
import { observationTargetSchema } from '../domain';

export const relevanceRequestSchema = z.object({
  title: z.string(),
  intention: z.string(),
  description: z.string().default(''),
  contentType: z.enum(['webpage', 'application']).default('webpage'),
});

export type RelevanceRequest = z.infer<typeof relevanceRequestSchema>;

export const relevanceVerdictSchema = z.object({
  relevant: z.boolean(),
  confidence: z.number().int().min(0).max(100).default(0),
  reason: z.string().default(''),
});

export type RelevanceVerdict = z.infer<typeof relevanceVerdictSchema>;

export const observationSchema = relevanceVerdictSchema.extend({
  target: observationTargetSchema,
});

export type Observation = z.infer<typeof observationSchema>;

/** Oracle contract: scores a title or app name against the block intention. */
export interface RelevanceOracle {
  score(request: RelevanceRequest): Promise<RelevanceVerdict>;
}
