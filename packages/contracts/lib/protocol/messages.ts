import { z } from 'zod';

export const showNudgeCommandSchema = z.object({
  type: z.literal('showNudge'),
  intention: z.string(),
  displayName: z.string(),
  escalated: z.boolean(),
  distractionMinutes: z.number().int().nonnegative(),
  warning: z.boolean(),
});

export const dismissNudgeCommandSchema = z.object({ type: z.literal('dismissNudge') });

export const showOverlayCommandSchema = z.object({
  type: z.literal('showOverlay'),
  intention: z.string(),
  reason: z.string(),
  focusDurationMinutes: z.number().int().nonnegative(),
  isNoPlan: z.boolean(),
  displayName: z.string(),
  canSnooze: z.boolean(),
});

export const dismissOverlayCommandSchema = z.object({ type: z.literal('dismissOverlay') });

export const showInterventionCommandSchema = z.object({
  type: z.literal('showIntervention'),
  intention: z.string(),
  displayName: z.string(),
  distractionMinutes: z.number().int().nonnegative(),
  durationSeconds: z.number().int().positive(),
});

export const setGrayscaleCommandSchema = z.object({
  type: z.literal('setGrayscale'),
  active: z.boolean(),
  intensity: z.number().min(0).max(1),
});

export const setTimerIndicatorCommandSchema = z.object({
  type: z.literal('setTimerIndicator'),
  distracted: z.boolean(),
});

export const redirectToUrlCommandSchema = z.object({
  type: z.literal('redirectToURL'),
  url: z.string().min(1),
});

export const redirectToBlockPageCommandSchema = z.object({
  type: z.literal('redirectToBlockPage'),
  reason: z.string(),
});

export const approvePageTitleCommandSchema = z.object({
  type: z.literal('approvePageTitleInScorer'),
  title: z.string(),
  forIntention: z.string(),
});

// One-way commands from the enforcer to presentation collaborators
export const enforcementCommandSchema = z.discriminatedUnion('type', [
  showNudgeCommandSchema,
  dismissNudgeCommandSchema,
  showOverlayCommandSchema,
  dismissOverlayCommandSchema,
  showInterventionCommandSchema,
  setGrayscaleCommandSchema,
  setTimerIndicatorCommandSchema,
  redirectToUrlCommandSchema,
  redirectToBlockPageCommandSchema,
  approvePageTitleCommandSchema,
]);

export type EnforcementCommand = z.infer<typeof enforcementCommandSchema>;

export type EnforcementCommandType = EnforcementCommand['type'];

export type CommandOf<T extends EnforcementCommandType> = Extract<EnforcementCommand, { type: T }>;

export type AgentInvokeResponse = {
  ok: boolean;
  data?: unknown;
  error?: { code: string; message: string };
};
