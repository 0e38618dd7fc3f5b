import { z } from 'zod';

export const blockKindSchema = z.enum(['deepWork', 'focusHours', 'freeTime']);

export type BlockKind = z.infer<typeof blockKindSchema>;

/** Kinds the enforcer actually polices; free time is filtered out before it reaches the core. */
export type WorkBlockKind = Exclude<BlockKind, 'freeTime'>;

export const timeBlockSchema = z
  .object({
    id: z.string().min(1),
    title: z.string(),
    description: z.string().default(''),
    kind: blockKindSchema,
    startMinute: z.number().int().min(0).max(1439),
    endMinute: z.number().int().min(1).max(1440),
  })
  .refine(block => block.endMinute > block.startMinute, { message: 'endMinute must be after startMinute' });

export type TimeBlock = z.infer<typeof timeBlockSchema>;

// Time outside any block. 'off' covers disabled, snoozed and free time.
export const scheduleGapSchema = z.enum(['unplanned', 'noPlan', 'off']);

export type ScheduleGap = z.infer<typeof scheduleGapSchema>;

export const observationTargetSchema = z.object({
  key: z.string().min(1), // bundle id for apps, hostname for tabs
  displayName: z.string(),
  kind: z.enum(['app', 'tab']),
  url: z.string().optional(),
});

export type ObservationTarget = z.infer<typeof observationTargetSchema>;

export const isWorkBlock = (block: TimeBlock | null): block is TimeBlock & { kind: WorkBlockKind } =>
  block !== null && block.kind !== 'freeTime';
