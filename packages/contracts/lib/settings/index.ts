import { z } from 'zod';

export const blockEnforcementSchema = z.object({
  nudgeNotifications: z.boolean(),
  screenGrayscale: z.boolean(),
  autoRedirect: z.boolean(),
  blockingOverlay: z.boolean(),
  interventionExercises: z.boolean(),
});

export type BlockEnforcement = z.infer<typeof blockEnforcementSchema>;

export const enforcementTogglesSchema = z.object({
  deepWork: blockEnforcementSchema.default({
    nudgeNotifications: true,
    screenGrayscale: true,
    autoRedirect: true,
    blockingOverlay: true,
    interventionExercises: true,
  }),
  focusHours: blockEnforcementSchema.default({
    nudgeNotifications: true,
    screenGrayscale: true,
    autoRedirect: false,
    blockingOverlay: true,
    interventionExercises: true,
  }),
});

export type EnforcementToggles = z.infer<typeof enforcementTogglesSchema>;

export type EnforcementTogglesInput = z.input<typeof enforcementTogglesSchema>;

const seconds = (fallback: number) => z.number().nonnegative().default(fallback);

export const enforcementTuningSchema = z.object({
  pollIntervalSeconds: z.number().positive().default(10),
  decayRatio: z.number().min(0).max(1).default(0.5),
  deepWork: z
    .object({
      nudgeSeconds: seconds(10),
      redirectSeconds: seconds(20),
      interventionSeconds: seconds(300),
    })
    .default({}),
  focusHours: z
    .object({
      firstNudgeSeconds: seconds(10),
      nudgeRepeatSeconds: z.number().positive().default(60),
      grayscaleSeconds: seconds(30),
      warningSeconds: seconds(240),
      interventionSeconds: seconds(300),
    })
    .default({}),
  intervention: z
    .object({
      baseSeconds: z.number().int().positive().default(60),
      stepSeconds: z.number().int().nonnegative().default(30),
      maxSeconds: z.number().int().positive().default(120),
    })
    .default({}),
  grace: z
    .object({
      firstSeconds: seconds(30),
      revisitSeconds: seconds(15),
      unplannedSeconds: seconds(5),
      deepWorkAppSeconds: seconds(5),
    })
    .default({}),
  suppression: z
    .object({
      deepWorkJustificationSeconds: seconds(180),
      snoozeSeconds: seconds(300),
    })
    .default({}),
  grayscale: z
    .object({
      fullIntensityWindowSeconds: seconds(60),
      resetAfterSeconds: seconds(180),
    })
    .default({}),
  nudgeAutoDismissSeconds: seconds(8),
  fallbackWorkUrl: z.string().url().default('https://www.google.com'),
  delegatedHosts: z
    .array(z.string().min(1))
    .default([
      'youtube.com',
      'www.youtube.com',
      'm.youtube.com',
      'instagram.com',
      'www.instagram.com',
      'facebook.com',
      'www.facebook.com',
      'x.com',
      'twitter.com',
      'www.reddit.com',
      'reddit.com',
      'www.tiktok.com',
    ]),
});

export type EnforcementTuning = z.infer<typeof enforcementTuningSchema>;

export type EnforcementTuningInput = z.input<typeof enforcementTuningSchema>;

export const lifecycleOptionsSchema = z.object({
  startRitual: z.boolean().default(false),
  endCelebration: z.boolean().default(false),
});

export type LifecycleOptions = z.infer<typeof lifecycleOptionsSchema>;

export type LifecycleOptionsInput = z.input<typeof lifecycleOptionsSchema>;
