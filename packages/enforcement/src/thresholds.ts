import type { EnforcementTuning, ObservationTarget, WorkBlockKind } from '@driftguard/contracts';
import type { RunState } from './run-state';

export type PolicyAction =
  | { type: 'nudge'; thresholdSeconds: number }
  | { type: 'warningNudge'; thresholdSeconds: number }
  | { type: 'persistentNudge' }
  | { type: 'grayscale' }
  | { type: 'redirect'; instant: boolean }
  | { type: 'intervention'; thresholdSeconds: number; ordinal: number; durationSeconds: number };

export type PolicyContext = {
  targetKey: string;
  targetKind: ObservationTarget['kind'];
  /** The off-target key changed with this observation. */
  revisit: boolean;
  nudgeVisible: boolean;
  interventionVisible: boolean;
};

export type ThresholdRule = {
  action: PolicyAction['type'];
  recurrence: 'repeating' | 'oncePerRun' | 'oncePerBlock' | 'rearmable';
  /** Sort key; rules are consulted from the highest threshold down. */
  threshold: number;
  due(seconds: number, run: Readonly<RunState>, ctx: PolicyContext): PolicyAction | null;
};

export const interventionDurationSeconds = (ordinal: number, tuning: EnforcementTuning['intervention']): number =>
  Math.min(tuning.baseSeconds + tuning.stepSeconds * (ordinal - 1), tuning.maxSeconds);

const interventionRule = (repeatSeconds: number, tuning: EnforcementTuning): ThresholdRule => ({
  action: 'intervention',
  recurrence: 'repeating',
  threshold: repeatSeconds,
  due: (seconds, run) => {
    const next = run.lastInterventionAtSeconds + repeatSeconds;
    if (seconds < next) return null;
    const ordinal = run.interventionCount + 1;
    return {
      type: 'intervention',
      thresholdSeconds: next,
      ordinal,
      durationSeconds: interventionDurationSeconds(ordinal, tuning.intervention),
    };
  },
});

export const nextFocusNudgeAt = (lastNudgeAtSeconds: number, firstSeconds: number, repeatSeconds: number): number => {
  if (lastNudgeAtSeconds < firstSeconds) return firstSeconds;
  return firstSeconds + repeatSeconds * (Math.floor((lastNudgeAtSeconds - firstSeconds) / repeatSeconds) + 1);
};

export const deepWorkTable = (tuning: EnforcementTuning): ThresholdRule[] => {
  const { nudgeSeconds, redirectSeconds, interventionSeconds } = tuning.deepWork;
  return [
    interventionRule(interventionSeconds, tuning),
    {
      action: 'redirect',
      recurrence: 'rearmable',
      threshold: redirectSeconds,
      due: (seconds, run, ctx) => {
        if (ctx.targetKind !== 'tab') return null;
        if (ctx.revisit && run.redirectedTargets.has(ctx.targetKey)) return { type: 'redirect', instant: true };
        if (seconds >= redirectSeconds && !run.oneShotRedirectFired) return { type: 'redirect', instant: false };
        return null;
      },
    },
    {
      action: 'nudge',
      recurrence: 'oncePerRun',
      threshold: nudgeSeconds,
      due: (seconds, run) =>
        seconds >= nudgeSeconds && !run.nudgeShownForCurrentRun ? { type: 'nudge', thresholdSeconds: nudgeSeconds } : null,
    },
  ];
};

export const focusHoursTable = (tuning: EnforcementTuning): ThresholdRule[] => {
  const { firstNudgeSeconds, nudgeRepeatSeconds, grayscaleSeconds, warningSeconds, interventionSeconds } =
    tuning.focusHours;
  return [
    interventionRule(interventionSeconds, tuning),
    {
      // Level 2 nudge between interventions, re-shown whenever nothing is on screen
      action: 'persistentNudge',
      recurrence: 'repeating',
      threshold: interventionSeconds,
      due: (_seconds, run, ctx) =>
        run.interventionCount > 0 && !ctx.nudgeVisible && !ctx.interventionVisible ? { type: 'persistentNudge' } : null,
    },
    {
      action: 'warningNudge',
      recurrence: 'oncePerBlock',
      threshold: warningSeconds,
      due: (seconds, run) =>
        seconds >= warningSeconds && run.lastNudgeAtSeconds < warningSeconds
          ? { type: 'warningNudge', thresholdSeconds: warningSeconds }
          : null,
    },
    {
      action: 'grayscale',
      recurrence: 'oncePerRun',
      threshold: grayscaleSeconds,
      due: (seconds, run) => (seconds >= grayscaleSeconds && !run.grayscaleActiveThisRun ? { type: 'grayscale' } : null),
    },
    {
      action: 'nudge',
      recurrence: 'repeating',
      threshold: firstNudgeSeconds,
      due: (seconds, run) => {
        const next = nextFocusNudgeAt(run.lastNudgeAtSeconds, firstNudgeSeconds, nudgeRepeatSeconds);
        if (next >= warningSeconds || seconds >= warningSeconds || seconds < next) return null;
        return { type: 'nudge', thresholdSeconds: next };
      },
    },
  ];
};

export const thresholdTable = (kind: WorkBlockKind, tuning: EnforcementTuning): ThresholdRule[] =>
  (kind === 'deepWork' ? deepWorkTable(tuning) : focusHoursTable(tuning)).sort((a, b) => b.threshold - a.threshold);

/** First due rule wins, so one tick escalates at most one step. */
export const evaluateThresholds = (
  table: readonly ThresholdRule[],
  seconds: number,
  run: Readonly<RunState>,
  ctx: PolicyContext,
): PolicyAction | null => {
  for (const rule of table) {
    const action = rule.due(seconds, run, ctx);
    if (action) return action;
  }
  return null;
};

/** Advances run-state for a fired action. */
export const recordAction = (run: RunState, action: PolicyAction, targetKey: string): void => {
  switch (action.type) {
    case 'nudge':
      run.nudgeShownForCurrentRun = true;
      run.lastNudgeAtSeconds = Math.max(run.lastNudgeAtSeconds, action.thresholdSeconds);
      return;
    case 'warningNudge':
      run.nudgeShownForCurrentRun = true;
      run.lastNudgeAtSeconds = Math.max(run.lastNudgeAtSeconds, action.thresholdSeconds);
      return;
    case 'persistentNudge':
      return;
    case 'grayscale':
      run.grayscaleTriggeredThisBlock = true;
      run.grayscaleActiveThisRun = true;
      return;
    case 'redirect':
      run.oneShotRedirectFired = true;
      run.redirectedTargets.add(targetKey);
      run.grayscaleTriggeredThisBlock = true;
      run.grayscaleActiveThisRun = true;
      return;
    case 'intervention':
      run.interventionCount = action.ordinal;
      run.lastInterventionAtSeconds = action.thresholdSeconds;
      return;
  }
};
