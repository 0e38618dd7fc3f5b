import type { ObservationTarget, WorkBlockKind } from '@driftguard/contracts';

/**
 * Per-block escalation trackers. A "run" is a contiguous off-target streak;
 * some fields live for the run, the rest for the whole block.
 */
export type RunState = {
  offTargetKey: string | null;
  offTargetName: string;
  offTargetKind: ObservationTarget['kind'] | null;
  nudgeShownForCurrentRun: boolean;
  lastNudgeAtSeconds: number;
  interventionCount: number;
  lastInterventionAtSeconds: number;
  oneShotRedirectFired: boolean;
  grayscaleTriggeredThisBlock: boolean;
  grayscaleActiveThisRun: boolean;
  redirectedTargets: Set<string>;
  warnedTargets: Set<string>;
  // Target whose grace-period action (overlay or nudge) is on screen
  enforcedTargetKey: string | null;
  lastOffTargetEndTime: number | null;
};

export const createRunState = (): RunState => ({
  offTargetKey: null,
  offTargetName: '',
  offTargetKind: null,
  nudgeShownForCurrentRun: false,
  lastNudgeAtSeconds: 0,
  interventionCount: 0,
  lastInterventionAtSeconds: 0,
  oneShotRedirectFired: false,
  grayscaleTriggeredThisBlock: false,
  grayscaleActiveThisRun: false,
  redirectedTargets: new Set(),
  warnedTargets: new Set(),
  enforcedTargetKey: null,
  lastOffTargetEndTime: null,
});

export const isOffTarget = (run: RunState): boolean => run.offTargetKey !== null;

export type RunEntry = {
  newRun: boolean;
  targetSwitched: boolean;
};

export const enterOffTarget = (run: RunState, target: ObservationTarget, kind: WorkBlockKind | null): RunEntry => {
  const newRun = run.offTargetKey === null;
  const targetSwitched = run.offTargetKey !== target.key;
  // Deep Work warns once per target; Focus Hours keeps one nudge streak across switches
  if (!newRun && targetSwitched && kind === 'deepWork') {
    run.nudgeShownForCurrentRun = false;
  }
  run.offTargetKey = target.key;
  run.offTargetName = target.displayName;
  run.offTargetKind = target.kind;
  return { newRun, targetSwitched };
};

/** Returns false when there was no run to end. */
export const endRun = (run: RunState, now: number): boolean => {
  if (run.offTargetKey === null) return false;
  run.offTargetKey = null;
  run.offTargetName = '';
  run.offTargetKind = null;
  run.nudgeShownForCurrentRun = false;
  run.grayscaleActiveThisRun = false;
  run.enforcedTargetKey = null;
  run.lastOffTargetEndTime = now;
  return true;
};

/**
 * Re-arms one-shot actions once the counter has decayed below their threshold.
 * Warning and intervention levels stay crossed for the block.
 */
export const rearm = (run: RunState, kind: WorkBlockKind, seconds: number, thresholds: { redirectSeconds: number }): void => {
  if (kind === 'deepWork' && run.oneShotRedirectFired && seconds < thresholds.redirectSeconds) {
    run.oneShotRedirectFired = false;
  }
};
