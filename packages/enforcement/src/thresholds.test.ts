import { describe, expect, it } from 'vitest';
import { enforcementTuningSchema } from '@driftguard/contracts';
import { createRunState } from './run-state';
import {
  evaluateThresholds,
  interventionDurationSeconds,
  nextFocusNudgeAt,
  recordAction,
  thresholdTable,
} from './thresholds';
import type { PolicyContext } from './thresholds';

const tuning = enforcementTuningSchema.parse({});

const ctx = (overrides: Partial<PolicyContext> = {}): PolicyContext => ({
  targetKey: 'video.example.com',
  targetKind: 'tab',
  revisit: false,
  nudgeVisible: false,
  interventionVisible: false,
  ...overrides,
});

describe('interventionDurationSeconds', () => {
  it('grows by thirty seconds per intervention up to two minutes', () => {
    expect([1, 2, 3, 4].map(n => interventionDurationSeconds(n, tuning.intervention))).toEqual([60, 90, 120, 120]);
  });
});

describe('nextFocusNudgeAt', () => {
  it('schedules level-1 nudges at 10s then every minute', () => {
    expect(nextFocusNudgeAt(0, 10, 60)).toBe(10);
    expect(nextFocusNudgeAt(10, 10, 60)).toBe(70);
    expect(nextFocusNudgeAt(130, 10, 60)).toBe(190);
    expect(nextFocusNudgeAt(190, 10, 60)).toBe(250);
  });
});

describe('thresholdTable', () => {
  it('orders rules from the highest threshold down', () => {
    expect(thresholdTable('deepWork', tuning).map(rule => rule.action)).toEqual(['intervention', 'redirect', 'nudge']);
    expect(thresholdTable('focusHours', tuning).map(rule => rule.action)).toEqual([
      'intervention',
      'persistentNudge',
      'warningNudge',
      'grayscale',
      'nudge',
    ]);
  });
});

describe('evaluateThresholds', () => {
  it('fires a single action when several thresholds are crossed at once', () => {
    const table = thresholdTable('deepWork', tuning);
    const run = createRunState();
    expect(evaluateThresholds(table, 310, run, ctx())).toEqual({
      type: 'intervention',
      thresholdSeconds: 300,
      ordinal: 1,
      durationSeconds: 60,
    });
  });

  it('nudges once per Deep Work run and redirects once the one-shot is armed', () => {
    const table = thresholdTable('deepWork', tuning);
    const run = createRunState();
    const nudge = evaluateThresholds(table, 10, run, ctx());
    expect(nudge).toEqual({ type: 'nudge', thresholdSeconds: 10 });
    if (nudge) recordAction(run, nudge, 'video.example.com');
    expect(evaluateThresholds(table, 10, run, ctx())).toBeNull();

    const redirect = evaluateThresholds(table, 20, run, ctx());
    expect(redirect).toEqual({ type: 'redirect', instant: false });
    if (redirect) recordAction(run, redirect, 'video.example.com');
    expect(run.redirectedTargets.has('video.example.com')).toBe(true);
    expect(run.grayscaleTriggeredThisBlock).toBe(true);
    expect(evaluateThresholds(table, 30, run, ctx())).toBeNull();
  });

  it('redirects a revisited target instantly', () => {
    const table = thresholdTable('deepWork', tuning);
    const run = createRunState();
    run.redirectedTargets.add('video.example.com');
    run.oneShotRedirectFired = true;
    expect(evaluateThresholds(table, 0, run, ctx({ revisit: true }))).toEqual({ type: 'redirect', instant: true });
  });

  it('never redirects native apps', () => {
    const table = thresholdTable('deepWork', tuning);
    const run = createRunState();
    run.nudgeShownForCurrentRun = true;
    expect(evaluateThresholds(table, 40, run, ctx({ targetKind: 'app' }))).toBeNull();
  });

  it('re-shows the level-2 nudge between interventions only while nothing is visible', () => {
    const table = thresholdTable('focusHours', tuning);
    const run = createRunState();
    recordAction(run, { type: 'intervention', thresholdSeconds: 300, ordinal: 1, durationSeconds: 60 }, 'feed');
    run.lastNudgeAtSeconds = 240;
    run.grayscaleActiveThisRun = true;
    expect(evaluateThresholds(table, 320, run, ctx({ interventionVisible: true }))).toBeNull();
    expect(evaluateThresholds(table, 320, run, ctx())).toEqual({ type: 'persistentNudge' });
    expect(evaluateThresholds(table, 320, run, ctx({ nudgeVisible: true }))).toBeNull();
  });
});
