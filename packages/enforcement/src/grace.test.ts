import { describe, expect, it } from 'vitest';
import { enforcementTuningSchema } from '@driftguard/contracts';
import { GraceScheduler, graceDurationSeconds } from './grace';
import type { GraceRequest } from './grace';

const tuning = enforcementTuningSchema.parse({}).grace;

const request = (overrides: Partial<GraceRequest> = {}): GraceRequest => ({
  targetKey: 'com.example.game',
  displayName: 'Puzzle Game',
  targetKind: 'app',
  reason: 'Game',
  confidence: 80,
  isRevisit: false,
  isUnplanned: false,
  blockKind: 'focusHours',
  ...overrides,
});

describe('graceDurationSeconds', () => {
  it('takes the first matching rule', () => {
    expect(graceDurationSeconds(request({ isUnplanned: true, isRevisit: true, blockKind: null }), tuning)).toBe(5);
    expect(graceDurationSeconds(request({ blockKind: 'deepWork', isRevisit: true }), tuning)).toBe(5);
    expect(graceDurationSeconds(request({ isRevisit: true }), tuning)).toBe(15);
    expect(graceDurationSeconds(request(), tuning)).toBe(30);
  });
});

describe('GraceScheduler', () => {
  it('coalesces a repeat start for the same target without restarting the deadline', () => {
    const grace = new GraceScheduler(tuning);
    expect(grace.start(request(), 0)).toBe('started');
    expect(grace.start(request(), 20_000)).toBe('coalesced');
    expect(grace.takeDue(29_999)).toBeNull();
    expect(grace.takeDue(30_000)?.targetKey).toBe('com.example.game');
    expect(grace.takeDue(60_000)).toBeNull();
  });

  it('lets a different target supersede the pending one', () => {
    const grace = new GraceScheduler(tuning);
    grace.start(request(), 0);
    expect(grace.start(request({ targetKey: 'com.example.chat', displayName: 'Chat' }), 10_000)).toBe('superseded');
    expect(grace.takeDue(30_000)).toBeNull();
    expect(grace.takeDue(40_000)?.displayName).toBe('Chat');
  });

  it('cancels only grace that belongs to another target', () => {
    const grace = new GraceScheduler(tuning);
    grace.start(request(), 0);
    expect(grace.cancelUnless('com.example.game')).toBeNull();
    expect(grace.cancelUnless('com.example.editor')?.targetKey).toBe('com.example.game');
    expect(grace.current).toBeNull();
  });
});
