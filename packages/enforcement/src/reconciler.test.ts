import { describe, expect, it } from 'vitest';
import { enforcementTuningSchema } from '@driftguard/contracts';
import { grayscaleIntensity, reconcileGrayscale, shouldBeGray } from './reconciler';

const tuning = enforcementTuningSchema.parse({}).grayscale;

describe('grayscaleIntensity', () => {
  it('stays at full intensity for quick returns', () => {
    expect(grayscaleIntensity(0, tuning)).toBe(1);
    expect(grayscaleIntensity(59, tuning)).toBe(1);
  });

  it('fades linearly between one and three minutes of recovery', () => {
    expect(grayscaleIntensity(60, tuning)).toBe(1);
    expect(grayscaleIntensity(120, tuning)).toBe(0.5);
    expect(grayscaleIntensity(150, tuning)).toBe(0.25);
  });

  it('forgets the trigger after three minutes', () => {
    expect(grayscaleIntensity(180, tuning)).toBeNull();
  });
});

describe('reconcileGrayscale', () => {
  const base = { inWorkBlock: true, grayscaleTriggeredThisBlock: true, currentlyOffTarget: true };

  it('requires a work block, an earlier trigger and an off-target run', () => {
    expect(shouldBeGray(base)).toBe(true);
    expect(shouldBeGray({ ...base, inWorkBlock: false })).toBe(false);
    expect(shouldBeGray({ ...base, grayscaleTriggeredThisBlock: false })).toBe(false);
    expect(shouldBeGray({ ...base, currentlyOffTarget: false })).toBe(false);
  });

  it('restores color when grayscale is showing but should not be', () => {
    expect(reconcileGrayscale({ ...base, currentlyOffTarget: false, grayscaleActive: true })).toEqual({
      type: 'setGrayscale',
      active: false,
      intensity: 0,
    });
    expect(reconcileGrayscale({ ...base, grayscaleActive: true })).toBeNull();
    expect(reconcileGrayscale({ ...base, currentlyOffTarget: false, grayscaleActive: false })).toBeNull();
  });
});
