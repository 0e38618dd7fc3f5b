import type { EnforcementCommand, EnforcementTuning } from '@driftguard/contracts';

export type GrayscaleInputs = {
  inWorkBlock: boolean;
  grayscaleTriggeredThisBlock: boolean;
  currentlyOffTarget: boolean;
};

export const shouldBeGray = (inputs: GrayscaleInputs): boolean =>
  inputs.inWorkBlock && inputs.grayscaleTriggeredThisBlock && inputs.currentlyOffTarget;

/**
 * Intensity for re-triggering grayscale after `recoverySeconds` on target.
 * Returns null once recovery is long enough to forget the earlier trigger.
 */
export const grayscaleIntensity = (recoverySeconds: number, tuning: EnforcementTuning['grayscale']): number | null => {
  const { fullIntensityWindowSeconds, resetAfterSeconds } = tuning;
  if (recoverySeconds >= resetAfterSeconds) return null;
  if (recoverySeconds < fullIntensityWindowSeconds) return 1;
  const span = resetAfterSeconds - fullIntensityWindowSeconds;
  return Math.max(0, 1 - (recoverySeconds - fullIntensityWindowSeconds) / span);
};

/** Only ever corrects towards color; turning grayscale on is left to the policy. */
export const reconcileGrayscale = (
  inputs: GrayscaleInputs & { grayscaleActive: boolean },
): Extract<EnforcementCommand, { type: 'setGrayscale' }> | null => {
  if (inputs.grayscaleActive && !shouldBeGray(inputs)) {
    return { type: 'setGrayscale', active: false, intensity: 0 };
  }
  return null;
};
