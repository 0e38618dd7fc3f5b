import { createStore } from 'zustand/vanilla';
import type { EnforcementCommand } from '@driftguard/contracts';

export type PresentationState = {
  grayscaleActive: boolean;
  grayscaleIntensity: number;
  nudgeVisible: boolean;
  overlayVisible: boolean;
  interventionVisible: boolean;
  timerDistracted: boolean;
};

type PresentationActions = {
  apply: (command: EnforcementCommand) => void;
  /** What the presentation layer reports it is actually showing. */
  report: (patch: Partial<PresentationState>) => void;
  reset: () => void;
};

export type PresentationStore = ReturnType<typeof createPresentationStore>;

export const initialPresentationState: PresentationState = {
  grayscaleActive: false,
  grayscaleIntensity: 0,
  nudgeVisible: false,
  overlayVisible: false,
  interventionVisible: false,
  timerDistracted: false,
};

export const reducePresentation = (state: PresentationState, command: EnforcementCommand): PresentationState => {
  switch (command.type) {
    case 'showNudge':
      return { ...state, nudgeVisible: true };
    case 'dismissNudge':
      return { ...state, nudgeVisible: false };
    case 'showOverlay':
      return { ...state, overlayVisible: true };
    case 'dismissOverlay':
      return { ...state, overlayVisible: false };
    case 'showIntervention':
      return { ...state, interventionVisible: true };
    case 'setGrayscale':
      return { ...state, grayscaleActive: command.active, grayscaleIntensity: command.active ? command.intensity : 0 };
    case 'setTimerIndicator':
      return { ...state, timerDistracted: command.distracted };
    case 'redirectToURL':
    case 'redirectToBlockPage':
    case 'approvePageTitleInScorer':
      return state;
  }
};

export const createPresentationStore = () =>
  createStore<PresentationState & PresentationActions>(set => ({
    ...initialPresentationState,
    apply: command => set(state => reducePresentation(state, command)),
    report: patch => set(patch),
    reset: () => set(initialPresentationState),
  }));
