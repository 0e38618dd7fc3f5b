import type { LifecycleOptions, TimeBlock } from '@driftguard/contracts';
import { isWorkBlock } from '@driftguard/contracts';

export type LifecyclePhase =
  | { phase: 'idle' }
  | { phase: 'ritualPending'; block: TimeBlock }
  | { phase: 'enforcing'; block: TimeBlock }
  | { phase: 'celebrating'; finished: TimeBlock; next: TimeBlock | null };

export type LifecycleEvent =
  | { type: 'blockChanged'; block: TimeBlock | null }
  | { type: 'ritualCompleted' }
  | { type: 'ritualSkipped' }
  | { type: 'celebrationFinished' };

const enter = (block: TimeBlock | null, options: LifecycleOptions): LifecyclePhase => {
  if (!isWorkBlock(block)) return { phase: 'idle' };
  return options.startRitual ? { phase: 'ritualPending', block } : { phase: 'enforcing', block };
};

/** Block transitions as one enumerated state. Events that do not apply leave the phase unchanged. */
export const reduceLifecycle = (
  state: LifecyclePhase,
  event: LifecycleEvent,
  options: LifecycleOptions,
): LifecyclePhase => {
  switch (event.type) {
    case 'blockChanged': {
      if (state.phase === 'celebrating') {
        return { ...state, next: event.block };
      }
      if (state.phase === 'enforcing' && options.endCelebration && state.block.id !== event.block?.id) {
        return { phase: 'celebrating', finished: state.block, next: event.block };
      }
      if ((state.phase === 'enforcing' || state.phase === 'ritualPending') && state.block.id === event.block?.id) {
        return { ...state, block: event.block };
      }
      return enter(event.block, options);
    }
    case 'ritualCompleted':
    case 'ritualSkipped':
      return state.phase === 'ritualPending' ? { phase: 'enforcing', block: state.block } : state;
    case 'celebrationFinished':
      return state.phase === 'celebrating' ? enter(state.next, options) : state;
  }
};

export const enforcingBlock = (state: LifecyclePhase): TimeBlock | null =>
  state.phase === 'enforcing' ? state.block : null;
