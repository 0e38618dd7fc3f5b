import type {
  EnforcementCommand,
  ObservationTarget,
  RelevanceOracle,
  RelevanceVerdict,
  TimeBlock,
  WorkBlockKind,
} from '@driftguard/contracts';
import type { Logger } from './logger';

export type JustificationContext = {
  block: TimeBlock & { kind: WorkBlockKind };
  target: ObservationTarget;
  text: string;
};

export type JustificationVerdict = { accepted: true; verdict: RelevanceVerdict } | { accepted: false; reason: string };

export const augmentDescription = (description: string, justification: string): string => {
  const base = description.trim();
  const note = `The user explains why this is on-task: "${justification.trim()}"`;
  return base ? `${base}\n\n${note}` : note;
};

/** Re-scores the target with the justification attached. Anything short of a relevant verdict is a rejection. */
export const rescoreWithJustification = async (
  oracle: RelevanceOracle | null,
  ctx: JustificationContext,
  logger: Logger,
): Promise<JustificationVerdict> => {
  if (!oracle) {
    logger.warn('No relevance scorer bound; rejecting justification');
    return { accepted: false, reason: 'No relevance scorer available' };
  }
  try {
    const verdict = await oracle.score({
      title: ctx.target.displayName,
      intention: ctx.block.title,
      description: augmentDescription(ctx.block.description, ctx.text),
      contentType: ctx.target.kind === 'app' ? 'application' : 'webpage',
    });
    return verdict.relevant ? { accepted: true, verdict } : { accepted: false, reason: verdict.reason };
  } catch (error) {
    logger.error('Justification re-score failed', error);
    return { accepted: false, reason: 'Could not verify the explanation' };
  }
};

export type SuppressionGrant = { type: 'timeBoxed'; seconds: number } | { type: 'session' };

export type AcceptancePlan = {
  grant: SuppressionGrant;
  commands: EnforcementCommand[];
};

/** Deep Work only ever grants a time-boxed pass; Focus Hours trusts the user for the rest of the block. */
export const planAcceptance = (
  ctx: Pick<JustificationContext, 'block' | 'target'>,
  deepWorkSeconds: number,
): AcceptancePlan => {
  if (ctx.block.kind === 'deepWork') {
    return {
      grant: { type: 'timeBoxed', seconds: deepWorkSeconds },
      commands: [
        { type: 'setGrayscale', active: false, intensity: 0 },
        { type: 'setTimerIndicator', distracted: false },
      ],
    };
  }
  return {
    grant: { type: 'session' },
    commands: [
      { type: 'approvePageTitleInScorer', title: ctx.target.displayName, forIntention: ctx.block.title },
      { type: 'setGrayscale', active: false, intensity: 0 },
      { type: 'setTimerIndicator', distracted: false },
    ],
  };
};

export type RejectionInputs = {
  block: TimeBlock & { kind: WorkBlockKind };
  target: ObservationTarget;
  reason: string;
  distractionMinutes: number;
  focusDurationMinutes: number;
  canSnooze: boolean;
  overlayEnabled: boolean;
};

export const planRejection = (inputs: RejectionInputs): EnforcementCommand[] => {
  const { block, target } = inputs;
  if (block.kind === 'deepWork' && inputs.overlayEnabled) {
    return [
      {
        type: 'showOverlay',
        intention: block.title,
        reason: inputs.reason || 'Explanation not accepted',
        focusDurationMinutes: inputs.focusDurationMinutes,
        isNoPlan: false,
        displayName: target.displayName,
        canSnooze: inputs.canSnooze,
      },
    ];
  }
  return [
    {
      type: 'showNudge',
      intention: block.title,
      displayName: target.displayName,
      escalated: true,
      distractionMinutes: inputs.distractionMinutes,
      warning: false,
    },
  ];
};
