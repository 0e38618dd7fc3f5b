import { z } from 'zod';
import { agentFailure } from '@driftguard/agent-kit';
import type { Agent, AgentContext, AgentRequest, AgentResponse } from '@driftguard/agent-kit';
import { relevanceRequestSchema } from '@driftguard/contracts';
import type { RelevanceScorer } from './scorer';

const approvalSchema = z.object({
  title: z.string().min(1),
  intention: z.string().min(1),
});

export class RelevanceAgent implements Agent {
  name = 'relevance';
  supports = ['score', 'approve', 'reset'] as const;

  constructor(private readonly scorer: RelevanceScorer) {}

  async handle(_ctx: AgentContext, req: AgentRequest): Promise<AgentResponse> {
    switch (req.type) {
      case 'score': {
        const parsed = relevanceRequestSchema.safeParse(req.payload);
        if (!parsed.success) return agentFailure('BAD_INPUT', 'Invalid relevance request');
        return { ok: true, data: await this.scorer.score(parsed.data) };
      }
      case 'approve': {
        const parsed = approvalSchema.safeParse(req.payload);
        if (!parsed.success) return agentFailure('BAD_INPUT', 'Invalid approval');
        this.scorer.approve(parsed.data.title, parsed.data.intention);
        return { ok: true, data: { approved: true } };
      }
      case 'reset':
        this.scorer.clear();
        return { ok: true, data: { cleared: true } };
      default:
        return agentFailure('UNSUPPORTED', 'Unsupported');
    }
  }
}
