import { agentFailure } from './base-agent';
import type { Agent, AgentContext, AgentRequest, AgentResponse } from './base-agent';

export class AgentRegistry {
  private agents: Map<string, Agent> = new Map();

  register(agent: Agent): void {
    this.agents.set(agent.name, agent);
  }

  has(agentName: string): boolean {
    return this.agents.has(agentName);
  }

  async invoke(agentName: string, ctx: AgentContext, req: AgentRequest): Promise<AgentResponse> {
    const agent = this.agents.get(agentName);
    if (!agent) return agentFailure('NOT_FOUND', `Agent ${agentName} not found`);
    if (!agent.supports.includes(req.type)) return agentFailure('UNSUPPORTED', `Type ${req.type} not supported`);
    try {
      return await agent.handle(ctx, req);
    } catch (e) {
      return agentFailure('AGENT_ERROR', e instanceof Error ? e.message : String(e));
    }
  }
}
