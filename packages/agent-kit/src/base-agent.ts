export type AgentContext = {
  env: 'development' | 'production';
  blockId?: string;
};

export type AgentRequest = { type: string; payload: unknown };

export type AgentError = { code: string; message: string };

export type AgentResponse = { ok: true; data: unknown } | { ok: false; error: AgentError };

export interface Agent {
  name: string;
  supports: readonly string[];
  handle(ctx: AgentContext, req: AgentRequest): Promise<AgentResponse>;
}

export const agentFailure = (code: string, message: string): AgentResponse => ({ ok: false, error: { code, message } });
