export { agentFailure } from './src/base-agent';
export type { Agent, AgentContext, AgentError, AgentRequest, AgentResponse } from './src/base-agent';
export { AgentRegistry } from './src/registry';
