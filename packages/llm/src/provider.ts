import type { LLMChatParams, LLMProvider } from '@driftguard/contracts';

export abstract class BaseLLMProvider implements LLMProvider {
  abstract chat(params: LLMChatParams): Promise<{ content: string }>;
}
