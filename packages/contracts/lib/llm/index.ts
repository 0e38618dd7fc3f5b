export type ChatMessage = { role: 'system' | 'user' | 'assistant'; content: string };

export type LLMChatParams = {
  model: string;
  messages: ChatMessage[];
  temperature?: number;
  maxTokens?: number;
  signal?: AbortSignal;
};

export interface LLMProvider {
  chat(params: LLMChatParams): Promise<{ content: string }>;
}
