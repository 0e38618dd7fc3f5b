import OpenAI from 'openai';
import type { LLMChatParams } from '@driftguard/contracts';
import { BaseLLMProvider } from './provider';

export class OpenAILLMProvider extends BaseLLMProvider {
  private client: OpenAI;

  constructor(apiKey: string | undefined) {
    super();
    this.client = new OpenAI({ apiKey });
  }

  async chat(params: LLMChatParams): Promise<{ content: string }> {
    const response = await this.client.chat.completions.create(
      {
        model: params.model,
        messages: params.messages,
        temperature: params.temperature,
        max_tokens: params.maxTokens,
        response_format: { type: 'json_object' },
      },
      { signal: params.signal },
    );
    const content = response.choices[0]?.message?.content ?? '';
    return { content };
  }
}
