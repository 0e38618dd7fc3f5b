export { BaseLLMProvider } from './src/provider';
export { OpenAILLMProvider } from './src/openai-provider';
