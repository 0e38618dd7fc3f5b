export * from './lib/domain';
export * from './lib/protocol/policy';
export * from './lib/protocol/appeal';
export * from './lib/protocol/messages';
export * from './lib/settings';
export * from './lib/llm';
