export { VercelLLMClient } from './client';
export type { CreateLLMClientOptions } from './factory';
export { createLLMClient } from './factory';
export type {
  ProviderCapabilities,
  StrategyExecutorOptions,
  StrategyName
} from './structured-output';
export { executeWithStrategies, extractJSON, getDefaultCapabilities } from './structured-output';
export type {
  CompletionOptions,
  JSONCompletionOptions,
  LLMClient,
  LLMProvider,
  Message
} from './types';
