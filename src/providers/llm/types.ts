import type { z } from 'zod';
import type { LLMProvider } from '@/config/schema';
import type { StrategyExecutorOptions } from './structured-output/types';

export type { LLMProvider };

export interface Message {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

/**
 * Options for LLM completion requests.
 * If not provided, the provider's API defaults apply.
 */
export interface CompletionOptions {
  /** Maximum tokens to generate */
  maxTokens?: number;
  /** Sampling temperature (0-2 for most providers) */
  temperature?: number;
  /** Cancels the request */
  abortSignal?: AbortSignal;
}

export interface JSONCompletionOptions extends CompletionOptions {
  /** Retry count, verbose logging, forced strategy */
  strategyOptions?: StrategyExecutorOptions;
}

export interface LLMClient {
  /**
   * Structured completion validated against a zod schema.
   * Tries native structured output first, then JSON mode, then prompt-based
   * extraction, as far as the provider supports each.
   */
  completeJSON<T>(
    messages: Message[],
    schema: z.ZodType<T>,
    options?: JSONCompletionOptions
  ): Promise<T>;

  readonly modelId: string;
}
