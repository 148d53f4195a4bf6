/**
 * Vercel AI SDK v6 LLM Client
 *
 * Structured completions for intent analysis and key-term extraction.
 * No streaming: every caller needs the complete response to parse it.
 */

import type { LanguageModelV3 } from '@ai-sdk/provider';
import type { z } from 'zod';
import {
  executeWithStrategies,
  getDefaultCapabilities,
  type ProviderCapabilities
} from './structured-output';
import type { CompletionOptions, JSONCompletionOptions, LLMClient, Message } from './types';

export class VercelLLMClient implements LLMClient {
  readonly modelId: string;
  private readonly capabilities: ProviderCapabilities;

  /**
   * @param defaults - Temperature and token limit applied when a call sets none
   */
  constructor(
    private model: LanguageModelV3,
    capabilities?: ProviderCapabilities,
    private readonly defaults: CompletionOptions = {}
  ) {
    this.modelId = model.modelId;
    this.capabilities = capabilities ?? getDefaultCapabilities('openai-compatible');
  }

  async completeJSON<T>(
    messages: Message[],
    schema: z.ZodType<T>,
    options?: JSONCompletionOptions
  ): Promise<T> {
    const { strategyOptions, ...completionOptions } = options ?? {};

    return executeWithStrategies(
      this.model,
      messages,
      schema,
      this.capabilities,
      { ...this.defaults, ...completionOptions },
      strategyOptions
    );
  }
}
