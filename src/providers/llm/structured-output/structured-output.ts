/**
 * Tier 1: Structured Output Strategy
 *
 * Native structured output via Output.object(). Most reliable where the
 * provider supports it (OpenAI json_schema, some OpenAI-compatible servers).
 */

import type { LanguageModelV3 } from '@ai-sdk/provider';
import { generateText, Output, zodSchema } from 'ai';
import type { z } from 'zod';
import type { CompletionOptions, Message } from '../types';
import type { ProviderCapabilities, StructuredOutputStrategy } from './types';

export class StructuredOutputStrategyImpl implements StructuredOutputStrategy {
  readonly name = 'structured-output' as const;

  isSupported(capabilities: ProviderCapabilities): boolean {
    return capabilities.supportsStructuredOutputs;
  }

  async execute<T>(
    model: LanguageModelV3,
    messages: Message[],
    schema: z.ZodType<T>,
    options?: CompletionOptions
  ): Promise<T> {
    const { output } = await generateText({
      model,
      messages,
      output: Output.object({ schema: zodSchema(schema) }),
      maxOutputTokens: options?.maxTokens,
      temperature: options?.temperature,
      abortSignal: options?.abortSignal
    });

    // Re-parse so defaults and refinements apply
    return schema.parse(output);
  }
}

export const structuredOutputStrategy = new StructuredOutputStrategyImpl();
