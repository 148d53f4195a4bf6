/**
 * Tier 2: JSON Mode Strategy
 *
 * JSON mode guarantees parseable JSON but not the shape, so the schema goes
 * into the prompt and the result is validated with zod.
 */

import type { LanguageModelV3 } from '@ai-sdk/provider';
import { generateText, Output } from 'ai';
import type { z } from 'zod';
import type { CompletionOptions, Message } from '../types';
import type { ProviderCapabilities, StructuredOutputStrategy } from './types';
import { describeSchema, withInstruction } from './types';

export class JsonModeStrategyImpl implements StructuredOutputStrategy {
  readonly name = 'json-mode' as const;

  isSupported(capabilities: ProviderCapabilities): boolean {
    return capabilities.supportsJsonMode;
  }

  async execute<T>(
    model: LanguageModelV3,
    messages: Message[],
    schema: z.ZodType<T>,
    options?: CompletionOptions
  ): Promise<T> {
    const { output } = await generateText({
      model,
      messages: withInstruction(
        messages,
        `Respond with a JSON object matching this JSON Schema:\n${describeSchema(schema)}`
      ),
      output: Output.json(),
      maxOutputTokens: options?.maxTokens,
      temperature: options?.temperature,
      abortSignal: options?.abortSignal
    });

    return schema.parse(output);
  }
}

export const jsonModeStrategy = new JsonModeStrategyImpl();
