/**
 * Structured Output Strategy Types
 */

import type { LanguageModelV3 } from '@ai-sdk/provider';
import { z } from 'zod';
import type { CompletionOptions, Message } from '../types';

/**
 * Strategy names, most reliable first.
 */
export type StrategyName = 'structured-output' | 'json-mode' | 'prompt-based';

/**
 * What a provider can do natively. Set at factory level.
 */
export interface ProviderCapabilities {
  /** Native structured outputs (e.g. OpenAI json_schema) */
  supportsStructuredOutputs: boolean;
  /** JSON mode (response_format: json_object) */
  supportsJsonMode: boolean;
  provider: string;
}

export interface StrategyError {
  strategy: StrategyName;
  error: Error;
}

export interface StructuredOutputStrategy {
  readonly name: StrategyName;

  isSupported(capabilities: ProviderCapabilities): boolean;

  /**
   * @throws Error if generation or validation fails
   */
  execute<T>(
    model: LanguageModelV3,
    messages: Message[],
    schema: z.ZodType<T>,
    options?: CompletionOptions
  ): Promise<T>;
}

export interface StrategyExecutorOptions {
  /** Retries per strategy before falling back (default: 2) */
  maxRetriesPerStrategy?: number;
  /** Log strategy selection and fallback (default: false) */
  verbose?: boolean;
  /** Use only this strategy */
  forceStrategy?: StrategyName;
}

/**
 * JSON Schema text for a zod schema, for strategies that describe the
 * expected shape in the prompt.
 */
export function describeSchema<T>(schema: z.ZodType<T>): string {
  try {
    return JSON.stringify(z.toJSONSchema(schema), null, 2);
  } catch {
    // Schemas with transforms have no JSON Schema form
    return 'a JSON object matching the expected schema';
  }
}

/**
 * Append output instructions to the last message.
 */
export function withInstruction(messages: Message[], instruction: string): Message[] {
  const last = messages[messages.length - 1];
  if (!last) {
    throw new Error('No messages provided');
  }
  return [...messages.slice(0, -1), { role: last.role, content: `${last.content}\n\n${instruction}` }];
}
