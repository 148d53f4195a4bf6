/**
 * Tier 3: Prompt-based Strategy
 *
 * Universal fallback. The schema goes into the prompt, and JSON is pulled
 * out of whatever the model writes back (fenced block, bare object, array).
 */

import type { LanguageModelV3 } from '@ai-sdk/provider';
import { generateText } from 'ai';
import type { z } from 'zod';
import type { CompletionOptions, Message } from '../types';
import type { ProviderCapabilities, StructuredOutputStrategy } from './types';
import { describeSchema, withInstruction } from './types';

/**
 * Length of the balanced `{...}` or `[...]` starting at `start`, or -1.
 * Brackets inside string literals are ignored.
 */
function balancedEnd(text: string, start: number): number {
  const open = text[start];
  const close = open === '{' ? '}' : ']';
  let depth = 0;
  let inString = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (ch === '\\') i++;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === open) depth++;
    else if (ch === close && --depth === 0) return i + 1;
  }
  return -1;
}

/**
 * Pull a JSON document out of model output:
 * a fenced ```json block, else the first balanced object or array.
 */
export function extractJSON(text: string): string {
  const fenced = text.match(/```(?:json)?\s*([\s\S]*?)```/);
  if (fenced?.[1]) {
    return fenced[1].trim();
  }

  const start = text.search(/[{[]/);
  if (start >= 0) {
    const end = balancedEnd(text, start);
    if (end > 0) return text.slice(start, end);
  }

  return text.trim();
}

export class PromptBasedStrategyImpl implements StructuredOutputStrategy {
  readonly name = 'prompt-based' as const;

  isSupported(_capabilities: ProviderCapabilities): boolean {
    return true;
  }

  async execute<T>(
    model: LanguageModelV3,
    messages: Message[],
    schema: z.ZodType<T>,
    options?: CompletionOptions
  ): Promise<T> {
    const { text } = await generateText({
      model,
      messages: withInstruction(
        messages,
        `Respond ONLY with a JSON object matching this JSON Schema:\n${describeSchema(schema)}\n\n` +
          'Do not include any other text, markdown formatting, or explanation.'
      ),
      maxOutputTokens: options?.maxTokens,
      temperature: options?.temperature,
      abortSignal: options?.abortSignal
    });

    let parsed: unknown;
    try {
      parsed = JSON.parse(extractJSON(text));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new Error(
        `Prompt-based strategy: failed to parse JSON (${reason}). Raw text (last 500 chars): ${text.slice(-500)}`
      );
    }
    return schema.parse(parsed);
  }
}

export const promptBasedStrategy = new PromptBasedStrategyImpl();
