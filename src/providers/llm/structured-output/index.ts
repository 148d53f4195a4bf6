/**
 * Strategy Registry and Executor
 *
 * Picks structured-output strategies by provider capability and retries
 * each with error feedback before falling back to the next.
 */

import type { LanguageModelV3 } from '@ai-sdk/provider';
import { z } from 'zod';
import type { CompletionOptions, Message } from '../types';
import { jsonModeStrategy } from './json-mode';
import { promptBasedStrategy } from './prompt-based';
import { structuredOutputStrategy } from './structured-output';
import type {
  ProviderCapabilities,
  StrategyError,
  StrategyExecutorOptions,
  StrategyName,
  StructuredOutputStrategy
} from './types';

const ALL_STRATEGIES: StructuredOutputStrategy[] = [
  structuredOutputStrategy,
  jsonModeStrategy,
  promptBasedStrategy
];

/**
 * Strategies for a provider, in order of preference.
 */
export function getStrategiesForProvider(
  capabilities: ProviderCapabilities
): StructuredOutputStrategy[] {
  switch (capabilities.provider) {
    case 'google':
      // response_schema through JSON mode is the reliable path on Gemini
      return [jsonModeStrategy, structuredOutputStrategy, promptBasedStrategy].filter((s) =>
        s.isSupported(capabilities)
      );

    default:
      return ALL_STRATEGIES.filter((s) => s.isSupported(capabilities));
  }
}

function isAbort(error: Error): boolean {
  return error.name === 'AbortError';
}

/**
 * Worth another attempt with the error fed back to the model.
 */
function isValidationFailure(error: Error): boolean {
  return (
    error instanceof z.ZodError ||
    error.name === 'ZodError' ||
    error.message.includes('validation') ||
    error.message.includes('parse')
  );
}

/**
 * Generate structured output with tiered fallback and retry.
 *
 * @throws the abort error as-is when the request was cancelled
 * @throws Error listing every strategy's failure when all fail
 */
export async function executeWithStrategies<T>(
  model: LanguageModelV3,
  messages: Message[],
  schema: z.ZodType<T>,
  capabilities: ProviderCapabilities,
  options?: CompletionOptions,
  executorOptions?: StrategyExecutorOptions
): Promise<T> {
  const { maxRetriesPerStrategy = 2, verbose = false, forceStrategy } = executorOptions ?? {};

  let strategies = getStrategiesForProvider(capabilities);

  if (forceStrategy) {
    const forced = strategies.find((s) => s.name === forceStrategy);
    if (!forced) {
      throw new Error(
        `Forced strategy "${forceStrategy}" is not supported for provider "${capabilities.provider}"`
      );
    }
    strategies = [forced];
  }

  const errors: StrategyError[] = [];

  for (const strategy of strategies) {
    if (verbose) {
      console.log(`[LLM] Trying strategy: ${strategy.name}`);
    }

    let currentMessages = [...messages];
    let lastError: Error | null = null;

    for (let attempt = 0; attempt <= maxRetriesPerStrategy; attempt++) {
      try {
        return await strategy.execute(model, currentMessages, schema, options);
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));

        if (isAbort(lastError) || options?.abortSignal?.aborted) {
          throw lastError;
        }

        if (verbose) {
          console.log(
            `[LLM] Strategy "${strategy.name}" failed on attempt ${attempt + 1}: ${lastError.message}`
          );
        }

        if (attempt >= maxRetriesPerStrategy || !isValidationFailure(lastError)) {
          break;
        }

        currentMessages = [
          ...messages,
          {
            role: 'user',
            content:
              `The previous response was invalid. Error: ${lastError.message}. ` +
              'Please try again with a valid response matching the expected format.'
          }
        ];
      }
    }

    if (lastError) {
      errors.push({ strategy: strategy.name, error: lastError });
    }
  }

  const summary = errors.map((e) => `${e.strategy}: ${e.error.message}`).join('\n');
  throw new Error(
    `All structured output strategies failed for provider "${capabilities.provider}".\n` +
      `Tried strategies: ${strategies.map((s) => s.name).join(', ')}\n` +
      `Errors:\n${summary}`
  );
}

/**
 * Default capabilities for a provider.
 */
export function getDefaultCapabilities(provider: string): ProviderCapabilities {
  switch (provider) {
    case 'openai':
    case 'openai-compatible':
      return { provider, supportsStructuredOutputs: true, supportsJsonMode: true };

    case 'anthropic':
      // The SDK maps Output.object onto a forced tool call
      return { provider, supportsStructuredOutputs: true, supportsJsonMode: false };

    case 'google':
      return { provider, supportsStructuredOutputs: true, supportsJsonMode: true };

    case 'ollama':
      // Varies by model
      return { provider, supportsStructuredOutputs: false, supportsJsonMode: true };

    default:
      return { provider, supportsStructuredOutputs: false, supportsJsonMode: false };
  }
}

export type {
  ProviderCapabilities,
  StrategyError,
  StrategyExecutorOptions,
  StrategyName,
  StructuredOutputStrategy
};
export { extractJSON } from './prompt-based';
export { jsonModeStrategy, promptBasedStrategy, structuredOutputStrategy };
