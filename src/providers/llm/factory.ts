/**
 * LLM Client Factory
 *
 * Creates LLM clients using Vercel AI SDK v6 with direct provider packages.
 * Requests go straight to the provider APIs.
 */

import { createAnthropic } from '@ai-sdk/anthropic';
import { createGoogleGenerativeAI } from '@ai-sdk/google';
import { createOpenAI } from '@ai-sdk/openai';
import { createOpenAICompatible } from '@ai-sdk/openai-compatible';
import type { LanguageModelV3 } from '@ai-sdk/provider';
import type { LLMConfig, LLMProvider } from '@/config/schema';
import { VercelLLMClient } from './client';
import { getDefaultCapabilities, type ProviderCapabilities } from './structured-output';
import type { LLMClient } from './types';

const DEFAULT_OLLAMA_BASE_URL = 'http://localhost:11434/v1';

export interface CreateLLMClientOptions {
  /** Override default capability detection */
  capabilities?: Partial<ProviderCapabilities>;
}

export function createLLMClient(config: LLMConfig, options: CreateLLMClientOptions = {}): LLMClient {
  const languageModel = getLanguageModel(config);
  const capabilities: ProviderCapabilities = {
    ...getDefaultCapabilities(config.provider),
    ...options.capabilities,
    provider: config.provider
  };
  return new VercelLLMClient(languageModel, capabilities, {
    temperature: config.temperature,
    maxTokens: config.maxTokens
  });
}

function getLanguageModel(config: LLMConfig): LanguageModelV3 {
  const provider: LLMProvider = config.provider;
  switch (provider) {
    case 'openai':
      return createOpenAI({ apiKey: config.apiKey })(config.model);

    case 'anthropic':
      return createAnthropic({ apiKey: config.apiKey })(config.model);

    case 'google':
      return createGoogleGenerativeAI({ apiKey: config.apiKey })(config.model);

    case 'ollama':
      // Ollama serves the OpenAI chat completions API under /v1
      return createOpenAICompatible({
        name: 'ollama',
        baseURL: config.baseUrl ?? DEFAULT_OLLAMA_BASE_URL,
        apiKey: 'ollama'
      }).languageModel(config.model);

    case 'openai-compatible': {
      if (!config.baseUrl) {
        throw new Error('baseUrl required for openai-compatible provider');
      }
      return createOpenAICompatible({
        name: config.providerName ?? 'openai-compatible',
        baseURL: config.baseUrl,
        apiKey: config.apiKey ?? '',
        supportsStructuredOutputs: true
      }).languageModel(config.model);
    }

    default: {
      const _exhaustive: never = provider;
      throw new Error(`Unknown provider: ${_exhaustive}`);
    }
  }
}
