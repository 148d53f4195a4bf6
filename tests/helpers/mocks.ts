/**
 * Mock Factories
 *
 * Configurable LLM client and searcher stand-ins. Graph behavior comes
 * from MemoryGraphClient instead.
 */

import type { z } from 'zod';
import type { SearchOutcome, SignalName, SignalSearcher } from '@/core/retrieval';
import type { LLMClient, Message } from '@/providers/llm';

// ═══════════════════════════════════════════════════════════════════════════════
// LLM Client Mock
// ═══════════════════════════════════════════════════════════════════════════════

export interface MockLLMClientConfig {
  /** Raw JSON response, validated against the caller's schema */
  json?: unknown;
  /** Computes the response per call; takes precedence over `json` */
  respond?: (messages: Message[]) => unknown;
  /** Thrown from completeJSON instead of responding */
  error?: Error;
}

export interface MockLLMClient extends LLMClient {
  /** Messages of every completeJSON call, in order */
  readonly calls: Message[][];
}

/**
 * Creates a mock LLMClient. completeJSON parses the configured response
 * with the schema it is given, so a malformed response fails like a real
 * validation failure would.
 */
export function createMockLLMClient(config: MockLLMClientConfig = {}): MockLLMClient {
  const calls: Message[][] = [];

  return {
    modelId: 'mock-llm-model',
    calls,

    completeJSON: async <T>(messages: Message[], schema: z.ZodType<T>): Promise<T> => {
      calls.push(messages);
      if (config.error) throw config.error;
      const raw = config.respond ? config.respond(messages) : config.json;
      return schema.parse(raw);
    }
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// Searcher Mocks
// ═══════════════════════════════════════════════════════════════════════════════

const EMPTY: SearchOutcome = { candidates: [], relationships: [] };

/**
 * Searcher that resolves with a fixed outcome.
 */
export function fixedSearcher(name: SignalName, outcome: SearchOutcome = EMPTY): SignalSearcher {
  return {
    name,
    isEnabled: () => true,
    search: async () => outcome
  };
}

export function failingSearcher(name: SignalName, message = 'search failed'): SignalSearcher {
  return {
    name,
    isEnabled: () => true,
    search: async () => {
      throw new Error(message);
    }
  };
}

/**
 * Searcher that never settles on its own; it only ends when its signal
 * aborts. `aborted` records the abort reasons it saw.
 */
export function hangingSearcher(name: SignalName): SignalSearcher & { aborted: unknown[] } {
  const aborted: unknown[] = [];
  return {
    name,
    aborted,
    isEnabled: () => true,
    search: (context) =>
      new Promise<SearchOutcome>((_, reject) => {
        context.signal.addEventListener(
          'abort',
          () => {
            aborted.push(context.signal.reason);
            reject(context.signal.reason);
          },
          { once: true }
        );
      })
  };
}
