/**
 * Retrieval Pipeline Orchestrator
 *
 * question → intent → searchers (concurrent) → merge → expand → limits → format
 *
 * The retrieval strategy is read once at the start; a strategy change made
 * while the query runs does not affect it.
 */

import type { SchemaDescriptor } from '@/core/ingestion';
import type { StrategyStore } from '@/core/strategies';
import type { GraphClient } from '@/providers/graph';
import type { LLMClient } from '@/providers/llm';
import { logQueryResult, logQueryStart, logSearchFailure } from '@/utils/logger';
import { createConfig, defaults, type RetrievalConfig } from './config';
import { expandContext } from './expand';
import { runSearchers } from './fanout';
import { formatContext } from './format';
import { analyzeQuery } from './intent';
import { enforceLimits } from './limits';
import { mergeResults } from './merge';
import { DEFAULT_SEARCHERS } from './searchers';
import {
  type QueryIntentInput,
  queryIntentSchema,
  type RankedSet,
  type RetrievalResult,
  type SignalSearcher
} from './types';

export interface RetrievalInput {
  question: string;
  /** Skips intent analysis when given */
  intent?: QueryIntentInput;
}

export interface RetrievalDependencies {
  graphClient: GraphClient;
  strategies: StrategyStore;
  /** Used for intent analysis; without it the local fallback runs */
  llmClient?: LLMClient;
  /** Restricts LLM-proposed entity types to known ones */
  schema?: SchemaDescriptor;
}

export interface RetrievalOptions {
  /** Cancels the query and every running searcher */
  signal?: AbortSignal;
  /** Per-searcher timeout (default: config.search.timeoutMs) */
  searchTimeoutMs?: number;
  /** Override internal tuning (decays, limits) */
  config?: Parameters<typeof createConfig>[0];
  /** Replace the registered searchers */
  searchers?: readonly SignalSearcher[];
}

/**
 * Execute the retrieval pipeline.
 *
 * @example
 * ```typescript
 * const result = await retrieve(
 *   { question: 'Who are the parties to the supply agreement?' },
 *   { graphClient, strategies, llmClient }
 * );
 * console.log(result.context);
 * ```
 */
export async function retrieve(
  input: RetrievalInput,
  deps: RetrievalDependencies,
  options: RetrievalOptions = {}
): Promise<RetrievalResult> {
  const startTime = Date.now();
  const tuning: RetrievalConfig = options.config ? createConfig(options.config) : defaults;
  const strategy = deps.strategies.get().retrieval;
  const { question } = input;
  const { signal } = options;

  logQueryStart(question, strategy.name);
  signal?.throwIfAborted();

  const intent = input.intent
    ? queryIntentSchema.parse(input.intent)
    : await analyzeQuery(question, deps.llmClient, deps.schema, { signal });

  const { outcomes, failures } = await runSearchers(
    options.searchers ?? DEFAULT_SEARCHERS,
    { question, intent, strategy, graph: deps.graphClient, tuning },
    { signal, timeoutMs: options.searchTimeoutMs ?? tuning.search.timeoutMs }
  );
  for (const failure of failures) logSearchFailure(failure);

  const merged = mergeResults(outcomes, strategy.scoring, tuning);
  signal?.throwIfAborted();

  const expanded = await expandContext(
    merged,
    deps.graphClient,
    strategy.context.expand_neighbors,
    tuning,
    signal
  );
  signal?.throwIfAborted();

  const render = (set: RankedSet) =>
    formatContext({
      query: question,
      entities: set.entities.map((e) => e.entity),
      chunks: set.chunks.map((c) => c.chunk),
      relationships: set.relationships,
      include: strategy.context.include_metadata
    });
  const limited = enforceLimits(expanded, strategy.limits, render, tuning);

  const result: RetrievalResult = {
    query: question,
    intent,
    entities: limited.entities.map(({ entity, score, signals }) => ({
      key: entity.key,
      type: entity.type,
      id: entity.id,
      properties: entity.properties,
      confidence: entity.confidence,
      score,
      signals
    })),
    chunks: limited.chunks.map(({ chunk, score, signals, expanded: isExpanded }) => ({
      ...chunk,
      score,
      signals,
      expanded: isExpanded
    })),
    relationships: limited.relationships,
    search_methods_used: outcomes.map((o) => o.signal),
    failed_methods: failures,
    dropped: limited.dropped,
    warnings: limited.warnings,
    token_estimate: limited.token_estimate,
    context: limited.context,
    duration_ms: Date.now() - startTime
  };

  logQueryResult(result);
  return result;
}
