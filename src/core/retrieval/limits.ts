/**
 * Limit Enforcer
 *
 * Narrows the ranked set to the strategy's budgets. Never throws: what was
 * cut is reported as dropped counts and BudgetExceededWarnings.
 *
 * Order: max_entities → max_chunks → max_context_tokens. Under the token
 * budget the lowest-ranked entity goes first, one at a time, and chunks
 * only once no entity is left.
 */

import type { RetrievalStrategy } from '@/core/strategies';
import { entityKey, type RelationshipRecord } from '@/providers/graph';
import type { RetrievalConfig } from './config';
import type { BudgetExceededWarning, DroppedCounts, LimitStage, RankedSet } from './types';

type Limits = RetrievalStrategy['limits'];

export interface LimitResult extends RankedSet {
  dropped: DroppedCounts;
  warnings: BudgetExceededWarning[];
  /** Rendered context of what was kept */
  context: string;
  token_estimate: number;
}

export function estimateTokens(text: string, charsPerToken: number): number {
  return Math.ceil(text.length / charsPerToken);
}

function warning(stage: LimitStage, limit: number, dropped: number, what: string): BudgetExceededWarning {
  return {
    type: 'BudgetExceededWarning',
    stage,
    limit,
    dropped,
    message: `${stage} (${limit}) dropped ${dropped} ${what}`
  };
}

function connected(
  relationships: readonly RelationshipRecord[],
  entities: RankedSet['entities']
): RelationshipRecord[] {
  const keys = new Set(entities.map((e) => e.id));
  return relationships.filter(
    (rel) => keys.has(entityKey(rel.source)) && keys.has(entityKey(rel.target))
  );
}

/**
 * @param render - Formats a candidate set; its length drives the token estimate
 */
export function enforceLimits(
  ranked: RankedSet,
  limits: Limits,
  render: (set: RankedSet) => string,
  tuning: RetrievalConfig
): LimitResult {
  const warnings: BudgetExceededWarning[] = [];
  const dropped: DroppedCounts = {
    max_entities: 0,
    max_chunks: 0,
    max_context_tokens: { entities: 0, chunks: 0 }
  };

  // 1. max_entities
  let entities = ranked.entities.slice(0, limits.max_entities);
  dropped.max_entities = ranked.entities.length - entities.length;
  if (dropped.max_entities > 0) {
    warnings.push(warning('max_entities', limits.max_entities, dropped.max_entities, 'entities'));
  }

  // 2. max_chunks
  let chunks = ranked.chunks.slice(0, limits.max_chunks);
  dropped.max_chunks = ranked.chunks.length - chunks.length;
  if (dropped.max_chunks > 0) {
    warnings.push(warning('max_chunks', limits.max_chunks, dropped.max_chunks, 'chunks'));
  }

  // 3. max_context_tokens
  let current: RankedSet = {
    entities,
    chunks,
    relationships: connected(ranked.relationships, entities)
  };
  let context = render(current);
  let tokens = estimateTokens(context, tuning.budget.charsPerToken);

  while (tokens > limits.max_context_tokens && (entities.length > 0 || chunks.length > 0)) {
    if (entities.length > 0) {
      entities = entities.slice(0, -1);
      dropped.max_context_tokens.entities++;
    } else {
      chunks = chunks.slice(0, -1);
      dropped.max_context_tokens.chunks++;
    }
    current = { entities, chunks, relationships: connected(ranked.relationships, entities) };
    context = render(current);
    tokens = estimateTokens(context, tuning.budget.charsPerToken);
  }

  const tokenDrops = dropped.max_context_tokens.entities + dropped.max_context_tokens.chunks;
  if (tokenDrops > 0) {
    warnings.push(
      warning(
        'max_context_tokens',
        limits.max_context_tokens,
        tokenDrops,
        `items (${dropped.max_context_tokens.entities} entities, ${dropped.max_context_tokens.chunks} chunks)`
      )
    );
  }

  return { ...current, dropped, warnings, context, token_estimate: tokens };
}
