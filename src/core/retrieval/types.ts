/**
 * Retrieval Types
 *
 * Shapes passed between the searchers, merger, expander, limit enforcer
 * and formatter, plus the wire-level retrieval result.
 */

import { z } from 'zod';
import type {
  ChunkNode,
  EntityNode,
  GraphClient,
  RelationshipRecord
} from '@/providers/graph';
import type { RetrievalStrategy } from '@/core/strategies';
import type { RetrievalConfig } from './config';

// ═══════════════════════════════════════════════════════════════════════════════
// Query Intent
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * What the searchers are told about a question. Produced by intent analysis
 * or passed in directly by the caller.
 */
export const queryIntentSchema = z.object({
  intent: z.string().default(''),
  entity_types: z.array(z.string()).default([]),
  keywords: z.array(z.string()).default([]),
  /** Property name to case-insensitive substring */
  filters: z.record(z.string(), z.string()).default({}),
  temporal_hints: z.array(z.string()).default([]),
  search_text: z.string().default('')
});

export type QueryIntentInput = z.input<typeof queryIntentSchema>;
export type QueryIntent = z.output<typeof queryIntentSchema>;

// ═══════════════════════════════════════════════════════════════════════════════
// Signals
// ═══════════════════════════════════════════════════════════════════════════════

/** Tie-break order: earlier wins */
export const SIGNAL_PRIORITY = [
  'graph_traversal',
  'chunk_text_search',
  'keyword_matching',
  'temporal_filtering'
] as const;

export type SignalName = (typeof SIGNAL_PRIORITY)[number];

export type SignalScores = Partial<Record<SignalName, number>>;

export type Candidate =
  | { kind: 'entity'; id: string; raw_score: number; payload: EntityNode }
  | { kind: 'chunk'; id: string; raw_score: number; payload: ChunkNode };

export interface SearchOutcome {
  candidates: Candidate[];
  relationships: RelationshipRecord[];
}

export interface SearchContext {
  question: string;
  intent: QueryIntent;
  strategy: RetrievalStrategy;
  graph: GraphClient;
  tuning: RetrievalConfig;
  /** Fires on the searcher's own timeout or when the query is cancelled */
  signal: AbortSignal;
}

export interface SignalSearcher {
  readonly name: SignalName;
  isEnabled(strategy: RetrievalStrategy): boolean;
  search(context: SearchContext): Promise<SearchOutcome>;
}

export interface SignalOutcome {
  signal: SignalName;
  outcome: SearchOutcome;
}

/**
 * A searcher that threw or ran out of time. Recovered: its results are left
 * out and the query carries on.
 */
export interface SignalSearchFailure {
  signal: SignalName;
  reason: 'error' | 'timeout';
  message: string;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Ranked Results
// ═══════════════════════════════════════════════════════════════════════════════

interface RankedBase {
  /** Entity key or chunk id */
  id: string;
  score: number;
  /** Best raw score per contributing signal */
  signals: SignalScores;
  /** Neighbour pulled in by context expansion rather than matched */
  expanded: boolean;
}

export interface RankedEntity extends RankedBase {
  entity: EntityNode;
}

export interface RankedChunk extends RankedBase {
  chunk: ChunkNode;
}

export interface RankedSet {
  entities: RankedEntity[];
  chunks: RankedChunk[];
  relationships: RelationshipRecord[];
}

// ═══════════════════════════════════════════════════════════════════════════════
// Limits
// ═══════════════════════════════════════════════════════════════════════════════

export type LimitStage = 'max_entities' | 'max_chunks' | 'max_context_tokens';

/**
 * Truncation report. Not an error: budgets are expected to bite.
 */
export interface BudgetExceededWarning {
  type: 'BudgetExceededWarning';
  stage: LimitStage;
  limit: number;
  dropped: number;
  message: string;
}

export interface DroppedCounts {
  max_entities: number;
  max_chunks: number;
  max_context_tokens: { entities: number; chunks: number };
}

// ═══════════════════════════════════════════════════════════════════════════════
// Output
// ═══════════════════════════════════════════════════════════════════════════════

export interface RetrievedEntity {
  key: string;
  type: string;
  id: string;
  properties: EntityNode['properties'];
  confidence: number;
  score: number;
  signals: SignalScores;
}

export interface RetrievedChunk extends ChunkNode {
  score: number;
  signals: SignalScores;
  expanded: boolean;
}

export interface RetrievalResult {
  query: string;
  intent: QueryIntent;
  entities: RetrievedEntity[];
  chunks: RetrievedChunk[];
  relationships: RelationshipRecord[];
  search_methods_used: SignalName[];
  failed_methods: SignalSearchFailure[];
  dropped: DroppedCounts;
  warnings: BudgetExceededWarning[];
  token_estimate: number;
  context: string;
  duration_ms: number;
}
