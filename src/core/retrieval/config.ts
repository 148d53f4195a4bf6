/**
 * Retrieval Tuning
 *
 * Internal constants of the retrieval engine. The user-facing knobs live in
 * the RetrievalStrategy; these stay fixed unless overridden with
 * createConfig(), which tests and experiments use.
 */

import type { DeepPartial } from '@/core/strategies';

// ═══════════════════════════════════════════════════════════════════════════════
// Type Definitions
// ═══════════════════════════════════════════════════════════════════════════════

interface SearchTuning {
  /** Per-searcher timeout; a searcher that runs longer is dropped from the merge */
  readonly timeoutMs: number;
  /** Candidates each chunk searcher asks the graph for */
  readonly candidateLimit: number;
}

interface GraphTuning {
  /** Neighbour score = hopDecay ^ depth (seeds score 1) */
  readonly hopDecay: number;
  /** Seed entities fetched per query */
  readonly seedLimit: number;
  /** Entities reached by traversal */
  readonly traversalLimit: number;
}

interface ExpansionTuning {
  /** Subtracted from the originating chunk's score */
  readonly decay: number;
}

interface BudgetTuning {
  /** Token estimate = ceil(chars / charsPerToken) */
  readonly charsPerToken: number;
}

interface RecencyTuning {
  /** Largest boost `scoring.recency_boost` can add to a chunk */
  readonly weight: number;
}

export interface RetrievalConfig {
  readonly search: SearchTuning;
  readonly graph: GraphTuning;
  readonly expansion: ExpansionTuning;
  readonly budget: BudgetTuning;
  readonly recency: RecencyTuning;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Defaults
// ═══════════════════════════════════════════════════════════════════════════════

const search = {
  timeoutMs: 5000,
  candidateLimit: 50
} as const satisfies SearchTuning;

const graph = {
  hopDecay: 0.5,
  seedLimit: 25,
  traversalLimit: 100
} as const satisfies GraphTuning;

/** A neighbour always ranks below the chunk it was expanded from */
const expansion = {
  decay: 0.05
} as const satisfies ExpansionTuning;

const budget = {
  charsPerToken: 4
} as const satisfies BudgetTuning;

const recency = {
  weight: 0.25
} as const satisfies RecencyTuning;

export const defaults = {
  search,
  graph,
  expansion,
  budget,
  recency
} as const satisfies RetrievalConfig;

/**
 * Create config with optional overrides.
 *
 * @example
 * const fast = createConfig({ search: { timeoutMs: 50 } });
 */
export function createConfig(overrides?: DeepPartial<RetrievalConfig>): RetrievalConfig {
  if (!overrides) return defaults;

  return {
    search: { ...defaults.search, ...overrides.search },
    graph: { ...defaults.graph, ...overrides.graph },
    expansion: { ...defaults.expansion, ...overrides.expansion },
    budget: { ...defaults.budget, ...overrides.budget },
    recency: { ...defaults.recency, ...overrides.recency }
  };
}
