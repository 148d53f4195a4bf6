/**
 * Graph Traversal Search
 *
 * Seeds from entities matching the intent, walks entity-to-entity edges up
 * to `max_depth` hops, and emits the reached entities plus the chunks they
 * were extracted from.
 */

import type { RetrievalStrategy } from '@/core/strategies';
import type { EntityNode } from '@/providers/graph';
import type { Candidate, SearchContext, SearchOutcome, SignalSearcher } from '../types';

async function findSeeds(context: SearchContext): Promise<EntityNode[]> {
  const { intent, graph, tuning, signal } = context;
  const hasStructure = intent.entity_types.length > 0 || Object.keys(intent.filters).length > 0;

  if (hasStructure) {
    return graph.findEntities(
      { types: intent.entity_types, filters: intent.filters, limit: tuning.graph.seedLimit },
      signal
    );
  }

  const name = intent.search_text.trim();
  if (!name) return [];
  return graph.findEntities(
    { types: [], filters: {}, nameContains: name, limit: tuning.graph.seedLimit },
    signal
  );
}

export const graphTraversalSearch: SignalSearcher = {
  name: 'graph_traversal',

  isEnabled(strategy: RetrievalStrategy): boolean {
    return strategy.search.graph_traversal.enabled;
  },

  async search(context: SearchContext): Promise<SearchOutcome> {
    const { graph, strategy, tuning, signal } = context;

    const seeds = await findSeeds(context);
    if (seeds.length === 0) return { candidates: [], relationships: [] };
    signal.throwIfAborted();

    // key -> [entity, score]
    const reached = new Map<string, { entity: EntityNode; score: number }>();
    for (const seed of seeds) reached.set(seed.key, { entity: seed, score: 1 });

    const hits = await graph.traverseEntities(
      seeds.map((s) => s.key),
      strategy.search.graph_traversal.max_depth,
      tuning.graph.traversalLimit,
      signal
    );
    for (const { entity, depth } of hits) {
      const score = tuning.graph.hopDecay ** depth;
      const current = reached.get(entity.key);
      if (!current || current.score < score) reached.set(entity.key, { entity, score });
    }
    signal.throwIfAborted();

    const keys = [...reached.keys()];
    const [provenance, relationships] = await Promise.all([
      graph.getProvenanceChunks(keys, signal),
      graph.getRelationshipsAmong(keys, signal)
    ]);

    const candidates: Candidate[] = [...reached.values()].map(({ entity, score }) => ({
      kind: 'entity',
      id: entity.key,
      raw_score: score,
      payload: entity
    }));

    for (const { entity_key, chunk } of provenance) {
      const score = reached.get(entity_key)?.score ?? 0;
      if (score > 0) {
        candidates.push({ kind: 'chunk', id: chunk.id, raw_score: score, payload: chunk });
      }
    }

    return { candidates, relationships };
  }
};
