/**
 * Context Expander
 *
 * Pulls the chunks around each matched chunk by index arithmetic on its
 * document's chain, one graph read per document.
 */

import type { RetrievalStrategy } from '@/core/strategies';
import type { GraphClient } from '@/providers/graph';
import type { RetrievalConfig } from './config';
import { compareRanked } from './merge';
import type { RankedChunk, RankedSet } from './types';

type ExpandOptions = RetrievalStrategy['context']['expand_neighbors'];

/**
 * Indices in `[i - before, i + after]` of each origin, clamped at 0, that
 * are not origins themselves. Each maps to the best origin score in reach.
 */
export function neighbourWindow(
  origins: ReadonlyMap<number, number>,
  before: number,
  after: number
): Map<number, number> {
  const window = new Map<number, number>();
  for (const [index, score] of origins) {
    for (let i = Math.max(0, index - before); i <= index + after; i++) {
      if (origins.has(i)) continue;
      window.set(i, Math.max(window.get(i) ?? 0, score));
    }
  }
  return window;
}

export async function expandContext(
  ranked: RankedSet,
  graph: GraphClient,
  options: ExpandOptions,
  tuning: RetrievalConfig,
  signal?: AbortSignal
): Promise<RankedSet> {
  const { enabled, before, after } = options;
  if (!enabled || (before === 0 && after === 0) || ranked.chunks.length === 0) {
    return ranked;
  }

  // document -> chunk_index -> score
  const byDocument = new Map<string, Map<number, number>>();
  for (const { chunk, score } of ranked.chunks) {
    const origins = byDocument.get(chunk.document_id) ?? new Map<number, number>();
    origins.set(chunk.chunk_index, score);
    byDocument.set(chunk.document_id, origins);
  }

  const expansions = await Promise.all(
    [...byDocument].map(async ([documentId, origins]) => {
      const window = neighbourWindow(origins, before, after);
      if (window.size === 0) return [];
      const neighbours = await graph.getChunksByIndex(documentId, [...window.keys()], signal);
      return neighbours.map(
        (chunk): RankedChunk => ({
          id: chunk.id,
          chunk,
          score: Math.max(0, (window.get(chunk.chunk_index) ?? 0) - tuning.expansion.decay),
          signals: {},
          expanded: true
        })
      );
    })
  );

  return {
    ...ranked,
    chunks: [...ranked.chunks, ...expansions.flat()].sort(compareRanked)
  };
}
