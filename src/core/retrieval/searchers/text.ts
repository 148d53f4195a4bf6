/**
 * Chunk Text Search
 *
 * Matches the intent's search text against chunk text. Raw score is the
 * match count (or index score) relative to the best hit.
 */

import type { RetrievalStrategy } from '@/core/strategies';
import { type ChunkNode, escapeRegex } from '@/providers/graph';
import type { Candidate, SearchContext, SearchOutcome, SignalSearcher } from '../types';

function countMatches(pattern: RegExp, text: string | undefined): number {
  // Text not stored: the graph matched, so count it once
  if (text === undefined) return 1;
  return Math.max(text.match(pattern)?.length ?? 0, 1);
}

function localPattern(method: 'contains' | 'regex', query: string): RegExp {
  if (method === 'regex') {
    try {
      return new RegExp(query, 'gi');
    } catch {
      // Server-side regex dialect may accept what JS does not
    }
  }
  return new RegExp(escapeRegex(query), 'gi');
}

export const chunkTextSearch: SignalSearcher = {
  name: 'chunk_text_search',

  isEnabled(strategy: RetrievalStrategy): boolean {
    return strategy.search.chunk_text_search.enabled;
  },

  async search(context: SearchContext): Promise<SearchOutcome> {
    const { graph, strategy, tuning, intent, question, signal } = context;
    const query = (intent.search_text || question).trim();
    if (!query) return { candidates: [], relationships: [] };

    const method = strategy.search.chunk_text_search.method;
    const hits = await graph.searchChunkText(
      method,
      query,
      tuning.search.candidateLimit,
      signal
    );

    let scored: { chunk: ChunkNode; score: number }[];
    if (method === 'fulltext') {
      scored = hits.map(({ item, score }) => ({ chunk: item, score }));
    } else {
      const pattern = localPattern(method, query);
      scored = hits.map(({ item }) => ({ chunk: item, score: countMatches(pattern, item.text) }));
    }

    const best = Math.max(0, ...scored.map((s) => s.score));
    if (best <= 0) return { candidates: [], relationships: [] };

    const candidates: Candidate[] = scored
      .filter((s) => s.score > 0)
      .map(({ chunk, score }) => ({
        kind: 'chunk',
        id: chunk.id,
        raw_score: score / best,
        payload: chunk
      }));
    return { candidates, relationships: [] };
  }
};
