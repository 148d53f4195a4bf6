/**
 * Keyword Match Search
 *
 * Raw score is the share of intent keywords found among a chunk's key
 * terms; chunks under `match_threshold` are left out.
 */

import type { RetrievalStrategy } from '@/core/strategies';
import type { Candidate, SearchContext, SearchOutcome, SignalSearcher } from '../types';

export function keywordOverlap(keywords: readonly string[], keyTerms: readonly string[]): number {
  if (keywords.length === 0) return 0;
  const terms = new Set(keyTerms.map((t) => t.toLowerCase()));
  const matched = keywords.filter((k) => terms.has(k)).length;
  return matched / keywords.length;
}

export const keywordMatchSearch: SignalSearcher = {
  name: 'keyword_matching',

  isEnabled(strategy: RetrievalStrategy): boolean {
    return strategy.search.keyword_matching.enabled;
  },

  async search(context: SearchContext): Promise<SearchOutcome> {
    const { graph, strategy, tuning, intent, signal } = context;
    const keywords = [
      ...new Set(intent.keywords.map((k) => k.trim().toLowerCase()).filter(Boolean))
    ];
    if (keywords.length === 0) return { candidates: [], relationships: [] };

    const threshold = strategy.search.keyword_matching.match_threshold;
    const chunks = await graph.searchChunksByKeyTerms(
      keywords,
      tuning.search.candidateLimit,
      signal
    );

    const candidates: Candidate[] = [];
    for (const chunk of chunks) {
      const score = keywordOverlap(keywords, chunk.key_terms ?? []);
      if (score > 0 && score >= threshold) {
        candidates.push({ kind: 'chunk', id: chunk.id, raw_score: score, payload: chunk });
      }
    }
    return { candidates, relationships: [] };
  }
};
