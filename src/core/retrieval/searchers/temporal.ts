/**
 * Temporal Filter Search
 *
 * A filter more than a ranker: chunks whose temporal references fall in a
 * range named by the question score 1, everything else is left out.
 */

import {
  type DateRange,
  findTemporalReferences,
  normalizeDuration,
  parseDateRanges,
  rangesOverlap
} from '@/core/ingestion/metadata';
import type { RetrievalStrategy } from '@/core/strategies';
import type { Candidate, SearchContext, SearchOutcome, SignalSearcher } from '../types';

/** Most year or decade tokens one range may put into the graph query */
const MAX_RANGE_TOKENS = 50;

export interface TemporalQuery {
  ranges: DateRange[];
  /** Normalized, e.g. "30 days" */
  durations: string[];
}

export function parseTemporalQuery(hints: readonly string[]): TemporalQuery {
  const ranges: DateRange[] = [];
  const durations = new Set<string>();
  for (const hint of hints) {
    const parsed = parseDateRanges(hint);
    if (parsed.length > 0) {
      ranges.push(...parsed);
      continue;
    }
    const duration = normalizeDuration(hint);
    if (duration) durations.add(duration);
  }
  return { ranges, durations: [...durations] };
}

/**
 * Whether any of a chunk's references satisfies the query.
 */
export function matchesTemporalQuery(refs: readonly string[], query: TemporalQuery): boolean {
  return refs.some((ref) => {
    const refRanges = parseDateRanges(ref);
    if (refRanges.length > 0) {
      return refRanges.some((r) => query.ranges.some((q) => rangesOverlap(r, q)));
    }
    const duration = normalizeDuration(ref);
    return duration !== null && query.durations.includes(duration);
  });
}

/**
 * Tokens for one range: its years, or its decades ("195" for the 1950s)
 * when the years are too many. Null when even the decades are.
 */
function rangeTokens(startYear: number, endYear: number): string[] | null {
  if (endYear - startYear < MAX_RANGE_TOKENS) {
    return Array.from({ length: endYear - startYear + 1 }, (_, i) => String(startYear + i));
  }
  const first = Math.floor(startYear / 10);
  const last = Math.floor(endYear / 10);
  if (last - first < MAX_RANGE_TOKENS) {
    return Array.from({ length: last - first + 1 }, (_, i) => String(first + i).padStart(3, '0'));
  }
  return null;
}

/**
 * Coarse prefilter tokens for the graph query: the years the ranges span
 * and the duration units. Empty means every chunk with temporal
 * references, used when a range is too wide to enumerate.
 */
export function prefilterTokens(query: TemporalQuery): string[] {
  const tokens = new Set<string>();
  for (const { start, end } of query.ranges) {
    const years = rangeTokens(Number(start.slice(0, 4)), Number(end.slice(0, 4)));
    if (years === null) return [];
    for (const year of years) tokens.add(year);
  }
  for (const duration of query.durations) {
    const unit = duration.split(' ')[1]?.replace(/s$/, '');
    if (unit) tokens.add(unit);
  }
  return [...tokens];
}

export const temporalFilterSearch: SignalSearcher = {
  name: 'temporal_filtering',

  isEnabled(strategy: RetrievalStrategy): boolean {
    return strategy.search.temporal_filtering.enabled;
  },

  async search(context: SearchContext): Promise<SearchOutcome> {
    const { graph, strategy, tuning, intent, question, signal } = context;

    let hints = intent.temporal_hints;
    if (hints.length === 0 && strategy.search.temporal_filtering.auto_detect) {
      hints = findTemporalReferences(question).map((m) => m.text);
    }

    const query = parseTemporalQuery(hints);
    if (query.ranges.length === 0 && query.durations.length === 0) {
      return { candidates: [], relationships: [] };
    }

    const chunks = await graph.getChunksWithTemporalRefs(
      prefilterTokens(query),
      tuning.search.candidateLimit,
      signal
    );

    const candidates: Candidate[] = chunks
      .filter((chunk) => matchesTemporalQuery(chunk.temporal_refs ?? [], query))
      .map((chunk) => ({ kind: 'chunk', id: chunk.id, raw_score: 1, payload: chunk }));
    return { candidates, relationships: [] };
  }
};
