/**
 * Result Merger
 *
 * Deduplicates candidates across signals by (kind, id) and ranks them by
 * the weighted sum of their per-signal raw scores.
 */

import { parseDateRanges } from '@/core/ingestion/metadata';
import type { RetrievalStrategy } from '@/core/strategies';
import {
  type ChunkNode,
  type EntityNode,
  entityKey,
  type RelationshipRecord
} from '@/providers/graph';
import type { RetrievalConfig } from './config';
import {
  type RankedChunk,
  type RankedEntity,
  type RankedSet,
  SIGNAL_PRIORITY,
  type SignalName,
  type SignalOutcome,
  type SignalScores
} from './types';

type Scoring = RetrievalStrategy['scoring'];

// ═══════════════════════════════════════════════════════════════════════════════
// Scoring
// ═══════════════════════════════════════════════════════════════════════════════

export function signalWeights(scoring: Scoring): Record<SignalName, number> {
  return {
    graph_traversal: scoring.graph_match_weight,
    chunk_text_search: scoring.text_match_weight,
    keyword_matching: scoring.keyword_match_weight,
    temporal_filtering: scoring.temporal_match_weight
  };
}

export function combinedScore(signals: SignalScores, weights: Record<SignalName, number>): number {
  let total = 0;
  for (const name of SIGNAL_PRIORITY) {
    const raw = signals[name];
    if (raw !== undefined) total += weights[name] * raw;
  }
  return total;
}

/** Position of the best contributing signal; signal-less items go last */
function bestSignalRank(signals: SignalScores): number {
  const index = SIGNAL_PRIORITY.findIndex((name) => signals[name] !== undefined);
  return index === -1 ? SIGNAL_PRIORITY.length : index;
}

/**
 * Ranking order: score descending, matched before expanded, best signal
 * priority, then id.
 */
export function compareRanked(
  a: { id: string; score: number; signals: SignalScores; expanded: boolean },
  b: { id: string; score: number; signals: SignalScores; expanded: boolean }
): number {
  if (a.score !== b.score) return b.score - a.score;
  if (a.expanded !== b.expanded) return a.expanded ? 1 : -1;
  const rank = bestSignalRank(a.signals) - bestSignalRank(b.signals);
  if (rank !== 0) return rank;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

function clamp01(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

// ═══════════════════════════════════════════════════════════════════════════════
// Recency
// ═══════════════════════════════════════════════════════════════════════════════

/** Latest year any of the references ends in */
export function latestYear(refs: readonly string[] | undefined): number | null {
  let latest: number | null = null;
  for (const ref of refs ?? []) {
    for (const range of parseDateRanges(ref)) {
      const year = Number(range.end.slice(0, 4));
      if (latest === null || year > latest) latest = year;
    }
  }
  return latest;
}

/**
 * Add up to `weight` to chunks by how recent their latest reference is,
 * relative to the other candidates.
 */
function applyRecency(chunks: RankedChunk[], weight: number): void {
  const years = new Map<string, number>();
  for (const ranked of chunks) {
    const year = latestYear(ranked.chunk.temporal_refs);
    if (year !== null) years.set(ranked.id, year);
  }
  if (years.size === 0) return;

  const min = Math.min(...years.values());
  const max = Math.max(...years.values());
  for (const ranked of chunks) {
    const year = years.get(ranked.id);
    if (year === undefined) continue;
    ranked.score += max === min ? weight : (weight * (year - min)) / (max - min);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Merge
// ═══════════════════════════════════════════════════════════════════════════════

function relationshipKey(rel: RelationshipRecord): string {
  return `${entityKey(rel.source)}|${rel.type}|${entityKey(rel.target)}`;
}

export function mergeResults(
  outcomes: readonly SignalOutcome[],
  scoring: Scoring,
  tuning: RetrievalConfig
): RankedSet {
  const entities = new Map<string, { entity: EntityNode; signals: SignalScores }>();
  const chunks = new Map<string, { chunk: ChunkNode; signals: SignalScores }>();
  const relationships = new Map<string, RelationshipRecord>();

  for (const { signal, outcome } of outcomes) {
    for (const candidate of outcome.candidates) {
      const raw = clamp01(candidate.raw_score);
      let signals: SignalScores;
      if (candidate.kind === 'entity') {
        const entry = entities.get(candidate.id) ?? { entity: candidate.payload, signals: {} };
        entities.set(candidate.id, entry);
        signals = entry.signals;
      } else {
        const entry = chunks.get(candidate.id) ?? { chunk: candidate.payload, signals: {} };
        chunks.set(candidate.id, entry);
        signals = entry.signals;
      }
      signals[signal] = Math.max(signals[signal] ?? 0, raw);
    }
    for (const rel of outcome.relationships) {
      relationships.set(relationshipKey(rel), rel);
    }
  }

  const weights = signalWeights(scoring);

  const rankedEntities: RankedEntity[] = [...entities]
    .filter(([, { entity }]) => entity.confidence >= scoring.entity_confidence_min)
    .map(([id, { entity, signals }]) => ({
      id,
      entity,
      signals,
      score: combinedScore(signals, weights),
      expanded: false
    }));

  const rankedChunks: RankedChunk[] = [...chunks].map(([id, { chunk, signals }]) => ({
    id,
    chunk,
    signals,
    score: combinedScore(signals, weights),
    expanded: false
  }));

  if (scoring.recency_boost) applyRecency(rankedChunks, tuning.recency.weight);

  const kept = new Set(rankedEntities.map((e) => e.id));
  return {
    entities: rankedEntities.sort(compareRanked),
    chunks: rankedChunks.sort(compareRanked),
    relationships: [...relationships.values()].filter(
      (rel) => kept.has(entityKey(rel.source)) && kept.has(entityKey(rel.target))
    )
  };
}
