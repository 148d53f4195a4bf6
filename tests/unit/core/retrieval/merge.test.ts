import { describe, expect, test } from 'vitest';
import {
  type Candidate,
  combinedScore,
  compareRanked,
  createConfig,
  latestYear,
  mergeResults,
  signalWeights,
  type SignalName,
  type SignalOutcome
} from '@/core/retrieval';
import { DEFAULT_RETRIEVAL } from '@/core/strategies';
import type { RelationshipRecord } from '@/providers/graph';
import { chunkNode, entityNode } from '@tests/helpers/fixtures';

const tuning = createConfig();
const SCORING = DEFAULT_RETRIEVAL.scoring;
const EVEN = {
  ...SCORING,
  graph_match_weight: 1,
  text_match_weight: 1,
  keyword_match_weight: 1,
  temporal_match_weight: 1
};

function chunkHit(documentId: string, index: number, raw: number, refs?: string[]): Candidate {
  const chunk = chunkNode(documentId, index, refs ? { temporal_refs: refs } : {});
  return { kind: 'chunk', id: chunk.id, raw_score: raw, payload: chunk };
}

function entityHit(type: string, id: string, raw: number, confidence = 1): Candidate {
  const entity = entityNode(type, id, {}, confidence);
  return { kind: 'entity', id: entity.key, raw_score: raw, payload: entity };
}

function outcome(
  signal: SignalName,
  candidates: Candidate[],
  relationships: RelationshipRecord[] = []
): SignalOutcome {
  return { signal, outcome: { candidates, relationships } };
}

describe('combinedScore', () => {
  test('weights each signal', () => {
    const weights = signalWeights(SCORING);
    expect(combinedScore({ graph_traversal: 0.8, chunk_text_search: 0.6 }, weights)).toBeCloseTo(1.8);
    expect(combinedScore({ temporal_filtering: 1 }, weights)).toBe(0.5);
    expect(combinedScore({}, weights)).toBe(0);
  });
});

describe('mergeResults', () => {
  test('sums weighted scores of a chunk found by two signals', () => {
    const merged = mergeResults(
      [
        outcome('graph_traversal', [chunkHit('doc', 1, 0.8)]),
        outcome('chunk_text_search', [chunkHit('doc', 1, 0.6)])
      ],
      SCORING,
      tuning
    );

    expect(merged.chunks).toHaveLength(1);
    expect(merged.chunks[0]?.signals).toEqual({ graph_traversal: 0.8, chunk_text_search: 0.6 });
    expect(merged.chunks[0]?.score).toBeCloseTo(1.5 * 0.8 + 0.6);
  });

  test('keeps the best raw score per signal', () => {
    const merged = mergeResults(
      [outcome('chunk_text_search', [chunkHit('doc', 1, 0.3), chunkHit('doc', 1, 0.7)])],
      SCORING,
      tuning
    );
    expect(merged.chunks[0]?.signals).toEqual({ chunk_text_search: 0.7 });
  });

  test('clamps raw scores to [0, 1]', () => {
    const merged = mergeResults(
      [outcome('chunk_text_search', [chunkHit('doc', 0, 3), chunkHit('doc', 1, -2)])],
      SCORING,
      tuning
    );
    expect(merged.chunks.map((c) => [c.id, c.score])).toEqual([
      ['doc:0', 1],
      ['doc:1', 0]
    ]);
  });

  test('only signals that produced a candidate appear', () => {
    const merged = mergeResults(
      [outcome('keyword_matching', [chunkHit('doc', 2, 0.5)])],
      SCORING,
      tuning
    );
    expect(Object.keys(merged.chunks[0]?.signals ?? {})).toEqual(['keyword_matching']);
  });

  test('drops entities below the confidence floor with their relationships', () => {
    const rel: RelationshipRecord = {
      type: 'PARTY_TO',
      source: { type: 'Party', id: 'acme' },
      target: { type: 'Contract', id: 'c1' },
      properties: {}
    };
    const merged = mergeResults(
      [
        outcome(
          'graph_traversal',
          [entityHit('Party', 'acme', 1), entityHit('Contract', 'c1', 0.5, 0.2)],
          [rel]
        )
      ],
      SCORING,
      tuning
    );

    expect(merged.entities.map((e) => e.id)).toEqual(['Party:acme']);
    expect(merged.relationships).toEqual([]);
  });

  test('deduplicates relationships reported by several signals', () => {
    const rel: RelationshipRecord = {
      type: 'PARTY_TO',
      source: { type: 'Party', id: 'acme' },
      target: { type: 'Contract', id: 'c1' },
      properties: {}
    };
    const entities = [entityHit('Party', 'acme', 1), entityHit('Contract', 'c1', 0.5)];
    const merged = mergeResults(
      [outcome('graph_traversal', entities, [rel]), outcome('graph_traversal', [], [rel])],
      SCORING,
      tuning
    );
    expect(merged.relationships).toEqual([rel]);
  });

  test('breaks score ties by signal priority, then id', () => {
    const merged = mergeResults(
      [
        outcome('chunk_text_search', [chunkHit('doc', 1, 0.5), chunkHit('doc', 3, 0.5)]),
        outcome('graph_traversal', [chunkHit('doc', 2, 0.5)])
      ],
      EVEN,
      tuning
    );
    expect(merged.chunks.map((c) => c.id)).toEqual(['doc:2', 'doc:1', 'doc:3']);
  });

  test('recency boost favors later references', () => {
    const merged = mergeResults(
      [
        outcome('chunk_text_search', [
          chunkHit('doc', 0, 0.5, ['2020']),
          chunkHit('doc', 1, 0.5, ['Q3 2024']),
          chunkHit('doc', 2, 0.5)
        ])
      ],
      { ...SCORING, recency_boost: true },
      tuning
    );

    expect(merged.chunks.map((c) => [c.id, c.score])).toEqual([
      ['doc:1', 0.75],
      ['doc:0', 0.5],
      ['doc:2', 0.5]
    ]);
  });

  test('is deterministic for the same outcomes', () => {
    const outcomes = [
      outcome('chunk_text_search', [chunkHit('b', 0, 0.4), chunkHit('a', 0, 0.4)]),
      outcome('keyword_matching', [chunkHit('a', 1, 0.9)])
    ];
    const first = mergeResults(outcomes, SCORING, tuning);
    const second = mergeResults(outcomes, SCORING, tuning);
    expect(second).toEqual(first);
    expect(first.chunks.map((c) => c.id)).toEqual(['a:1', 'a:0', 'b:0']);
  });
});

describe('compareRanked', () => {
  test('matched items outrank expanded ones at equal score', () => {
    const matched = { id: 'z', score: 1, signals: { temporal_filtering: 1 }, expanded: false };
    const expanded = { id: 'a', score: 1, signals: {}, expanded: true };
    expect([expanded, matched].sort(compareRanked).map((r) => r.id)).toEqual(['z', 'a']);
  });
});

describe('latestYear', () => {
  test('takes the latest end year across references', () => {
    expect(latestYear(['January 5, 2021', 'between 2019 and 2023'])).toBe(2023);
  });

  test('returns null without dates', () => {
    expect(latestYear(['30 days'])).toBeNull();
    expect(latestYear(undefined)).toBeNull();
  });
});
