import { describe, expect, test } from 'vitest';
import { createConfig, enforceLimits, estimateTokens, type RankedSet } from '@/core/retrieval';
import type { RelationshipRecord } from '@/providers/graph';
import { chunkNode, entityNode, rankedChunk, rankedEntity } from '@tests/helpers/fixtures';

const tuning = createConfig();
const ROOMY = { max_entities: 100, max_chunks: 50, max_context_tokens: 32000 };

/** 400 characters, so 100 tokens, per item */
function fixedRender(set: RankedSet): string {
  return 'x'.repeat((set.entities.length + set.chunks.length) * 400);
}

function ranked(entityCount: number, chunkCount: number): RankedSet {
  return {
    entities: Array.from({ length: entityCount }, (_, i) =>
      rankedEntity(entityNode('Party', `p${i}`), 1 - i / 100)
    ),
    chunks: Array.from({ length: chunkCount }, (_, i) =>
      rankedChunk(chunkNode('doc', i), 1 - i / 100)
    ),
    relationships: []
  };
}

describe('estimateTokens', () => {
  test('rounds up', () => {
    expect(estimateTokens('', 4)).toBe(0);
    expect(estimateTokens('abcde', 4)).toBe(2);
  });
});

describe('enforceLimits', () => {
  test('keeps everything within budget', () => {
    const result = enforceLimits(ranked(2, 3), ROOMY, fixedRender, tuning);

    expect(result.entities).toHaveLength(2);
    expect(result.chunks).toHaveLength(3);
    expect(result.warnings).toEqual([]);
    expect(result.dropped).toEqual({
      max_entities: 0,
      max_chunks: 0,
      max_context_tokens: { entities: 0, chunks: 0 }
    });
    expect(result.token_estimate).toBe(500);
  });

  test('keeps the top k chunks and reports the rest', () => {
    const result = enforceLimits(ranked(0, 12), { ...ROOMY, max_chunks: 10 }, fixedRender, tuning);

    expect(result.chunks.map((c) => c.chunk.chunk_index)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
    expect(result.dropped.max_chunks).toBe(2);
    expect(result.warnings).toEqual([
      {
        type: 'BudgetExceededWarning',
        stage: 'max_chunks',
        limit: 10,
        dropped: 2,
        message: 'max_chunks (10) dropped 2 chunks'
      }
    ]);
  });

  test('caps entities and prunes their relationships', () => {
    const set = ranked(2, 0);
    const rel: RelationshipRecord = {
      type: 'KNOWS',
      source: { type: 'Party', id: 'p0' },
      target: { type: 'Party', id: 'p1' },
      properties: {}
    };
    const result = enforceLimits(
      { ...set, relationships: [rel] },
      { ...ROOMY, max_entities: 1 },
      fixedRender,
      tuning
    );

    expect(result.entities.map((e) => e.id)).toEqual(['Party:p0']);
    expect(result.relationships).toEqual([]);
    expect(result.warnings[0]?.message).toBe('max_entities (1) dropped 1 entities');
  });

  test('drops the lowest-ranked entities first under the token budget', () => {
    const result = enforceLimits(
      ranked(3, 4),
      { ...ROOMY, max_context_tokens: 500 },
      fixedRender,
      tuning
    );

    expect(result.entities.map((e) => e.id)).toEqual(['Party:p0']);
    expect(result.chunks).toHaveLength(4);
    expect(result.dropped.max_context_tokens).toEqual({ entities: 2, chunks: 0 });
    expect(result.token_estimate).toBe(500);
  });

  test('drops chunks once no entity is left', () => {
    const result = enforceLimits(
      ranked(3, 4),
      { ...ROOMY, max_context_tokens: 200 },
      fixedRender,
      tuning
    );

    expect(result.entities).toEqual([]);
    expect(result.chunks.map((c) => c.chunk.chunk_index)).toEqual([0, 1]);
    expect(result.dropped.max_context_tokens).toEqual({ entities: 3, chunks: 2 });
    expect(result.warnings).toEqual([
      {
        type: 'BudgetExceededWarning',
        stage: 'max_context_tokens',
        limit: 200,
        dropped: 5,
        message: 'max_context_tokens (200) dropped 5 items (3 entities, 2 chunks)'
      }
    ]);
  });

  test('applies the stages in order', () => {
    const result = enforceLimits(
      ranked(5, 5),
      { max_entities: 2, max_chunks: 3, max_context_tokens: 400 },
      fixedRender,
      tuning
    );

    expect(result.warnings.map((w) => w.stage)).toEqual([
      'max_entities',
      'max_chunks',
      'max_context_tokens'
    ]);
    expect(result.dropped).toEqual({
      max_entities: 3,
      max_chunks: 2,
      max_context_tokens: { entities: 1, chunks: 0 }
    });
  });

  test('returns the rendered context of what was kept', () => {
    const result = enforceLimits(
      ranked(1, 1),
      ROOMY,
      (set) => set.chunks.map((c) => c.id).join(','),
      tuning
    );
    expect(result.context).toBe('doc:0');
    expect(result.token_estimate).toBe(2);
  });
});
