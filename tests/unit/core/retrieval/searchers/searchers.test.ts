/**
 * Signal Searcher Tests
 *
 * Each searcher against a small contract graph held in memory.
 */

import { describe, expect, test } from 'vitest';
import {
  chunkTextSearch,
  createConfig,
  graphTraversalSearch,
  keywordMatchSearch,
  keywordOverlap,
  matchesTemporalQuery,
  parseTemporalQuery,
  prefilterTokens,
  type QueryIntentInput,
  queryIntentSchema,
  type SearchContext,
  type SearchOutcome,
  temporalFilterSearch
} from '@/core/retrieval';
import { StrategyStore } from '@/core/strategies';
import { chunkNode } from '@tests/helpers/fixtures';
import { MemoryGraphClient } from '@tests/helpers/memory-graph';

/**
 * Party:acme -PARTY_TO-> Contract:c1 -CONTAINS-> Clause:x
 * acme was read from doc:0, the clause from doc:1.
 */
async function contractGraph(): Promise<MemoryGraphClient> {
  const graph = new MemoryGraphClient();
  await graph.executeTransaction(async (tx) => {
    await tx.createChunks([
      chunkNode('doc', 0, {
        text: 'Acme Corp shall deliver goods. Acme Corp pays freight.',
        key_terms: ['delivery', 'goods'],
        temporal_refs: ['January 5, 2024']
      }),
      chunkNode('doc', 1, {
        text: 'Payment is due in 30 days.',
        key_terms: ['payment'],
        temporal_refs: ['30 days']
      }),
      chunkNode('doc', 2, { text: 'Signed by Acme Corp.', key_terms: ['signature'] })
    ]);
    const entity = (type: string, id: string, properties: Record<string, string>) => ({
      key: `${type}:${id}`,
      type,
      id,
      properties,
      confidence: 1,
      source_document: 'doc'
    });
    await tx.mergeEntities([
      entity('Party', 'acme', { name: 'Acme Corp' }),
      entity('Contract', 'c1', { title: 'Supply Agreement' }),
      entity('Clause', 'x', { number: '4' })
    ]);
    await tx.createRelationships([
      { type: 'PARTY_TO', source_key: 'Party:acme', target_key: 'Contract:c1', properties: {} },
      { type: 'CONTAINS', source_key: 'Contract:c1', target_key: 'Clause:x', properties: {} }
    ]);
    await tx.linkEntitiesToChunks([
      { entity_key: 'Party:acme', chunk_id: 'doc:0' },
      { entity_key: 'Clause:x', chunk_id: 'doc:1' }
    ]);
  });
  return graph;
}

async function contextFor(
  intent: QueryIntentInput,
  options: { question?: string; retrieval?: unknown } = {}
): Promise<SearchContext> {
  const strategies = new StrategyStore();
  if (options.retrieval !== undefined) strategies.update('retrieval', options.retrieval);
  return {
    question: options.question ?? '',
    intent: queryIntentSchema.parse(intent),
    strategy: strategies.get().retrieval,
    graph: await contractGraph(),
    tuning: createConfig(),
    signal: new AbortController().signal
  };
}

function scores(outcome: SearchOutcome): [string, number][] {
  return outcome.candidates.map((c) => [c.id, c.raw_score]);
}

describe('graphTraversalSearch', () => {
  test('scores entities by hop distance and emits their chunks', async () => {
    const outcome = await graphTraversalSearch.search(await contextFor({ entity_types: ['Party'] }));

    expect(scores(outcome)).toEqual([
      ['Party:acme', 1],
      ['Contract:c1', 0.5],
      ['Clause:x', 0.25],
      ['doc:0', 1],
      ['doc:1', 0.25]
    ]);
    expect(outcome.relationships.map((r) => r.type)).toEqual(['CONTAINS', 'PARTY_TO']);
  });

  test('respects max_depth', async () => {
    const outcome = await graphTraversalSearch.search(
      await contextFor(
        { entity_types: ['Party'] },
        { retrieval: { search: { graph_traversal: { max_depth: 1 } } } }
      )
    );
    expect(outcome.candidates.map((c) => c.id)).toEqual(['Party:acme', 'Contract:c1', 'doc:0']);
  });

  test('seeds by name when the intent has no structure', async () => {
    const outcome = await graphTraversalSearch.search(await contextFor({ search_text: 'supply' }));
    expect(outcome.candidates[0]).toMatchObject({ id: 'Contract:c1', raw_score: 1 });
  });

  test('seeds by property filter', async () => {
    const outcome = await graphTraversalSearch.search(
      await contextFor({ entity_types: ['Clause'], filters: { number: '4' } })
    );
    expect(outcome.candidates[0]?.id).toBe('Clause:x');
  });

  test('finds nothing without seeds', async () => {
    const outcome = await graphTraversalSearch.search(await contextFor({ search_text: 'Globex' }));
    expect(outcome).toEqual({ candidates: [], relationships: [] });
  });
});

describe('chunkTextSearch', () => {
  test('contains scores by match count relative to the best chunk', async () => {
    const outcome = await chunkTextSearch.search(await contextFor({ search_text: 'acme corp' }));
    expect(scores(outcome)).toEqual([
      ['doc:0', 1],
      ['doc:2', 0.5]
    ]);
  });

  test('falls back to the question when there is no search text', async () => {
    const outcome = await chunkTextSearch.search(await contextFor({}, { question: 'freight' }));
    expect(scores(outcome)).toEqual([['doc:0', 1]]);
  });

  test('regex method matches patterns', async () => {
    const outcome = await chunkTextSearch.search(
      await contextFor(
        { search_text: 'pay(s|ment)' },
        { retrieval: { search: { chunk_text_search: { method: 'regex' } } } }
      )
    );
    expect(scores(outcome)).toEqual([
      ['doc:0', 1],
      ['doc:1', 1]
    ]);
  });

  test('fulltext uses the index score', async () => {
    const outcome = await chunkTextSearch.search(
      await contextFor(
        { search_text: 'acme goods' },
        { retrieval: { search: { chunk_text_search: { method: 'fulltext' } } } }
      )
    );
    expect(scores(outcome)).toEqual([
      ['doc:0', 1],
      ['doc:2', 0.5]
    ]);
  });

  test('finds nothing for an empty query', async () => {
    const outcome = await chunkTextSearch.search(await contextFor({ search_text: '   ' }));
    expect(outcome.candidates).toEqual([]);
  });
});

describe('keywordMatchSearch', () => {
  test('scores the share of keywords among key terms', async () => {
    const outcome = await keywordMatchSearch.search(
      await contextFor({ keywords: ['Goods', 'delivery', 'goods'] })
    );
    expect(scores(outcome)).toEqual([['doc:0', 1]]);
  });

  test('keeps chunks at the threshold', async () => {
    const outcome = await keywordMatchSearch.search(
      await contextFor({ keywords: ['goods', 'payment'] })
    );
    expect(scores(outcome)).toEqual([
      ['doc:0', 0.5],
      ['doc:1', 0.5]
    ]);
  });

  test('drops chunks under the threshold', async () => {
    const outcome = await keywordMatchSearch.search(
      await contextFor(
        { keywords: ['goods', 'payment'] },
        { retrieval: { search: { keyword_matching: { match_threshold: 0.6 } } } }
      )
    );
    expect(outcome.candidates).toEqual([]);
  });

  test('keywordOverlap', () => {
    expect(keywordOverlap(['goods', 'price'], ['Goods', 'delivery'])).toBe(0.5);
    expect(keywordOverlap([], ['goods'])).toBe(0);
  });
});

describe('temporalFilterSearch', () => {
  test('keeps chunks whose dates fall in the hinted range', async () => {
    const outcome = await temporalFilterSearch.search(await contextFor({ temporal_hints: ['2024'] }));
    expect(scores(outcome)).toEqual([['doc:0', 1]]);
  });

  test('matches normalized durations', async () => {
    const outcome = await temporalFilterSearch.search(
      await contextFor({ temporal_hints: ['thirty (30) days'] })
    );
    expect(scores(outcome)).toEqual([['doc:1', 1]]);
  });

  test('detects dates in the question when no hints are given', async () => {
    const outcome = await temporalFilterSearch.search(
      await contextFor({}, { question: 'What was due on 2024-01-05?' })
    );
    expect(scores(outcome)).toEqual([['doc:0', 1]]);
  });

  test('does not look at the question when auto_detect is off', async () => {
    const outcome = await temporalFilterSearch.search(
      await contextFor(
        {},
        {
          question: 'What was due on 2024-01-05?',
          retrieval: { search: { temporal_filtering: { auto_detect: false } } }
        }
      )
    );
    expect(outcome.candidates).toEqual([]);
  });

  test('finds dates late in a span wider than the year cap', async () => {
    const outcome = await temporalFilterSearch.search(
      await contextFor({ temporal_hints: ['1950 to 2024'] })
    );
    expect(scores(outcome)).toEqual([['doc:0', 1]]);
  });

  test('prefilterTokens lists years, then decades, then gives up', () => {
    expect(prefilterTokens(parseTemporalQuery(['2023 to 2024', '30 days']))).toEqual([
      '2023',
      '2024',
      'day'
    ]);
    expect(prefilterTokens(parseTemporalQuery(['1950 to 2024']))).toEqual([
      '195',
      '196',
      '197',
      '198',
      '199',
      '200',
      '201',
      '202'
    ]);
    expect(prefilterTokens(parseTemporalQuery(['1000-01-01 to 2024-12-31', '30 days']))).toEqual(
      []
    );
  });

  test('parseTemporalQuery splits ranges and durations', () => {
    expect(parseTemporalQuery(['Q1 2024', 'sixty (60) days', 'soon'])).toEqual({
      ranges: [{ start: '2024-01-01', end: '2024-03-31' }],
      durations: ['60 days']
    });
  });

  test('matchesTemporalQuery', () => {
    const query = parseTemporalQuery(['March 2023']);
    expect(matchesTemporalQuery(['2023-03-15'], query)).toBe(true);
    expect(matchesTemporalQuery(['2023-04-01', '30 days'], query)).toBe(false);
  });
});
