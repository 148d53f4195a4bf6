import { describe, expect, test } from 'vitest';
import { createConfig, expandContext, neighbourWindow, type RankedSet } from '@/core/retrieval';
import { chunkNode, rankedChunk } from '@tests/helpers/fixtures';
import { MemoryGraphClient } from '@tests/helpers/memory-graph';

const tuning = createConfig();
const AROUND = { enabled: true, before: 1, after: 1 };

async function graphWithDocument(documentId: string, count: number): Promise<MemoryGraphClient> {
  const graph = new MemoryGraphClient();
  await graph.executeTransaction((tx) =>
    tx.createChunks(
      Array.from({ length: count }, (_, i) => chunkNode(documentId, i, { text: `chunk ${i}` }))
    )
  );
  return graph;
}

function rankedSetOf(...chunks: ReturnType<typeof rankedChunk>[]): RankedSet {
  return { entities: [], chunks, relationships: [] };
}

describe('neighbourWindow', () => {
  test('covers the indices around each origin', () => {
    expect([...neighbourWindow(new Map([[5, 0.9]]), 1, 1)]).toEqual([
      [4, 0.9],
      [6, 0.9]
    ]);
  });

  test('clamps at the start of the document', () => {
    expect([...neighbourWindow(new Map([[0, 0.8]]), 2, 1)]).toEqual([[1, 0.8]]);
  });

  test('excludes origins and keeps the best score in reach', () => {
    const window = neighbourWindow(
      new Map([
        [2, 0.5],
        [4, 0.9]
      ]),
      1,
      1
    );
    expect(Object.fromEntries(window)).toEqual({ 1: 0.5, 3: 0.9, 5: 0.9 });
  });
});

describe('expandContext', () => {
  test('adds the neighbours of a matched chunk', async () => {
    const graph = await graphWithDocument('doc-a', 10);
    const expanded = await expandContext(
      rankedSetOf(rankedChunk(chunkNode('doc-a', 5), 1)),
      graph,
      AROUND,
      tuning
    );

    expect(expanded.chunks.map((c) => c.chunk.chunk_index)).toEqual([5, 4, 6]);
    expect(expanded.chunks.map((c) => c.expanded)).toEqual([false, true, true]);
    expect(expanded.chunks[1]?.score).toBeCloseTo(0.95);
    expect(expanded.chunks[1]?.signals).toEqual({});
  });

  test('stops at both ends of the chain', async () => {
    const graph = await graphWithDocument('doc-a', 10);
    const first = await expandContext(
      rankedSetOf(rankedChunk(chunkNode('doc-a', 0), 1)),
      graph,
      AROUND,
      tuning
    );
    const last = await expandContext(
      rankedSetOf(rankedChunk(chunkNode('doc-a', 9), 1)),
      graph,
      AROUND,
      tuning
    );

    expect(first.chunks.map((c) => c.chunk.chunk_index)).toEqual([0, 1]);
    expect(last.chunks.map((c) => c.chunk.chunk_index)).toEqual([9, 8]);
  });

  test('does not duplicate a neighbour that was also matched', async () => {
    const graph = await graphWithDocument('doc-a', 10);
    const expanded = await expandContext(
      rankedSetOf(rankedChunk(chunkNode('doc-a', 3), 1), rankedChunk(chunkNode('doc-a', 4), 0.5)),
      graph,
      AROUND,
      tuning
    );

    const ids = expanded.chunks.map((c) => c.id);
    expect(ids).toEqual(['doc-a:3', 'doc-a:2', 'doc-a:4', 'doc-a:5']);
    expect(new Set(ids).size).toBe(ids.length);
  });

  test('expanded chunks never outrank a match of equal raw score', async () => {
    const graph = await graphWithDocument('doc-a', 10);
    const expanded = await expandContext(
      rankedSetOf(rankedChunk(chunkNode('doc-a', 5), 1), rankedChunk(chunkNode('doc-a', 8), 0.95)),
      graph,
      AROUND,
      tuning
    );

    expect(expanded.chunks.map((c) => c.id)).toEqual([
      'doc-a:5',
      'doc-a:8',
      'doc-a:4',
      'doc-a:6',
      'doc-a:7',
      'doc-a:9'
    ]);
  });

  test('returns the set unchanged when disabled', async () => {
    const graph = await graphWithDocument('doc-a', 10);
    const ranked = rankedSetOf(rankedChunk(chunkNode('doc-a', 5), 1));

    expect(await expandContext(ranked, graph, { ...AROUND, enabled: false }, tuning)).toBe(ranked);
    expect(await expandContext(ranked, graph, { enabled: true, before: 0, after: 0 }, tuning)).toBe(
      ranked
    );
  });
});
