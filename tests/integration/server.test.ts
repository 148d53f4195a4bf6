/**
 * HTTP Surface Tests
 *
 * Drives the Hono app through app.request() against the in-memory graph.
 */

import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { ChunkGraphBuilder, StrategyStore } from '@/core';
import { createApp } from '@/server';
import { acmeRequest, CONTRACT_SCHEMA } from '@tests/helpers/fixtures';
import { MemoryGraphClient } from '@tests/helpers/memory-graph';

const PRESET_NAMES = ['minimal', 'balanced', 'comprehensive', 'speed', 'research', 'strict'];

function setup() {
  const graphClient = new MemoryGraphClient();
  const strategies = new StrategyStore();
  const builder = new ChunkGraphBuilder({ graphClient, strategies, schema: CONTRACT_SCHEMA });
  const app = createApp({ graphClient, strategies, builder, schema: CONTRACT_SCHEMA });
  return { app, graphClient, strategies };
}

function send(method: string, body: unknown): RequestInit {
  return {
    method,
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body)
  };
}

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('GET /health', () => {
  test('reports a reachable graph', async () => {
    const { app } = setup();
    const res = await app.request('/health');

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: 'ok', graph: true });
  });

  test('degrades when the graph is unreachable', async () => {
    const { app, graphClient } = setup();
    vi.spyOn(graphClient, 'healthCheck').mockResolvedValue(false);

    const res = await app.request('/health');

    expect(res.status).toBe(503);
    expect(await res.json()).toEqual({ status: 'degraded', graph: false });
  });
});

describe('/strategies', () => {
  test('GET returns the active pair', async () => {
    const { app } = setup();
    const res = await app.request('/strategies');

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      active_preset: null,
      revision: 0,
      retrieval: { limits: { max_chunks: 10, max_entities: 20, max_context_tokens: 4000 } }
    });
  });

  test('GET /presets lists every preset', async () => {
    const { app } = setup();
    const body = await (await app.request('/strategies/presets')).json();

    expect(body).toEqual({
      presets: PRESET_NAMES.map((name) => expect.objectContaining({ name }))
    });
  });

  test('POST /preset loads a preset', async () => {
    const { app, strategies } = setup();
    const res = await app.request('/strategies/preset', send('POST', { name: 'research' }));

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      extraction: strategies.get().extraction,
      retrieval: strategies.get().retrieval,
      active_preset: 'research',
      revision: 1
    });
  });

  test('POST /preset twice answers with the same bytes', async () => {
    const { app } = setup();
    const first = await (await app.request('/strategies/preset', send('POST', { name: 'speed' }))).text();
    const second = await (await app.request('/strategies/preset', send('POST', { name: 'speed' }))).text();

    expect(second).toBe(first);
  });

  test('POST /preset with an unknown name is a 404 listing the presets', async () => {
    const { app, strategies } = setup();
    const res = await app.request('/strategies/preset', send('POST', { name: 'nope' }));

    expect(res.status).toBe(404);
    expect(await res.json()).toMatchObject({ error: 'UnknownPreset', available: PRESET_NAMES });
    expect(strategies.get().revision).toBe(0);
  });

  test('PATCH merges into one strategy', async () => {
    const { app } = setup();
    const res = await app.request(
      '/strategies/retrieval',
      send('PATCH', { limits: { max_chunks: 5 } })
    );

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      retrieval: { limits: { max_chunks: 5, max_entities: 20 } },
      active_preset: null
    });
  });

  test('PATCH with an invalid value is a 400 and changes nothing', async () => {
    const { app, strategies } = setup();
    const res = await app.request(
      '/strategies/retrieval',
      send('PATCH', { limits: { max_chunks: 500 } })
    );

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: 'StrategyValidationError' });
    expect(strategies.get().retrieval.limits.max_chunks).toBe(10);
  });

  test('PATCH with a non-object body is a 400', async () => {
    const { app } = setup();
    const res = await app.request('/strategies/extraction', send('PATCH', [1, 2]));

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: 'InvalidRequest' });
  });

  test('GET /extraction returns one strategy', async () => {
    const { app, strategies } = setup();
    const body = await (await app.request('/strategies/extraction')).json();

    expect(body).toEqual(strategies.get().extraction);
  });

  test('POST /reset returns to the defaults', async () => {
    const { app } = setup();
    await app.request('/strategies/preset', send('POST', { name: 'speed' }));

    const body = await (await app.request('/strategies/reset', { method: 'POST' })).json();

    expect(body).toMatchObject({
      active_preset: null,
      revision: 2,
      retrieval: { name: 'default' }
    });
  });
});

describe('POST /ingest', () => {
  test('stores a document and reports counts', async () => {
    const { app } = setup();
    const res = await app.request('/ingest', send('POST', acmeRequest()));

    expect(res.status).toBe(201);
    expect(await res.json()).toMatchObject({
      document_id: 'contract-1',
      chunk_count: 3,
      entity_count: 1,
      relationship_count: 0,
      skipped_entities: 0,
      skipped_relationships: 0
    });
  });

  test('a malformed request is a 400', async () => {
    const { app, graphClient } = setup();
    const res = await app.request('/ingest', send('POST', { document: {} }));

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: 'InvalidRequest' });
    expect(graphClient.commits).toBe(0);
  });
});

describe('POST /query', () => {
  const question = {
    question: 'Who delivers the goods?',
    intent: { entity_types: ['Party'], search_text: 'Acme' }
  };

  test('returns the retrieval result as JSON', async () => {
    const { app } = setup();
    await app.request('/ingest', send('POST', acmeRequest()));

    const res = await app.request('/query', send('POST', question));

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      query: 'Who delivers the goods?',
      entities: [{ key: 'Party:acme' }],
      chunks: [{ id: 'contract-1:1' }, { id: 'contract-1:0' }, { id: 'contract-1:2' }]
    });
  });

  test('returns the context as text when asked', async () => {
    const { app } = setup();
    await app.request('/ingest', send('POST', acmeRequest()));

    const res = await app.request('/query', send('POST', { ...question, format: true }));
    const text = await res.text();

    expect(res.status).toBe(200);
    expect(res.headers.get('content-type')).toMatch(/^text\/plain/);
    expect(text.split('\n').slice(0, 3)).toEqual([
      '# Retrieved Context',
      '',
      'Query: "Who delivers the goods?"'
    ]);
  });

  test('a blank question is a 400', async () => {
    const { app } = setup();
    const res = await app.request('/query', send('POST', { question: '   ' }));

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({
      error: 'InvalidRequest',
      issues: [{ path: 'question' }]
    });
  });
});

describe('/graph', () => {
  test('GET /stats counts the stored graph', async () => {
    const { app } = setup();
    await app.request('/ingest', send('POST', acmeRequest()));

    expect(await (await app.request('/graph/stats')).json()).toEqual({
      documents: 1,
      chunks: 3,
      entities: 1,
      relationships: 0,
      entity_types: { Party: 1 },
      relationship_types: {}
    });
  });

  test('GET /documents/:id/chunks returns the chain in order', async () => {
    const { app } = setup();
    await app.request('/ingest', send('POST', acmeRequest()));

    const res = await app.request('/graph/documents/contract-1/chunks');

    expect(await res.json()).toMatchObject({
      document: { id: 'contract-1' },
      chunks: [{ chunk_index: 0 }, { chunk_index: 1 }, { chunk_index: 2 }]
    });
  });

  test('an unknown document is a 404', async () => {
    const { app } = setup();
    const res = await app.request('/graph/documents/missing/chunks');

    expect(res.status).toBe(404);
    expect(await res.text()).toBe("Document 'missing' not found");
  });

  test('GET /documents lists documents with their chunk counts', async () => {
    const { app } = setup();
    await app.request('/ingest', send('POST', acmeRequest()));

    expect(await (await app.request('/graph/documents')).json()).toMatchObject({
      total: 1,
      documents: [{ id: 'contract-1', filename: 'contract-1.pdf', page_count: 1, chunk_count: 3 }]
    });
  });

  describe('entities', () => {
    const supplyRequest = () =>
      acmeRequest({
        entities: [
          { type: 'Party', id: 'acme', properties: { name: 'Acme Corp' }, chunk_index: 1 },
          { type: 'Party', id: 'beta', properties: { name: 'Beta Ltd' } },
          { type: 'Contract', id: 'c1', properties: { title: 'Supply Agreement' } }
        ],
        relationships: [
          { type: 'PARTY_TO', source: { type: 'Party', id: 'acme' }, target: { type: 'Contract', id: 'c1' } }
        ]
      });

    test('GET /entities/:type lists one type ordered by id', async () => {
      const { app } = setup();
      await app.request('/ingest', send('POST', supplyRequest()));

      expect(await (await app.request('/graph/entities/Party')).json()).toMatchObject({
        entity_type: 'Party',
        total: 2,
        entities: [{ key: 'Party:acme' }, { key: 'Party:beta' }]
      });
      expect(await (await app.request('/graph/entities/Party?limit=1')).json()).toMatchObject({
        total: 1,
        entities: [{ key: 'Party:acme' }]
      });
    });

    test('an out-of-range limit is a 400', async () => {
      const { app } = setup();
      const res = await app.request('/graph/entities/Party?limit=0');

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ error: 'InvalidRequest', issues: [{ path: 'limit' }] });
    });

    test('GET /entities/:type/:id returns one entity', async () => {
      const { app } = setup();
      await app.request('/ingest', send('POST', supplyRequest()));

      expect(await (await app.request('/graph/entities/Contract/c1')).json()).toMatchObject({
        key: 'Contract:c1',
        type: 'Contract',
        id: 'c1',
        properties: { title: 'Supply Agreement' }
      });

      const missing = await app.request('/graph/entities/Party/ghost');
      expect(missing.status).toBe(404);
      expect(await missing.text()).toBe("Party 'ghost' not found");
    });

    test('GET /entities/:type/:id/related follows relationships both ways', async () => {
      const { app } = setup();
      await app.request('/ingest', send('POST', supplyRequest()));

      expect(await (await app.request('/graph/entities/Contract/c1/related')).json()).toMatchObject({
        entity: { key: 'Contract:c1' },
        related: [{ relationship: 'PARTY_TO', direction: 'incoming', entity: { key: 'Party:acme' } }]
      });
      expect(await (await app.request('/graph/entities/Party/acme/related')).json()).toMatchObject({
        related: [{ relationship: 'PARTY_TO', direction: 'outgoing', entity: { key: 'Contract:c1' } }]
      });
      expect((await app.request('/graph/entities/Party/ghost/related')).status).toBe(404);
    });
  });

  describe('schema', () => {
    test('GET /schema describes the loaded schema and what is stored', async () => {
      const { app } = setup();
      await app.request('/ingest', send('POST', acmeRequest()));

      expect(await (await app.request('/graph/schema')).json()).toEqual({
        name: 'contracts',
        description: null,
        entity_types: ['Party', 'Contract', 'Clause'],
        relationship_types: ['PARTY_TO', 'CONTAINS'],
        stored_entity_types: ['Party'],
        stored_relationship_types: []
      });
    });

    test('GET /schema/entities lists required properties per type', async () => {
      const { app } = setup();

      expect(await (await app.request('/graph/schema/entities')).json()).toEqual({
        schema_name: 'contracts',
        entities: [
          { name: 'Party', required_properties: ['name'] },
          { name: 'Contract', required_properties: [] },
          { name: 'Clause', required_properties: [] }
        ]
      });
    });

    test('GET /schema/relationships lists relationship types', async () => {
      const { app } = setup();

      expect(await (await app.request('/graph/schema/relationships')).json()).toEqual({
        schema_name: 'contracts',
        relationships: [{ name: 'PARTY_TO' }, { name: 'CONTAINS' }]
      });
    });

    test('is a 404 when no schema is loaded', async () => {
      const graphClient = new MemoryGraphClient();
      const strategies = new StrategyStore();
      const builder = new ChunkGraphBuilder({ graphClient, strategies, schema: CONTRACT_SCHEMA });
      const app = createApp({ graphClient, strategies, builder });

      const res = await app.request('/graph/schema');
      expect(res.status).toBe(404);
      expect(await res.text()).toBe('No schema loaded');
    });
  });

  test('DELETE /documents/:id removes the document and orphaned entities', async () => {
    const { app } = setup();
    await app.request('/ingest', send('POST', acmeRequest()));

    const res = await app.request('/graph/documents/contract-1', { method: 'DELETE' });

    expect(await res.json()).toEqual({
      document_id: 'contract-1',
      deleted: true,
      chunks: 3,
      entities: 1
    });
    expect(await (await app.request('/graph/stats')).json()).toMatchObject({ chunks: 0 });
  });

  test('DELETE / clears everything', async () => {
    const { app } = setup();
    await app.request('/ingest', send('POST', acmeRequest()));

    const res = await app.request('/graph', { method: 'DELETE' });

    expect(await res.json()).toEqual({ cleared: true });
    expect(await (await app.request('/graph/stats')).json()).toMatchObject({ documents: 0 });
  });
});
