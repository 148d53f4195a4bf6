/**
 * Test Fixtures
 *
 * Shared test data. Keep these minimal and focused on what each test
 * category needs.
 */

import type { IngestRequestInput, SchemaDescriptor } from '@/core/ingestion';
import type { RankedChunk, RankedEntity } from '@/core/retrieval';
import { type ChunkNode, chunkId, type EntityNode, type Properties } from '@/providers/graph';

// ═══════════════════════════════════════════════════════════════════════════════
// Config Fixtures
// ═══════════════════════════════════════════════════════════════════════════════

/** Valid minimal config for testing */
export const VALID_MINIMAL_CONFIG = {
  neo4j: {
    uri: 'bolt://localhost:7687',
    user: 'neo4j',
    password: 'test-secret'
  },
  llm: {
    provider: 'openai' as const,
    apiKey: 'test-secret',
    model: 'gpt-4o-mini'
  },
  schema: {
    path: 'config/schema.example.json'
  }
};

// ═══════════════════════════════════════════════════════════════════════════════
// Schema Fixtures
// ═══════════════════════════════════════════════════════════════════════════════

export const CONTRACT_SCHEMA: SchemaDescriptor = {
  name: 'contracts',
  entity_types: ['Party', 'Contract', 'Clause'],
  relationship_types: ['PARTY_TO', 'CONTAINS'],
  required_properties_per_type: {
    Party: ['name']
  }
};

// ═══════════════════════════════════════════════════════════════════════════════
// Ingest Fixtures
// ═══════════════════════════════════════════════════════════════════════════════

export const ACME_CHUNKS = [
  'This Supply Agreement is entered into on January 5, 2024.',
  'Acme Corp shall deliver the goods to the Buyer within 30 days.',
  'Payment is due upon delivery.'
];

/**
 * Three chunks, one Party extracted from chunk 1.
 */
export function acmeRequest(overrides: Partial<IngestRequestInput> = {}): IngestRequestInput {
  return {
    document: { id: 'contract-1', filename: 'contract-1.pdf', page_count: 1 },
    chunks: ACME_CHUNKS.map((text, chunk_index) => ({ chunk_index, text })),
    entities: [
      { type: 'Party', id: 'acme', properties: { name: 'Acme Corp' }, chunk_index: 1 }
    ],
    relationships: [],
    ...overrides
  };
}

/**
 * A document of `count` chunks whose text names its own index.
 */
export function numberedRequest(documentId: string, count: number): IngestRequestInput {
  return {
    document: { id: documentId, filename: `${documentId}.txt` },
    chunks: Array.from({ length: count }, (_, chunk_index) => ({
      chunk_index,
      text: `Paragraph number ${chunk_index}.`
    }))
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// Node Fixtures
// ═══════════════════════════════════════════════════════════════════════════════

export function chunkNode(
  documentId: string,
  chunkIndex: number,
  fields: Partial<ChunkNode> = {}
): ChunkNode {
  return {
    id: chunkId(documentId, chunkIndex),
    document_id: documentId,
    chunk_index: chunkIndex,
    ...fields
  };
}

export function entityNode(
  type: string,
  id: string,
  properties: Properties = {},
  confidence = 1
): EntityNode {
  return { key: `${type}:${id}`, type, id, properties, confidence };
}

export function rankedChunk(chunk: ChunkNode, score: number, expanded = false): RankedChunk {
  return { id: chunk.id, chunk, score, signals: expanded ? {} : { chunk_text_search: 1 }, expanded };
}

export function rankedEntity(entity: EntityNode, score: number): RankedEntity {
  return { id: entity.key, entity, score, signals: { graph_traversal: 1 }, expanded: false };
}
