/**
 * Neo4j Node Operations
 *
 * Document and chunk reads, deletion and statistics.
 * Uses runCommand for session lifecycle and query repository for Cypher.
 */

import neo4j, { type Driver } from 'neo4j-driver';
import type { ChunkNode, DocumentDeletion, DocumentNode, GraphStats } from '../../types';
import { runCommand } from '../errors';
import { recordToChunk, recordToDocument, toNumber, toStringValue } from '../mapping';
import {
  CLEAR_GRAPH,
  COUNT_ENTITY_TYPES,
  COUNT_NODES,
  COUNT_RELATIONSHIP_TYPES,
  DELETE_DOCUMENT_NODE,
  GET_CHUNK_CHAIN,
  GET_CHUNKS_BY_INDEX,
  GET_DOCUMENT,
  RELEASE_DOCUMENT_ENTITIES,
  REMOVE_DOCUMENT_CHUNKS
} from '../queries';

// ============================================================
// DOCUMENTS & CHUNKS
// ============================================================

export async function getDocument(
  driver: Driver,
  database: string,
  id: string
): Promise<DocumentNode | null> {
  return runCommand(
    driver,
    database,
    'read',
    async (session) => {
      const result = await session.run(GET_DOCUMENT, { id });
      const record = result.records[0];
      return record ? recordToDocument(record.get('d')) : null;
    },
    'getDocument'
  );
}

/**
 * Fetch chunks of one document at the given indices. Missing indices
 * (past either end) are simply absent from the result.
 */
export async function getChunksByIndex(
  driver: Driver,
  database: string,
  documentId: string,
  indices: number[],
  signal?: AbortSignal
): Promise<ChunkNode[]> {
  if (indices.length === 0) return [];

  return runCommand(
    driver,
    database,
    'read',
    async (session) => {
      const result = await session.run(GET_CHUNKS_BY_INDEX, {
        documentId,
        indices: indices.map((i) => neo4j.int(i))
      });
      return result.records.map((r) => recordToChunk(r.get('c')));
    },
    'getChunksByIndex',
    signal
  );
}

export async function getChunkChain(
  driver: Driver,
  database: string,
  documentId: string
): Promise<ChunkNode[]> {
  return runCommand(
    driver,
    database,
    'read',
    async (session) => {
      const result = await session.run(GET_CHUNK_CHAIN, { documentId });
      return result.records.map((r) => recordToChunk(r.get('c')));
    },
    'getChunkChain'
  );
}

// ============================================================
// DELETION
// ============================================================

/**
 * Delete a document atomically: chunks, entities it alone sourced, then the node.
 */
export async function deleteDocument(
  driver: Driver,
  database: string,
  documentId: string
): Promise<DocumentDeletion> {
  return runCommand(
    driver,
    database,
    'write',
    (session) =>
      session.executeWrite(async (tx) => {
        const chunks = await tx.run(REMOVE_DOCUMENT_CHUNKS, { documentId });
        const entities = await tx.run(RELEASE_DOCUMENT_ENTITIES, { documentId });
        const doc = await tx.run(DELETE_DOCUMENT_NODE, { documentId });
        return {
          deleted: (toNumber(doc.records[0]?.get('deleted')) ?? 0) > 0,
          chunks: toNumber(chunks.records[0]?.get('removed')) ?? 0,
          entities: toNumber(entities.records[0]?.get('removed')) ?? 0
        };
      }),
    'deleteDocument'
  );
}

export async function clearGraph(driver: Driver, database: string): Promise<void> {
  await runCommand(
    driver,
    database,
    'write',
    (session) => session.executeWrite((tx) => tx.run(CLEAR_GRAPH)),
    'clearGraph'
  );
}

// ============================================================
// STATISTICS
// ============================================================

export async function getStats(driver: Driver, database: string): Promise<GraphStats> {
  return runCommand(
    driver,
    database,
    'read',
    async (session) => {
      const counts = await session.run(COUNT_NODES);
      const entityTypes = await session.run(COUNT_ENTITY_TYPES);
      const relTypes = await session.run(COUNT_RELATIONSHIP_TYPES);

      const row = counts.records[0];
      const entity_types: Record<string, number> = {};
      for (const r of entityTypes.records) {
        const type = toStringValue(r.get('type'));
        if (type !== undefined) entity_types[type] = toNumber(r.get('count')) ?? 0;
      }
      const relationship_types: Record<string, number> = {};
      let relationships = 0;
      for (const r of relTypes.records) {
        const type = toStringValue(r.get('type'));
        const count = toNumber(r.get('count')) ?? 0;
        if (type !== undefined) relationship_types[type] = count;
        relationships += count;
      }

      return {
        documents: toNumber(row?.get('documents')) ?? 0,
        chunks: toNumber(row?.get('chunks')) ?? 0,
        entities: toNumber(row?.get('entities')) ?? 0,
        relationships,
        entity_types,
        relationship_types
      };
    },
    'getStats'
  );
}
