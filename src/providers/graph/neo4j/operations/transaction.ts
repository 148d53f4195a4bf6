/**
 * Neo4j Transaction Operations
 *
 * Transaction-scoped write operations for ingestion. These run inside an
 * existing managed transaction rather than opening their own sessions.
 */

import neo4j, { type ManagedTransaction } from 'neo4j-driver';
import type {
  ChunkNode,
  DocumentNode,
  EntityChunkLink,
  EntityUpsert,
  RelationshipUpsert,
  TransactionClient
} from '../../types';
import { GraphClientError } from '../../types';
import { isSafeIdentifier } from '../../utils';
import { INFRASTRUCTURE_RELS } from '../constants';
import { chunkToParams, toNumber, toStringValue } from '../mapping';
import {
  CREATE_CHUNKS,
  createRelationshipsQuery,
  FIND_EXISTING_ENTITY_KEYS,
  LINK_CHUNK_CHAIN,
  LINK_CHUNKS_TO_DOCUMENT,
  LINK_ENTITIES_TO_CHUNKS,
  MERGE_ENTITIES,
  REMOVE_DOCUMENT_CHUNKS,
  UPSERT_DOCUMENT
} from '../queries';

function countOf(value: unknown): number {
  return toNumber(value) ?? 0;
}

/**
 * Group relationships by type; each type needs its own statement.
 */
function groupByType(relationships: RelationshipUpsert[]): Map<string, RelationshipUpsert[]> {
  const groups = new Map<string, RelationshipUpsert[]>();
  for (const rel of relationships) {
    const group = groups.get(rel.type);
    if (group) group.push(rel);
    else groups.set(rel.type, [rel]);
  }
  return groups;
}

// ============================================================
// TRANSACTION CLIENT IMPLEMENTATION
// ============================================================

/**
 * Creates a TransactionClient that executes operations within
 * the provided Neo4j managed transaction.
 */
export function createTransactionClient(tx: ManagedTransaction): TransactionClient {
  return {
    // --------------------------------------------------------
    // DOCUMENT & CHUNKS
    // --------------------------------------------------------

    async upsertDocument(document: DocumentNode): Promise<void> {
      await tx.run(UPSERT_DOCUMENT, {
        document: {
          ...document,
          page_count: document.page_count === null ? null : neo4j.int(document.page_count)
        }
      });
    },

    async removeDocumentChunks(documentId: string): Promise<number> {
      const result = await tx.run(REMOVE_DOCUMENT_CHUNKS, { documentId });
      return countOf(result.records[0]?.get('removed'));
    },

    async createChunks(chunks: ChunkNode[]): Promise<number> {
      if (chunks.length === 0) return 0;
      const result = await tx.run(CREATE_CHUNKS, { chunks: chunks.map(chunkToParams) });
      return countOf(result.records[0]?.get('created'));
    },

    async linkChunkChain(documentId: string, chunkCount: number): Promise<number> {
      if (chunkCount < 2) return 0;
      const result = await tx.run(LINK_CHUNK_CHAIN, {
        documentId,
        chunkCount: neo4j.int(chunkCount)
      });
      return countOf(result.records[0]?.get('linked'));
    },

    async linkChunksToDocument(documentId: string): Promise<number> {
      const result = await tx.run(LINK_CHUNKS_TO_DOCUMENT, { documentId });
      return countOf(result.records[0]?.get('linked'));
    },

    // --------------------------------------------------------
    // ENTITIES & RELATIONSHIPS
    // --------------------------------------------------------

    async findExistingEntityKeys(keys: string[]): Promise<string[]> {
      if (keys.length === 0) return [];
      const result = await tx.run(FIND_EXISTING_ENTITY_KEYS, { keys });
      return result.records
        .map((r) => toStringValue(r.get('key')))
        .filter((key): key is string => key !== undefined);
    },

    async mergeEntities(entities: EntityUpsert[]): Promise<number> {
      if (entities.length === 0) return 0;
      const result = await tx.run(MERGE_ENTITIES, { entities });
      return countOf(result.records[0]?.get('merged'));
    },

    async createRelationships(relationships: RelationshipUpsert[]): Promise<number> {
      let created = 0;
      for (const [type, group] of groupByType(relationships)) {
        if (!isSafeIdentifier(type) || INFRASTRUCTURE_RELS.includes(type)) {
          throw new GraphClientError(`Invalid relationship type: ${type}`, 'QUERY_ERROR');
        }
        const result = await tx.run(createRelationshipsQuery(type), { relationships: group });
        created += countOf(result.records[0]?.get('created'));
      }
      return created;
    },

    async linkEntitiesToChunks(links: EntityChunkLink[]): Promise<number> {
      if (links.length === 0) return 0;
      const result = await tx.run(LINK_ENTITIES_TO_CHUNKS, { links });
      return countOf(result.records[0]?.get('linked'));
    }
  };
}
