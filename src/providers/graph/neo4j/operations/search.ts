/**
 * Neo4j Search Operations
 *
 * Seed lookup and the chunk searches behind each retrieval signal.
 * Uses runCommand for session lifecycle and query repository for Cypher.
 */

import neo4j, { type Driver } from 'neo4j-driver';
import type {
  ChunkNode,
  ChunkTextMethod,
  EntityNode,
  EntityQuery,
  SearchResult
} from '../../types';
import { sanitizeLucene } from '../../utils';
import { runCommand } from '../errors';
import { recordToChunk, recordToEntity, toNumber } from '../mapping';
import {
  FIND_ENTITIES,
  GET_CHUNKS_WITH_TEMPORAL_REFS,
  SEARCH_CHUNKS_BY_KEY_TERMS,
  SEARCH_CHUNKS_CONTAINS,
  SEARCH_CHUNKS_FULLTEXT,
  SEARCH_CHUNKS_REGEX
} from '../queries';

// ============================================================
// ENTITY SEEDS
// ============================================================

export async function findEntities(
  driver: Driver,
  database: string,
  query: EntityQuery,
  signal?: AbortSignal
): Promise<EntityNode[]> {
  const filters = Object.entries(query.filters).map(([key, value]) => ({ key, value }));

  return runCommand(
    driver,
    database,
    'read',
    async (session) => {
      const result = await session.run(FIND_ENTITIES, {
        types: query.types,
        filters,
        nameContains: query.nameContains ?? null,
        limit: neo4j.int(query.limit)
      });
      return result.records.map((r) => recordToEntity(r.get('e')));
    },
    'findEntities',
    signal
  );
}

// ============================================================
// CHUNK TEXT SEARCH
// ============================================================

/**
 * Search chunk text by one of three methods.
 *
 * - contains: case-insensitive substring
 * - regex: case-insensitive Java regex, matched anywhere in the text
 * - fulltext: Lucene index with special characters escaped
 */
export async function searchChunkText(
  driver: Driver,
  database: string,
  method: ChunkTextMethod,
  text: string,
  limit: number,
  signal?: AbortSignal
): Promise<SearchResult<ChunkNode>[]> {
  const trimmed = text.trim();
  if (!trimmed) return [];

  let cypher: string;
  let params: Record<string, unknown>;
  switch (method) {
    case 'contains':
      cypher = SEARCH_CHUNKS_CONTAINS;
      params = { text: trimmed };
      break;
    case 'regex':
      cypher = SEARCH_CHUNKS_REGEX;
      params = { pattern: `(?is).*${trimmed}.*` };
      break;
    case 'fulltext':
      cypher = SEARCH_CHUNKS_FULLTEXT;
      params = { query: sanitizeLucene(trimmed) };
      break;
    default: {
      const _exhaustive: never = method;
      throw new Error(`Unknown chunk text method: ${_exhaustive}`);
    }
  }

  return runCommand(
    driver,
    database,
    'read',
    async (session) => {
      const result = await session.run(cypher, { ...params, limit: neo4j.int(limit) });
      return result.records.map((r) => ({
        item: recordToChunk(r.get('c')),
        score: toNumber(r.get('score')) ?? 0
      }));
    },
    'searchChunkText',
    signal
  );
}

// ============================================================
// KEY TERMS & TEMPORAL REFERENCES
// ============================================================

export async function searchChunksByKeyTerms(
  driver: Driver,
  database: string,
  terms: string[],
  limit: number,
  signal?: AbortSignal
): Promise<ChunkNode[]> {
  if (terms.length === 0) return [];

  return runCommand(
    driver,
    database,
    'read',
    async (session) => {
      const result = await session.run(SEARCH_CHUNKS_BY_KEY_TERMS, {
        terms: terms.map((t) => t.toLowerCase()),
        limit: neo4j.int(limit)
      });
      return result.records.map((r) => recordToChunk(r.get('c')));
    },
    'searchChunksByKeyTerms',
    signal
  );
}

export async function getChunksWithTemporalRefs(
  driver: Driver,
  database: string,
  tokens: string[],
  limit: number,
  signal?: AbortSignal
): Promise<ChunkNode[]> {
  return runCommand(
    driver,
    database,
    'read',
    async (session) => {
      const result = await session.run(GET_CHUNKS_WITH_TEMPORAL_REFS, {
        tokens: tokens.map((t) => t.toLowerCase()),
        limit: neo4j.int(limit)
      });
      return result.records.map((r) => recordToChunk(r.get('c')));
    },
    'getChunksWithTemporalRefs',
    signal
  );
}
