/**
 * Neo4j Edge Operations
 *
 * Entity neighbourhood traversal, provenance and relationship reads.
 */

import neo4j, { type Driver } from 'neo4j-driver';
import type { ProvenanceHit, RelationshipRecord, TraversalHit } from '../../types';
import { GraphClientError } from '../../types';
import { runCommand } from '../errors';
import { recordToChunk, recordToEntity, toNumber, toProperties, toStringValue } from '../mapping';
import { createTraversalQuery, GET_PROVENANCE_CHUNKS, GET_RELATIONSHIPS_AMONG } from '../queries';

/** Traversal depth bounds accepted by the retrieval strategy */
const MIN_DEPTH = 1;
const MAX_DEPTH = 5;

export async function traverseEntities(
  driver: Driver,
  database: string,
  seedKeys: string[],
  maxDepth: number,
  limit: number,
  signal?: AbortSignal
): Promise<TraversalHit[]> {
  if (seedKeys.length === 0) return [];
  if (!Number.isInteger(maxDepth) || maxDepth < MIN_DEPTH || maxDepth > MAX_DEPTH) {
    throw new GraphClientError(
      `Traversal depth must be an integer in [${MIN_DEPTH}, ${MAX_DEPTH}], got ${maxDepth}`,
      'QUERY_ERROR'
    );
  }

  return runCommand(
    driver,
    database,
    'read',
    async (session) => {
      const result = await session.run(createTraversalQuery(maxDepth), {
        seedKeys,
        limit: neo4j.int(limit)
      });
      return result.records.map((r) => ({
        entity: recordToEntity(r.get('n')),
        depth: toNumber(r.get('depth')) ?? maxDepth
      }));
    },
    'traverseEntities',
    signal
  );
}

export async function getProvenanceChunks(
  driver: Driver,
  database: string,
  entityKeys: string[],
  signal?: AbortSignal
): Promise<ProvenanceHit[]> {
  if (entityKeys.length === 0) return [];

  return runCommand(
    driver,
    database,
    'read',
    async (session) => {
      const result = await session.run(GET_PROVENANCE_CHUNKS, { keys: entityKeys });
      return result.records.map((r) => ({
        entity_key: toStringValue(r.get('entity_key')) ?? '',
        chunk: recordToChunk(r.get('c'))
      }));
    },
    'getProvenanceChunks',
    signal
  );
}

export async function getRelationshipsAmong(
  driver: Driver,
  database: string,
  entityKeys: string[],
  signal?: AbortSignal
): Promise<RelationshipRecord[]> {
  if (entityKeys.length < 2) return [];

  return runCommand(
    driver,
    database,
    'read',
    async (session) => {
      const result = await session.run(GET_RELATIONSHIPS_AMONG, { keys: entityKeys });
      return result.records.map((r) => ({
        type: toStringValue(r.get('type')) ?? '',
        source: {
          type: toStringValue(r.get('source_type')) ?? '',
          id: toStringValue(r.get('source_id')) ?? ''
        },
        target: {
          type: toStringValue(r.get('target_type')) ?? '',
          id: toStringValue(r.get('target_id')) ?? ''
        },
        properties: toProperties(r.get('properties'))
      }));
    },
    'getRelationshipsAmong',
    signal
  );
}
