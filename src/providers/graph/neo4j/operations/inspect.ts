/**
 * Neo4j Inspection Operations
 *
 * Read-only views of documents and entities for browsing the graph.
 */

import neo4j, { type Driver } from 'neo4j-driver';
import type { DocumentSummary, EntityNode, RelatedEntity } from '../../types';
import { runCommand } from '../errors';
import { recordToDocument, recordToEntity, toNumber, toProperties, toStringValue } from '../mapping';
import {
  GET_ENTITY,
  GET_RELATED_ENTITIES,
  LIST_DOCUMENTS,
  LIST_ENTITIES_BY_TYPE
} from '../queries';

export async function listDocuments(driver: Driver, database: string): Promise<DocumentSummary[]> {
  return runCommand(
    driver,
    database,
    'read',
    async (session) => {
      const result = await session.run(LIST_DOCUMENTS);
      return result.records.map((r) => ({
        ...recordToDocument(r.get('d')),
        chunk_count: toNumber(r.get('chunk_count')) ?? 0
      }));
    },
    'listDocuments'
  );
}

export async function listEntities(
  driver: Driver,
  database: string,
  type: string,
  limit: number
): Promise<EntityNode[]> {
  return runCommand(
    driver,
    database,
    'read',
    async (session) => {
      const result = await session.run(LIST_ENTITIES_BY_TYPE, { type, limit: neo4j.int(limit) });
      return result.records.map((r) => recordToEntity(r.get('e')));
    },
    'listEntities'
  );
}

export async function getEntity(
  driver: Driver,
  database: string,
  key: string
): Promise<EntityNode | null> {
  return runCommand(
    driver,
    database,
    'read',
    async (session) => {
      const result = await session.run(GET_ENTITY, { key });
      const record = result.records[0];
      return record ? recordToEntity(record.get('e')) : null;
    },
    'getEntity'
  );
}

export async function getRelatedEntities(
  driver: Driver,
  database: string,
  key: string
): Promise<RelatedEntity[]> {
  return runCommand(
    driver,
    database,
    'read',
    async (session) => {
      const result = await session.run(GET_RELATED_ENTITIES, { key });
      return result.records.map(
        (r): RelatedEntity => ({
          relationship: toStringValue(r.get('type')) ?? '',
          direction: r.get('outgoing') === true ? 'outgoing' : 'incoming',
          properties: toProperties(r.get('properties')),
          entity: recordToEntity(r.get('other'))
        })
      );
    },
    'getRelatedEntities'
  );
}
