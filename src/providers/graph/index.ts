/**
 * Graph Provider Module
 *
 * Exports the GraphClient interface and Neo4j implementation.
 */

// Factory
export { createGraphClient, openGraphClient } from './factory';

// Neo4j implementation
export type { Neo4jConfig } from './neo4j';
export { Neo4jGraphClient } from './neo4j';

// Types
export type {
  ChunkNode,
  ChunkTextMethod,
  DocumentDeletion,
  DocumentNode,
  DocumentSummary,
  EntityChunkLink,
  EntityNode,
  EntityQuery,
  EntityRef,
  EntityUpsert,
  GraphClient,
  GraphErrorType,
  GraphStats,
  Properties,
  PropertyValue,
  ProvenanceHit,
  RelatedEntity,
  RelationshipRecord,
  RelationshipUpsert,
  ScalarValue,
  SearchResult,
  TransactionClient,
  TraversalHit
} from './types';
export { GraphClientError } from './types';

// Utilities
export { chunkId, entityKey, escapeRegex, isSafeIdentifier, now, sanitizeLucene } from './utils';
