/**
 * Graph Client Types
 *
 * Defines the contract and data types for graph database providers.
 * This is the persistence layer that ingestion writes to and the
 * retrieval searchers read from.
 */

// ============================================================
// ERROR TYPES
// ============================================================

/**
 * Standard error types that any graph implementation must map to.
 * This allows the core to handle errors consistently
 * regardless of the underlying database.
 */
export type GraphErrorType =
  | 'CONNECTION_ERROR' // Failed to connect to database
  | 'CONSTRAINT_VIOLATION' // Unique constraint violated
  | 'NOT_FOUND' // Node/edge not found
  | 'QUERY_ERROR' // Invalid query or execution error
  | 'TRANSIENT_ERROR'; // Temporary failure (retry possible)

/**
 * Standardized error class for graph operations.
 * All graph client implementations should throw this error type.
 */
export class GraphClientError extends Error {
  public override readonly cause?: Error;

  constructor(
    message: string,
    public readonly type: GraphErrorType,
    cause?: Error
  ) {
    super(message);
    this.name = 'GraphClientError';
    this.cause = cause;
  }

  /**
   * Whether this error is retryable (transient failures).
   */
  get retryable(): boolean {
    return this.type === 'TRANSIENT_ERROR';
  }
}

// ============================================================
// PROPERTY VALUES
// ============================================================

export type ScalarValue = string | number | boolean;

/**
 * Values a node or edge property can hold. Null removes the property on write.
 */
export type PropertyValue = ScalarValue | ScalarValue[] | null;

export type Properties = Record<string, PropertyValue>;

// ============================================================
// NODE TYPES
// ============================================================

/**
 * A source document. One per ingestion; re-ingesting the same id
 * replaces its chunks.
 */
export interface DocumentNode {
  id: string;
  filename: string;
  page_count: number | null;
  /** ISO 8601 */
  ingested_at: string;
}

/**
 * A contiguous text segment of a document.
 *
 * Only `id`, `document_id` and `chunk_index` are always present. Every other
 * field exists only when the extraction strategy enabled it at ingest time.
 */
export interface ChunkNode {
  id: string;
  document_id: string;
  chunk_index: number;
  text?: string;
  page_number?: number;
  section_heading?: string | null;
  temporal_refs?: string[];
  key_terms?: string[];
  word_count?: number;
  char_count?: number;
  sentence_count?: number;
}

/**
 * Identity of an entity: the schema-defined type plus a type-local id.
 */
export interface EntityRef {
  type: string;
  id: string;
}

/**
 * An extracted entity as stored in the graph.
 * `key` is the `<type>:<id>` string form of its identity.
 */
export interface EntityNode extends EntityRef {
  key: string;
  properties: Properties;
  confidence: number;
}

/**
 * A typed relationship between two entities.
 */
export interface RelationshipRecord {
  type: string;
  source: EntityRef;
  target: EntityRef;
  properties: Properties;
}

// ============================================================
// WRITE INPUT TYPES
// ============================================================

export interface EntityUpsert {
  key: string;
  type: string;
  id: string;
  properties: Properties;
  confidence: number;
  /** Document this batch came from; appended to the entity's source list */
  source_document: string;
}

export interface RelationshipUpsert {
  type: string;
  source_key: string;
  target_key: string;
  properties: Properties;
}

export interface EntityChunkLink {
  entity_key: string;
  chunk_id: string;
}

// ============================================================
// QUERY TYPES
// ============================================================

/**
 * Search result with relevance score.
 */
export interface SearchResult<T> {
  item: T;
  score: number;
}

export type ChunkTextMethod = 'contains' | 'fulltext' | 'regex';

export interface EntityQuery {
  /** Restrict to these entity types (empty = any type) */
  types: string[];
  /** Case-insensitive substring match on property values */
  filters: Record<string, string>;
  /** Case-insensitive substring match on `name` or `title` */
  nameContains?: string;
  limit: number;
}

export interface TraversalHit {
  entity: EntityNode;
  /** Shortest hop distance from any seed (>= 1) */
  depth: number;
}

export interface ProvenanceHit {
  entity_key: string;
  chunk: ChunkNode;
}

/** A document with the number of chunks linked to it */
export interface DocumentSummary extends DocumentNode {
  chunk_count: number;
}

/**
 * A neighbour of an entity over one schema relationship. `outgoing` when
 * the inspected entity is the relationship's source.
 */
export interface RelatedEntity {
  relationship: string;
  direction: 'outgoing' | 'incoming';
  properties: Properties;
  entity: EntityNode;
}

export interface DocumentDeletion {
  deleted: boolean;
  chunks: number;
  entities: number;
}

export interface GraphStats {
  documents: number;
  chunks: number;
  entities: number;
  relationships: number;
  entity_types: Record<string, number>;
  relationship_types: Record<string, number>;
}

// ============================================================
// GRAPH CLIENT INTERFACE
// ============================================================

/**
 * Contract for graph database providers.
 */
export interface GraphClient {
  // ============================================================
  // CONNECTION MANAGEMENT
  // ============================================================

  connect(): Promise<void>;
  disconnect(): Promise<void>;
  healthCheck(): Promise<boolean>;

  /**
   * Create constraints and indexes. Idempotent.
   */
  initializeSchema(): Promise<void>;

  // ============================================================
  // READS
  // ============================================================
  // Retrieval reads take an optional AbortSignal; aborting ends the
  // running query and rejects with the signal's reason.

  getDocument(id: string): Promise<DocumentNode | null>;

  /**
   * Find seed entities by type, property filters or name.
   */
  findEntities(query: EntityQuery, signal?: AbortSignal): Promise<EntityNode[]>;

  /**
   * Entities reachable from the seeds through entity-to-entity edges
   * within `maxDepth` hops. Seeds themselves are not returned.
   */
  traverseEntities(
    seedKeys: string[],
    maxDepth: number,
    limit: number,
    signal?: AbortSignal
  ): Promise<TraversalHit[]>;

  /**
   * Chunks each entity was extracted from (EXTRACTED_FROM edges).
   */
  getProvenanceChunks(entityKeys: string[], signal?: AbortSignal): Promise<ProvenanceHit[]>;

  /**
   * Relationships whose both endpoints are among the given entity keys.
   */
  getRelationshipsAmong(entityKeys: string[], signal?: AbortSignal): Promise<RelationshipRecord[]>;

  /**
   * Candidate chunks for a text query.
   *
   * For `fulltext` the score is the index score; for `contains` and `regex`
   * every hit scores 1 and the caller ranks by match count.
   */
  searchChunkText(
    method: ChunkTextMethod,
    text: string,
    limit: number,
    signal?: AbortSignal
  ): Promise<SearchResult<ChunkNode>[]>;

  /**
   * Chunks sharing at least one key term with `terms` (case-insensitive).
   */
  searchChunksByKeyTerms(terms: string[], limit: number, signal?: AbortSignal): Promise<ChunkNode[]>;

  /**
   * Chunks carrying temporal references. With `tokens`, only chunks where
   * some reference contains one of the tokens (case-insensitive).
   */
  getChunksWithTemporalRefs(
    tokens: string[],
    limit: number,
    signal?: AbortSignal
  ): Promise<ChunkNode[]>;

  getChunksByIndex(
    documentId: string,
    indices: number[],
    signal?: AbortSignal
  ): Promise<ChunkNode[]>;

  /**
   * Walk NEXT_CHUNK from index 0 and return the chunks in walk order.
   */
  getChunkChain(documentId: string): Promise<ChunkNode[]>;

  getStats(): Promise<GraphStats>;

  // ============================================================
  // INSPECTION
  // ============================================================

  /** Every document, most recently ingested first */
  listDocuments(): Promise<DocumentSummary[]>;

  /** Entities of one type, ordered by id */
  listEntities(type: string, limit: number): Promise<EntityNode[]>;

  getEntity(key: string): Promise<EntityNode | null>;

  /**
   * Entities one relationship away from `key`, in either direction,
   * ordered by relationship type then neighbour key.
   */
  getRelatedEntities(key: string): Promise<RelatedEntity[]>;

  // ============================================================
  // DELETION
  // ============================================================

  /**
   * Remove a document, its chunks, and entities whose only source it was.
   */
  deleteDocument(documentId: string): Promise<DocumentDeletion>;

  clearGraph(): Promise<void>;

  // ============================================================
  // TRANSACTION SUPPORT
  // ============================================================

  /**
   * Execute multiple operations in a single atomic transaction.
   * All operations either succeed together or fail together (rollback).
   *
   * @example
   * ```typescript
   * await graphClient.executeTransaction(async (tx) => {
   *   await tx.upsertDocument(doc);
   *   await tx.createChunks(chunks);
   *   await tx.linkChunkChain(doc.id, chunks.length);
   * });
   * ```
   */
  executeTransaction<T>(fn: (tx: TransactionClient) => Promise<T>): Promise<T>;
}

/**
 * Transaction-scoped client for the ingestion write path.
 * Counts returned are the number of nodes or edges written.
 */
export interface TransactionClient {
  upsertDocument(document: DocumentNode): Promise<void>;
  removeDocumentChunks(documentId: string): Promise<number>;
  createChunks(chunks: ChunkNode[]): Promise<number>;
  linkChunkChain(documentId: string, chunkCount: number): Promise<number>;
  linkChunksToDocument(documentId: string): Promise<number>;

  findExistingEntityKeys(keys: string[]): Promise<string[]>;
  mergeEntities(entities: EntityUpsert[]): Promise<number>;
  createRelationships(relationships: RelationshipUpsert[]): Promise<number>;
  linkEntitiesToChunks(links: EntityChunkLink[]): Promise<number>;
}
