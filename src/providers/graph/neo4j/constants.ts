/**
 * Neo4j Schema Registry
 *
 * Single source of truth for all database schema elements.
 */

// ============================================================
// NODE LABELS
// ============================================================

/**
 * Node labels in the chunk graph.
 *
 * - Document: One per ingested source file
 * - Chunk: Ordered text segment of a document
 * - Entity: Extracted, schema-typed record (type kept as a property)
 */
export const LABELS = {
  DOCUMENT: 'Document',
  CHUNK: 'Chunk',
  ENTITY: 'Entity'
} as const;

export type Label = (typeof LABELS)[keyof typeof LABELS];

// ============================================================
// RELATIONSHIP TYPES
// ============================================================

/**
 * Infrastructure relationship types. Entity-to-entity relationships use
 * the schema's own types and are never one of these.
 *
 * - FROM_DOCUMENT: Chunk -> Document
 * - NEXT_CHUNK / PREV_CHUNK: Chunk <-> Chunk (reading order)
 * - EXTRACTED_FROM: Entity -> Chunk (provenance)
 */
export const RELS = {
  FROM_DOCUMENT: 'FROM_DOCUMENT',
  NEXT_CHUNK: 'NEXT_CHUNK',
  PREV_CHUNK: 'PREV_CHUNK',
  EXTRACTED_FROM: 'EXTRACTED_FROM'
} as const;

export type RelType = (typeof RELS)[keyof typeof RELS];

export const INFRASTRUCTURE_RELS: readonly string[] = Object.values(RELS);

// ============================================================
// INDEX NAMES
// ============================================================

export const INDEXES = {
  CHUNK_FULLTEXT: 'chunk_text_ftxt'
} as const;

export type IndexName = (typeof INDEXES)[keyof typeof INDEXES];

// ============================================================
// RETRY CONFIGURATION
// ============================================================

/**
 * Retry settings for transient error handling.
 */
export const RETRY = {
  MAX_ATTEMPTS: 3,
  BASE_DELAY_MS: 100
} as const;
