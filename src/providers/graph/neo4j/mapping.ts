/**
 * Neo4j Record Mapping
 *
 * Translators that convert Neo4j values to domain types and back.
 * Driver values are narrowed field by field; nothing is trusted by shape.
 */

import neo4j from 'neo4j-driver';
import type {
  ChunkNode,
  DocumentNode,
  EntityNode,
  Properties,
  PropertyValue,
  ScalarValue
} from '../types';

// ============================================================
// NODE TYPE DEFINITION
// ============================================================

/**
 * Shape of a Neo4j node as returned by the driver.
 */
export interface Neo4jNode {
  properties: Record<string, unknown>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isNeo4jNode(value: unknown): value is Neo4jNode {
  return isRecord(value) && 'properties' in value && isRecord(value.properties);
}

// ============================================================
// VALUE NARROWING
// ============================================================

export function toNumber(value: unknown): number | undefined {
  if (typeof value === 'number') return value;
  if (neo4j.isInt(value)) return value.toNumber();
  return undefined;
}

export function toStringValue(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

export function toStringList(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) return undefined;
  return value.filter((item): item is string => typeof item === 'string');
}

function toScalar(value: unknown): ScalarValue | undefined {
  if (typeof value === 'string' || typeof value === 'boolean') return value;
  return toNumber(value);
}

export function toPropertyValue(value: unknown): PropertyValue | undefined {
  if (value === null) return null;
  if (Array.isArray(value)) {
    const items: ScalarValue[] = [];
    for (const item of value) {
      const scalar = toScalar(item);
      if (scalar !== undefined) items.push(scalar);
    }
    return items;
  }
  return toScalar(value);
}

export function toProperties(value: unknown, exclude: ReadonlySet<string> = new Set()): Properties {
  const properties: Properties = {};
  if (!isRecord(value)) return properties;
  for (const key of Object.keys(value).sort()) {
    if (exclude.has(key)) continue;
    const converted = toPropertyValue(value[key]);
    if (converted !== undefined) properties[key] = converted;
  }
  return properties;
}

function requireNode(value: unknown, what: string): Neo4jNode {
  if (!isNeo4jNode(value)) {
    throw new Error(`Expected a ${what} node, got ${typeof value}`);
  }
  return value;
}

// ============================================================
// RECORD TRANSLATORS
// ============================================================

/** Entity node properties that are structural, not extracted */
export const ENTITY_RESERVED_KEYS: ReadonlySet<string> = new Set([
  'uid',
  'id',
  'type',
  'confidence',
  'source_documents'
]);

export function recordToDocument(value: unknown): DocumentNode {
  const props = requireNode(value, 'Document').properties;
  return {
    id: toStringValue(props['id']) ?? '',
    filename: toStringValue(props['filename']) ?? '',
    page_count: toNumber(props['page_count']) ?? null,
    ingested_at: toStringValue(props['ingested_at']) ?? ''
  };
}

/**
 * Optional chunk fields are copied only when present on the node.
 */
export function recordToChunk(value: unknown): ChunkNode {
  const props = requireNode(value, 'Chunk').properties;
  const chunk: ChunkNode = {
    id: toStringValue(props['id']) ?? '',
    document_id: toStringValue(props['document_id']) ?? '',
    chunk_index: toNumber(props['chunk_index']) ?? 0
  };

  const text = toStringValue(props['text']);
  if (text !== undefined) chunk.text = text;
  const page = toNumber(props['page_number']);
  if (page !== undefined) chunk.page_number = page;
  const heading = toStringValue(props['section_heading']);
  if (heading !== undefined) chunk.section_heading = heading;
  const temporal = toStringList(props['temporal_refs']);
  if (temporal !== undefined) chunk.temporal_refs = temporal;
  const terms = toStringList(props['key_terms']);
  if (terms !== undefined) chunk.key_terms = terms;
  const words = toNumber(props['word_count']);
  if (words !== undefined) chunk.word_count = words;
  const chars = toNumber(props['char_count']);
  if (chars !== undefined) chunk.char_count = chars;
  const sentences = toNumber(props['sentence_count']);
  if (sentences !== undefined) chunk.sentence_count = sentences;

  return chunk;
}

export function recordToEntity(value: unknown): EntityNode {
  const props = requireNode(value, 'Entity').properties;
  const type = toStringValue(props['type']) ?? '';
  const id = toStringValue(props['id']) ?? '';
  return {
    key: toStringValue(props['uid']) ?? `${type}:${id}`,
    type,
    id,
    properties: toProperties(props, ENTITY_RESERVED_KEYS),
    confidence: toNumber(props['confidence']) ?? 1
  };
}

// ============================================================
// WRITE CONVERSION
// ============================================================

const CHUNK_INTEGER_FIELDS = [
  'chunk_index',
  'page_number',
  'word_count',
  'char_count',
  'sentence_count'
] as const;

/**
 * JS numbers travel as floats; positional fields are stored as integers so
 * index lookups with integer parameters match.
 */
export function chunkToParams(chunk: ChunkNode): Record<string, unknown> {
  const params: Record<string, unknown> = { ...chunk };
  for (const field of CHUNK_INTEGER_FIELDS) {
    const value = chunk[field];
    if (value !== undefined) params[field] = neo4j.int(value);
  }
  return params;
}
