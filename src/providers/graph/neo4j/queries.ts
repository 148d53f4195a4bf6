/**
 * Neo4j Query Repository
 *
 * Centralized Cypher queries. Each query documents the shape it expects
 * and the invariant it maintains.
 */

import { INDEXES, LABELS, RELS } from './constants';

// ============================================================
// SCHEMA QUERIES
// ============================================================

/**
 * CONSTRAINT QUERIES
 *
 * Entities are unique on `uid` (`<type>:<id>`), so the same extracted
 * record merges into one node however often it is ingested.
 */
export const CONSTRAINTS = {
  DOCUMENT_ID: `CREATE CONSTRAINT document_id_unique IF NOT EXISTS FOR (d:${LABELS.DOCUMENT}) REQUIRE d.id IS UNIQUE`,
  CHUNK_ID: `CREATE CONSTRAINT chunk_id_unique IF NOT EXISTS FOR (c:${LABELS.CHUNK}) REQUIRE c.id IS UNIQUE`,
  ENTITY_UID: `CREATE CONSTRAINT entity_uid_unique IF NOT EXISTS FOR (e:${LABELS.ENTITY}) REQUIRE e.uid IS UNIQUE`
} as const;

/**
 * RANGE INDEX QUERIES
 *
 * - chunk position: neighbour expansion looks chunks up by (document_id, chunk_index)
 * - entity type: seed lookup filters on type
 */
export const RANGE_INDEXES = {
  CHUNK_POSITION: `CREATE INDEX chunk_position IF NOT EXISTS FOR (c:${LABELS.CHUNK}) ON (c.document_id, c.chunk_index)`,
  ENTITY_TYPE: `CREATE INDEX entity_type IF NOT EXISTS FOR (e:${LABELS.ENTITY}) ON (e.type)`
} as const;

export const FULLTEXT_INDEXES = {
  CHUNK: `CREATE FULLTEXT INDEX ${INDEXES.CHUNK_FULLTEXT} IF NOT EXISTS FOR (c:${LABELS.CHUNK}) ON EACH [c.text]`
} as const;

// ============================================================
// DOCUMENT & CHUNK WRITES
// ============================================================

export const UPSERT_DOCUMENT = `
  MERGE (d:${LABELS.DOCUMENT} {id: $document.id})
  SET d.filename = $document.filename,
      d.page_count = $document.page_count,
      d.ingested_at = $document.ingested_at
`;

/**
 * Chunks are replaced wholesale on re-ingestion. DETACH also drops the
 * provenance edges pointing at them; the builder recreates those.
 */
export const REMOVE_DOCUMENT_CHUNKS = `
  MATCH (c:${LABELS.CHUNK} {document_id: $documentId})
  WITH c, c.id AS id
  DETACH DELETE c
  RETURN count(id) AS removed
`;

/**
 * `SET c = chunk` stores exactly the keys present on the map; fields the
 * extraction strategy disabled are never written.
 */
export const CREATE_CHUNKS = `
  UNWIND $chunks AS chunk
  CREATE (c:${LABELS.CHUNK})
  SET c = chunk
  RETURN count(c) AS created
`;

/**
 * Links index i to i + 1 in both directions. For N chunks this yields
 * N - 1 rows; the caller compares the count to detect gaps.
 */
export const LINK_CHUNK_CHAIN = `
  UNWIND range(0, $chunkCount - 2) AS i
  MATCH (a:${LABELS.CHUNK} {document_id: $documentId, chunk_index: i})
  MATCH (b:${LABELS.CHUNK} {document_id: $documentId, chunk_index: i + 1})
  MERGE (a)-[:${RELS.NEXT_CHUNK}]->(b)
  MERGE (b)-[:${RELS.PREV_CHUNK}]->(a)
  RETURN count(*) AS linked
`;

export const LINK_CHUNKS_TO_DOCUMENT = `
  MATCH (d:${LABELS.DOCUMENT} {id: $documentId})
  MATCH (c:${LABELS.CHUNK} {document_id: $documentId})
  MERGE (c)-[:${RELS.FROM_DOCUMENT}]->(d)
  RETURN count(c) AS linked
`;

// ============================================================
// ENTITY & RELATIONSHIP WRITES
// ============================================================

export const FIND_EXISTING_ENTITY_KEYS = `
  MATCH (e:${LABELS.ENTITY})
  WHERE e.uid IN $keys
  RETURN e.uid AS key
`;

/**
 * ENTITY MERGE QUERY
 *
 * Identity is the uid. Properties merge key-wise (`+=`), so a re-ingested
 * entity never loses properties another document contributed. The source
 * document list is a set: re-ingesting the same document leaves it unchanged.
 */
export const MERGE_ENTITIES = `
  UNWIND $entities AS entity
  MERGE (e:${LABELS.ENTITY} {uid: entity.key})
  ON CREATE SET
    e.id = entity.id,
    e.type = entity.type,
    e.source_documents = [entity.source_document]
  ON MATCH SET
    e.source_documents = CASE
      WHEN entity.source_document IN coalesce(e.source_documents, []) THEN e.source_documents
      ELSE coalesce(e.source_documents, []) + entity.source_document
    END
  SET e += entity.properties,
      e.confidence = entity.confidence
  RETURN count(e) AS merged
`;

/**
 * Relationship types cannot be parameterized in Cypher. The type is
 * validated as a plain identifier before it reaches this builder.
 */
export function createRelationshipsQuery(type: string): string {
  return `
  UNWIND $relationships AS rel
  MATCH (s:${LABELS.ENTITY} {uid: rel.source_key})
  MATCH (t:${LABELS.ENTITY} {uid: rel.target_key})
  MERGE (s)-[r:${type}]->(t)
  SET r += rel.properties
  RETURN count(r) AS created
`;
}

export const LINK_ENTITIES_TO_CHUNKS = `
  UNWIND $links AS link
  MATCH (e:${LABELS.ENTITY} {uid: link.entity_key})
  MATCH (c:${LABELS.CHUNK} {id: link.chunk_id})
  MERGE (e)-[r:${RELS.EXTRACTED_FROM}]->(c)
  RETURN count(r) AS linked
`;

// ============================================================
// DOCUMENT & CHUNK READS
// ============================================================

export const GET_DOCUMENT = `
  MATCH (d:${LABELS.DOCUMENT} {id: $id})
  RETURN d
`;

/**
 * Neighbour expansion: one lookup per document by index arithmetic,
 * no path traversal.
 */
export const GET_CHUNKS_BY_INDEX = `
  MATCH (c:${LABELS.CHUNK} {document_id: $documentId})
  WHERE c.chunk_index IN $indices
  RETURN c
  ORDER BY c.chunk_index
`;

export const GET_CHUNK_CHAIN = `
  MATCH (first:${LABELS.CHUNK} {document_id: $documentId, chunk_index: 0})
  MATCH path = (first)-[:${RELS.NEXT_CHUNK}*0..]->(c:${LABELS.CHUNK})
  RETURN c
  ORDER BY length(path)
`;

// ============================================================
// INSPECTION QUERIES
// ============================================================

export const LIST_DOCUMENTS = `
  MATCH (d:${LABELS.DOCUMENT})
  OPTIONAL MATCH (c:${LABELS.CHUNK})-[:${RELS.FROM_DOCUMENT}]->(d)
  WITH d, count(c) AS chunk_count
  RETURN d, chunk_count
  ORDER BY d.ingested_at DESC, d.id
`;

export const LIST_ENTITIES_BY_TYPE = `
  MATCH (e:${LABELS.ENTITY} {type: $type})
  RETURN e
  ORDER BY e.id
  LIMIT $limit
`;

export const GET_ENTITY = `
  MATCH (e:${LABELS.ENTITY} {uid: $key})
  RETURN e
`;

/**
 * Entity-to-entity edges only: provenance edges end at a Chunk and never
 * match `other:Entity`.
 */
export const GET_RELATED_ENTITIES = `
  MATCH (e:${LABELS.ENTITY} {uid: $key})-[r]-(other:${LABELS.ENTITY})
  RETURN type(r) AS type,
         startNode(r) = e AS outgoing,
         properties(r) AS properties,
         other
  ORDER BY type(r), other.uid
`;

// ============================================================
// SEARCH QUERIES
// ============================================================

/**
 * Seed lookup for graph traversal.
 *
 * `$filters` is a list of {key, value}; every filter must match as a
 * case-insensitive substring of the property's string form.
 */
export const FIND_ENTITIES = `
  MATCH (e:${LABELS.ENTITY})
  WHERE (size($types) = 0 OR e.type IN $types)
    AND all(f IN $filters WHERE toLower(toString(e[f.key])) CONTAINS toLower(f.value))
    AND (
      $nameContains IS NULL
      OR toLower(toString(coalesce(e.name, ''))) CONTAINS toLower($nameContains)
      OR toLower(toString(coalesce(e.title, ''))) CONTAINS toLower($nameContains)
    )
  RETURN e
  ORDER BY e.confidence DESC, e.uid
  LIMIT $limit
`;

/**
 * Entity neighbourhood up to `depth` hops. Every node on the path must be
 * an Entity so traversal never leaks through chunks or documents.
 * Depth is interpolated because variable-length bounds cannot be parameters.
 */
export function createTraversalQuery(depth: number): string {
  return `
  MATCH (seed:${LABELS.ENTITY})
  WHERE seed.uid IN $seedKeys
  MATCH path = (seed)-[*1..${depth}]-(n:${LABELS.ENTITY})
  WHERE NOT n.uid IN $seedKeys
    AND all(x IN nodes(path) WHERE x:${LABELS.ENTITY})
  WITH n, min(length(path)) AS depth
  RETURN n, depth
  ORDER BY depth, n.uid
  LIMIT $limit
`;
}

export const GET_PROVENANCE_CHUNKS = `
  MATCH (e:${LABELS.ENTITY})-[:${RELS.EXTRACTED_FROM}]->(c:${LABELS.CHUNK})
  WHERE e.uid IN $keys
  RETURN e.uid AS entity_key, c
  ORDER BY c.document_id, c.chunk_index
`;

export const GET_RELATIONSHIPS_AMONG = `
  MATCH (s:${LABELS.ENTITY})-[r]->(t:${LABELS.ENTITY})
  WHERE s.uid IN $keys AND t.uid IN $keys
  RETURN type(r) AS type,
         s.type AS source_type, s.id AS source_id,
         t.type AS target_type, t.id AS target_id,
         properties(r) AS properties
  ORDER BY s.uid, type(r), t.uid
`;

export const SEARCH_CHUNKS_CONTAINS = `
  MATCH (c:${LABELS.CHUNK})
  WHERE c.text IS NOT NULL AND toLower(c.text) CONTAINS toLower($text)
  RETURN c, 1.0 AS score
  ORDER BY c.document_id, c.chunk_index
  LIMIT $limit
`;

/**
 * `=~` must match the whole string, so the pattern arrives wrapped
 * as `(?is).*<pattern>.*`.
 */
export const SEARCH_CHUNKS_REGEX = `
  MATCH (c:${LABELS.CHUNK})
  WHERE c.text IS NOT NULL AND c.text =~ $pattern
  RETURN c, 1.0 AS score
  ORDER BY c.document_id, c.chunk_index
  LIMIT $limit
`;

export const SEARCH_CHUNKS_FULLTEXT = `
  CALL db.index.fulltext.queryNodes('${INDEXES.CHUNK_FULLTEXT}', $query)
  YIELD node, score
  RETURN node AS c, score
  ORDER BY score DESC
  LIMIT $limit
`;

export const SEARCH_CHUNKS_BY_KEY_TERMS = `
  MATCH (c:${LABELS.CHUNK})
  WHERE c.key_terms IS NOT NULL
    AND any(term IN c.key_terms WHERE toLower(term) IN $terms)
  RETURN c
  ORDER BY c.document_id, c.chunk_index
  LIMIT $limit
`;

export const GET_CHUNKS_WITH_TEMPORAL_REFS = `
  MATCH (c:${LABELS.CHUNK})
  WHERE size(coalesce(c.temporal_refs, [])) > 0
    AND (
      size($tokens) = 0
      OR any(ref IN c.temporal_refs WHERE any(token IN $tokens WHERE toLower(ref) CONTAINS token))
    )
  RETURN c
  ORDER BY c.document_id, c.chunk_index
  LIMIT $limit
`;

// ============================================================
// DELETION
// ============================================================

/**
 * Remove the document from every entity's source list and delete the
 * entities left with no source.
 */
export const RELEASE_DOCUMENT_ENTITIES = `
  MATCH (e:${LABELS.ENTITY})
  WHERE $documentId IN coalesce(e.source_documents, [])
  SET e.source_documents = [s IN e.source_documents WHERE s <> $documentId]
  WITH e
  WHERE size(e.source_documents) = 0
  DETACH DELETE e
  RETURN count(*) AS removed
`;

export const DELETE_DOCUMENT_NODE = `
  MATCH (d:${LABELS.DOCUMENT} {id: $documentId})
  DETACH DELETE d
  RETURN count(*) AS deleted
`;

export const CLEAR_GRAPH = `
  MATCH (n)
  WHERE n:${LABELS.DOCUMENT} OR n:${LABELS.CHUNK} OR n:${LABELS.ENTITY}
  DETACH DELETE n
`;

// ============================================================
// STATISTICS
// ============================================================

export const COUNT_NODES = `
  CALL { MATCH (d:${LABELS.DOCUMENT}) RETURN count(d) AS documents }
  CALL { MATCH (c:${LABELS.CHUNK}) RETURN count(c) AS chunks }
  CALL { MATCH (e:${LABELS.ENTITY}) RETURN count(e) AS entities }
  RETURN documents, chunks, entities
`;

export const COUNT_ENTITY_TYPES = `
  MATCH (e:${LABELS.ENTITY})
  RETURN e.type AS type, count(e) AS count
  ORDER BY type
`;

/**
 * Only entity-to-entity edges; infrastructure edges never join two entities.
 */
export const COUNT_RELATIONSHIP_TYPES = `
  MATCH (:${LABELS.ENTITY})-[r]->(:${LABELS.ENTITY})
  RETURN type(r) AS type, count(r) AS count
  ORDER BY type
`;
