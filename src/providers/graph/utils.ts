/**
 * Graph Provider Utilities
 *
 * Helper functions shared by graph providers and their callers.
 */

import type { EntityRef } from './types';

/**
 * Get current timestamp in ISO 8601 format.
 */
export function now(): string {
  return new Date().toISOString();
}

/**
 * String form of an entity identity, used as the node's unique key.
 */
export function entityKey(ref: EntityRef): string {
  return `${ref.type}:${ref.id}`;
}

/**
 * Deterministic chunk id: re-ingesting a document yields the same ids.
 */
export function chunkId(documentId: string, chunkIndex: number): string {
  return `${documentId}:${chunkIndex}`;
}

/**
 * Lucene special characters that need escaping in fulltext queries.
 * @see https://lucene.apache.org/core/9_0_0/queryparser/org/apache/lucene/queryparser/classic/package-summary.html
 */
const LUCENE_SPECIAL_CHARS = /[+\-&|!(){}[\]^"~*?:\\/]/g;

/**
 * Sanitize a query string for Lucene fulltext search.
 * Escapes special characters that have meaning in Lucene query syntax.
 */
export function sanitizeLucene(query: string): string {
  return query.replace(LUCENE_SPECIAL_CHARS, '\\$&');
}

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Relationship types are interpolated into Cypher, so they must be plain identifiers.
 */
export function isSafeIdentifier(value: string): boolean {
  return IDENTIFIER.test(value);
}

/**
 * Escape a string for literal use inside a regular expression.
 */
export function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
