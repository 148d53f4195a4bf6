/**
 * Context Formatter
 *
 * Serializes the final entity, relationship and chunk set into the text
 * block handed to answer generation. Pure: the same input always gives
 * the same text.
 */

import type { RetrievalStrategy } from '@/core/strategies';
import {
  type ChunkNode,
  type EntityNode,
  entityKey,
  type PropertyValue,
  type RelationshipRecord
} from '@/providers/graph';

export type IncludeMetadata = RetrievalStrategy['context']['include_metadata'];

export interface FormatInput {
  query: string;
  /** In rank order */
  entities: readonly EntityNode[];
  chunks: readonly ChunkNode[];
  relationships: readonly RelationshipRecord[];
  include: IncludeMetadata;
}

function formatValue(value: PropertyValue): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return value.map(String).join(', ');
  return String(value);
}

function normalizeContent(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export function entityLabel(entity: EntityNode): string {
  const name = entity.properties['name'] ?? entity.properties['title'];
  return typeof name === 'string' && name ? name : entity.id;
}

/**
 * Tree branches: `├─` for rows with siblings below, `└─` for the last.
 */
function tree(rows: string[]): string[] {
  return rows.map((row, i) => `${i === rows.length - 1 ? '└─' : '├─'} ${row}`);
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function compareChunks(a: ChunkNode, b: ChunkNode): number {
  return compareText(a.document_id, b.document_id) || a.chunk_index - b.chunk_index;
}

/**
 * @example
 * ```
 * # Retrieved Context
 *
 * Query: "Who signed the supply agreement?"
 *
 * ## Entities
 *
 * [Acme Corp] (Party)
 * └─ name: Acme Corp
 *
 * ## Relationships
 *
 * - Party:acme -[PARTY_TO]-> Contract:supply-2024
 *
 * ## Excerpts
 *
 * [contract-1 #1]
 * ├─ Section: 2. Parties
 * └─ Content: "Acme Corp agrees to supply..."
 * ```
 */
export function formatContext(input: FormatInput): string {
  const { include } = input;
  const lines: string[] = ['# Retrieved Context', '', `Query: "${input.query}"`, ''];

  if (input.entities.length > 0) {
    lines.push('## Entities', '');
    for (const entity of input.entities) {
      lines.push(`[${entityLabel(entity)}] (${entity.type})`);
      const keys = Object.keys(entity.properties).sort(compareText);
      lines.push(...tree(keys.map((key) => `${key}: ${formatValue(entity.properties[key] ?? null)}`)));
      lines.push('');
    }
  }

  if (input.relationships.length > 0) {
    const rendered = input.relationships
      .map((rel) => `- ${entityKey(rel.source)} -[${rel.type}]-> ${entityKey(rel.target)}`)
      .sort(compareText);
    lines.push('## Relationships', '', ...rendered, '');
  }

  if (input.chunks.length > 0) {
    lines.push('## Excerpts', '');
    for (const chunk of [...input.chunks].sort(compareChunks)) {
      lines.push(`[${chunk.document_id} #${chunk.chunk_index}]`);

      const rows: string[] = [];
      if (include.section_heading && chunk.section_heading) {
        rows.push(`Section: ${chunk.section_heading}`);
      }
      if (include.page_number && chunk.page_number !== undefined) {
        rows.push(`Page: ${chunk.page_number}`);
      }
      if (include.temporal_refs && chunk.temporal_refs && chunk.temporal_refs.length > 0) {
        rows.push(`Dates: ${chunk.temporal_refs.join(', ')}`);
      }
      if (include.key_terms && chunk.key_terms && chunk.key_terms.length > 0) {
        rows.push(`Key terms: ${chunk.key_terms.join(', ')}`);
      }
      rows.push(
        chunk.text !== undefined
          ? `Content: "${normalizeContent(chunk.text)}"`
          : 'Content: (text not stored)'
      );

      lines.push(...tree(rows), '');
    }
  }

  return lines.join('\n').trimEnd();
}
