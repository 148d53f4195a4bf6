/**
 * Ingestion Types
 *
 * The ingest request is validated with zod at the boundary; everything
 * downstream works on the parsed output.
 */

import { z } from 'zod';

const scalarSchema = z.union([z.string(), z.number(), z.boolean()]);

export const propertyValueSchema = z.union([scalarSchema, z.array(scalarSchema), z.null()]);

const propertiesSchema = z.record(z.string(), propertyValueSchema);

export const entityRefSchema = z.strictObject({
  type: z.string().min(1),
  id: z.string().min(1)
});

export const documentInputSchema = z.strictObject({
  id: z.string().min(1),
  filename: z.string().min(1),
  page_count: z.number().int().min(0).nullable().default(null)
});

/**
 * A chunk as produced by the external chunker. Metadata the caller supplies
 * wins over what the extractors would compute.
 */
export const chunkInputSchema = z.strictObject({
  chunk_index: z.number().int().min(0),
  text: z.string(),
  page_number: z.number().int().min(1).optional(),
  section_heading: z.string().nullable().optional(),
  temporal_refs: z.array(z.string()).optional(),
  key_terms: z.array(z.string()).optional()
});

export const entityInputSchema = z.strictObject({
  type: z.string().min(1),
  id: z.string().min(1),
  properties: propertiesSchema.default({}),
  confidence: z.number().min(0).max(1).default(1),
  /** Chunk the entity was extracted from */
  chunk_index: z.number().int().min(0).optional(),
  /** Verbatim span the entity was read from */
  source_text: z.string().optional()
});

export const relationshipInputSchema = z.strictObject({
  type: z.string().min(1),
  source: entityRefSchema,
  target: entityRefSchema,
  properties: propertiesSchema.default({})
});

export const ingestRequestSchema = z
  .strictObject({
    document: documentInputSchema,
    chunks: z.array(chunkInputSchema).default([]),
    entities: z.array(entityInputSchema).default([]),
    relationships: z.array(relationshipInputSchema).default([])
  })
  .superRefine((request, ctx) => {
    // Indices must be exactly 0..N-1, in any order
    const seen = new Set<number>();
    request.chunks.forEach((chunk, i) => {
      if (seen.has(chunk.chunk_index)) {
        ctx.addIssue({
          code: 'custom',
          path: ['chunks', i, 'chunk_index'],
          message: `Duplicate chunk_index ${chunk.chunk_index}`
        });
      }
      seen.add(chunk.chunk_index);
      if (chunk.chunk_index >= request.chunks.length) {
        ctx.addIssue({
          code: 'custom',
          path: ['chunks', i, 'chunk_index'],
          message: `chunk_index ${chunk.chunk_index} leaves a gap (${request.chunks.length} chunks)`
        });
      }
    });
  });

export type IngestRequestInput = z.input<typeof ingestRequestSchema>;
export type IngestRequest = z.output<typeof ingestRequestSchema>;
export type ChunkInput = z.output<typeof chunkInputSchema>;
export type EntityInput = z.output<typeof entityInputSchema>;
export type RelationshipInput = z.output<typeof relationshipInputSchema>;

export interface IngestionResult {
  document_id: string;
  entity_count: number;
  relationship_count: number;
  chunk_count: number;
  skipped_entities: number;
  skipped_relationships: number;
  warnings: string[];
  duration_ms: number;
}
