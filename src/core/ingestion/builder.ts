/**
 * Chunk Graph Builder
 *
 * Writes one document's chunks, entities and relationships to the graph in
 * a single transaction, shaped by the extraction strategy in effect when
 * the call started.
 *
 * Pipeline:
 * 1. Parse the request and take one strategy snapshot
 * 2. Compute chunk metadata (outside the transaction; may call the LLM)
 * 3. In one write transaction:
 *    validate → document → chunks → chain → FROM_DOCUMENT
 *    → entities → relationships → EXTRACTED_FROM
 */

import { z } from 'zod';
import type { ExtractionStrategy, StrategyStore } from '@/core/strategies';
import {
  type ChunkNode,
  chunkId,
  type EntityChunkLink,
  type EntityUpsert,
  entityKey,
  type GraphClient,
  isSafeIdentifier,
  now,
  type Properties,
  type RelationshipUpsert,
  type TransactionClient
} from '@/providers/graph';
import type { LLMClient } from '@/providers/llm';
import {
  logIngestFailure,
  logIngestResult,
  logIngestStart,
  logKeyTermFallback,
  logValidationIssues
} from '@/utils/logger';
import { IngestRequestError, PartialChainError } from './errors';
import { KeyedLock } from './locks';
import { enrichChunk, extractKeyTermsTfidf } from './metadata';
import type { SchemaDescriptor } from './schema';
import {
  type ChunkInput,
  type EntityInput,
  type IngestionResult,
  type IngestRequest,
  ingestRequestSchema,
  type RelationshipInput
} from './types';
import { applyValidationMode, validateBatch, validationOptions } from './validation';

/** Property keys the builder owns on Entity nodes */
/** Chunks sent to the model at once when extracting key terms */
export const KEY_TERM_BATCH_SIZE = 4;

const RESERVED_ENTITY_KEYS = new Set(['uid', 'id', 'type', 'confidence', 'source_documents']);

const llmTermsSchema = z.object({
  terms: z.array(z.string())
});

export interface ChunkGraphBuilderDependencies {
  graphClient: GraphClient;
  strategies: StrategyStore;
  schema: SchemaDescriptor;
  /** Needed only for `key_terms.method: llm`; without it, local extraction is used */
  llmClient?: LLMClient;
}

export class ChunkGraphBuilder {
  private readonly lock = new KeyedLock();

  constructor(private readonly deps: ChunkGraphBuilderDependencies) {}

  /**
   * Ingest one document. Calls for the same document id run one at a time.
   *
   * @throws IngestRequestError when the payload is malformed
   * @throws SchemaValidationError in strict mode when the batch has errors
   * @throws PartialChainError when the chunk chain does not link completely
   */
  async ingest(input: unknown): Promise<IngestionResult> {
    const parsed = ingestRequestSchema.safeParse(input);
    if (!parsed.success) {
      throw IngestRequestError.fromZod(parsed.error);
    }
    const request = parsed.data;
    const strategy = this.deps.strategies.get().extraction;

    return this.lock.run(request.document.id, async () => {
      const startTime = Date.now();
      logIngestStart(request);
      try {
        const result = await this.write(request, strategy, startTime);
        logIngestResult(result);
        return result;
      } catch (error) {
        logIngestFailure(request.document.id, error);
        throw error;
      }
    });
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Transaction Body
  // ═══════════════════════════════════════════════════════════════════════════

  private async write(
    request: IngestRequest,
    strategy: ExtractionStrategy,
    startTime: number
  ): Promise<IngestionResult> {
    const { document } = request;
    const chunks = [...request.chunks].sort((a, b) => a.chunk_index - b.chunk_index);
    const chunkRecords = strategy.chunks.enabled
      ? await this.buildChunks(document.id, chunks, strategy)
      : [];

    // The driver may re-run this body on transient failures; keep it self-contained
    const summary = await this.deps.graphClient.executeTransaction(async (tx) => {
      const warnings: string[] = [];

      // 1. Validate
      const existingKeys = await this.existingEndpointKeys(tx, request);
      const issues =
        strategy.validation.mode === 'ignore'
          ? []
          : validateBatch(request, this.deps.schema, validationOptions(strategy), existingKeys);
      if (strategy.validation.mode !== 'ignore') {
        logValidationIssues(issues, strategy.validation.log_level);
      }
      const batch = applyValidationMode(request, issues, strategy.validation.mode, existingKeys);
      warnings.push(...issues.map((issue) => `${issue.severity}: ${issue.message}`));

      // 2. Document
      await tx.upsertDocument({
        id: document.id,
        filename: document.filename,
        page_count: document.page_count,
        ingested_at: now()
      });

      // 3-5. Chunks and their structure
      let chunkCount = 0;
      if (strategy.chunks.enabled) {
        await tx.removeDocumentChunks(document.id);
        chunkCount = await tx.createChunks(chunkRecords);

        if (strategy.chunk_linking.sequential && chunkRecords.length > 1) {
          const expected = chunkRecords.length - 1;
          const linked = await tx.linkChunkChain(document.id, chunkRecords.length);
          if (linked !== expected) {
            throw new PartialChainError(document.id, expected, linked);
          }
        }

        if (strategy.chunk_linking.to_document) {
          await tx.linkChunksToDocument(document.id);
        }
      }

      // 6. Entities
      const entityCount = await tx.mergeEntities(
        batch.entities.map((entity) =>
          this.toEntityUpsert(entity, document.id, chunks, strategy, warnings)
        )
      );

      // 7. Relationships (types become Cypher identifiers)
      const storable = batch.relationships.filter((rel) => isSafeIdentifier(rel.type));
      for (const rel of batch.relationships) {
        if (!isSafeIdentifier(rel.type)) {
          warnings.push(
            `warning: Relationship type '${rel.type}' is not a valid identifier; skipped`
          );
        }
      }
      const relationshipCount = await tx.createRelationships(
        storable.map((rel) => this.toRelationshipUpsert(rel))
      );

      // 8. Provenance
      if (strategy.chunks.enabled && strategy.entity_linking.enabled) {
        await tx.linkEntitiesToChunks(provenanceLinks(document.id, batch.entities, chunks.length));
      }

      return {
        chunkCount,
        entityCount,
        relationshipCount,
        skippedEntities: batch.skipped_entities,
        skippedRelationships:
          batch.skipped_relationships + batch.relationships.length - storable.length,
        warnings
      };
    });

    return {
      document_id: document.id,
      entity_count: summary.entityCount,
      relationship_count: summary.relationshipCount,
      chunk_count: summary.chunkCount,
      skipped_entities: summary.skippedEntities,
      skipped_relationships: summary.skippedRelationships,
      warnings: summary.warnings,
      duration_ms: Date.now() - startTime
    };
  }

  /**
   * Relationship endpoints not defined in the batch, looked up in the graph.
   */
  private async existingEndpointKeys(
    tx: TransactionClient,
    request: IngestRequest
  ): Promise<Set<string>> {
    const batchKeys = new Set(request.entities.map(entityKey));
    const outside = new Set<string>();
    for (const rel of request.relationships) {
      for (const endpoint of [rel.source, rel.target]) {
        const key = entityKey(endpoint);
        if (!batchKeys.has(key)) outside.add(key);
      }
    }
    if (outside.size === 0) return outside;
    return new Set(await tx.findExistingEntityKeys([...outside]));
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Record Builders
  // ═══════════════════════════════════════════════════════════════════════════

  private async buildChunks(
    documentId: string,
    chunks: ChunkInput[],
    strategy: ExtractionStrategy
  ): Promise<ChunkNode[]> {
    const precomputedTerms = await this.precomputeKeyTerms(chunks, strategy);
    const { store_text, max_text_length } = strategy.chunks;

    let previousHeading: string | null = null;
    return chunks.map((chunk, i) => {
      const metadata = enrichChunk(chunk, strategy, {
        previousHeading,
        keyTerms: precomputedTerms?.[i]
      });
      if (metadata.section_heading !== undefined) {
        previousHeading = metadata.section_heading;
      }

      const record: ChunkNode = {
        id: chunkId(documentId, chunk.chunk_index),
        document_id: documentId,
        chunk_index: chunk.chunk_index,
        ...metadata
      };
      if (store_text) {
        record.text = max_text_length > 0 ? chunk.text.slice(0, max_text_length) : chunk.text;
      }
      return record;
    });
  }

  /**
   * Key terms for methods that need more than the chunk itself:
   * tfidf ranks against the whole document, llm asks the model.
   */
  private async precomputeKeyTerms(
    chunks: ChunkInput[],
    strategy: ExtractionStrategy
  ): Promise<string[][] | null> {
    const { enabled, method, max_terms } = strategy.metadata.key_terms;
    if (!enabled) return null;

    if (method === 'tfidf') {
      return extractKeyTermsTfidf(
        chunks.map((c) => c.text),
        max_terms
      );
    }

    const llm = this.deps.llmClient;
    if (method !== 'llm' || !llm) return null;

    const extract = async (chunk: ChunkInput): Promise<string[]> => {
      const { terms } = await llm.completeJSON(
        [
          {
            role: 'system',
            content:
              'Extract the key terms of the passage: defined terms, names, and domain concepts. ' +
              `Return at most ${max_terms} distinct terms, most important first.`
          },
          { role: 'user', content: chunk.text }
        ],
        llmTermsSchema,
        { temperature: 0 }
      );
      return terms.map((t) => t.trim()).filter(Boolean).slice(0, max_terms);
    };

    try {
      const results: string[][] = [];
      for (let i = 0; i < chunks.length; i += KEY_TERM_BATCH_SIZE) {
        const batch = chunks.slice(i, i + KEY_TERM_BATCH_SIZE);
        results.push(...(await Promise.all(batch.map(extract))));
      }
      return results;
    } catch (error) {
      logKeyTermFallback(error);
      return null;
    }
  }

  private toEntityUpsert(
    entity: EntityInput,
    documentId: string,
    chunks: ChunkInput[],
    strategy: ExtractionStrategy,
    warnings: string[]
  ): EntityUpsert {
    const key = entityKey(entity);
    const properties: Properties = {};
    for (const [name, value] of Object.entries(entity.properties)) {
      if (RESERVED_ENTITY_KEYS.has(name)) {
        warnings.push(`warning: Entity ${key}: reserved property '${name}' ignored`);
        continue;
      }
      properties[name] = value;
    }

    const { store_source_text, store_chunk_index } = strategy.entity_linking;
    if (store_source_text) {
      const sourceText =
        entity.source_text ??
        chunks.find((c) => c.chunk_index === entity.chunk_index)?.text;
      if (sourceText !== undefined) properties['source_text'] = sourceText;
    }
    if (store_chunk_index && entity.chunk_index !== undefined) {
      properties['chunk_index'] = entity.chunk_index;
    }

    return {
      key,
      type: entity.type,
      id: entity.id,
      properties,
      confidence: entity.confidence,
      source_document: documentId
    };
  }

  private toRelationshipUpsert(rel: RelationshipInput): RelationshipUpsert {
    return {
      type: rel.type,
      source_key: entityKey(rel.source),
      target_key: entityKey(rel.target),
      properties: rel.properties
    };
  }
}

function provenanceLinks(
  documentId: string,
  entities: EntityInput[],
  chunkCount: number
): EntityChunkLink[] {
  const links: EntityChunkLink[] = [];
  for (const entity of entities) {
    if (entity.chunk_index === undefined || entity.chunk_index >= chunkCount) continue;
    links.push({ entity_key: entityKey(entity), chunk_id: chunkId(documentId, entity.chunk_index) });
  }
  return links;
}
