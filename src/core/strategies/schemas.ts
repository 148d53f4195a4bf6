/**
 * Strategy Schemas
 *
 * Zod definitions of the two strategy trees. Objects are strict: an unknown
 * key in a user-supplied strategy is a validation error, not silently dropped.
 */

import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════════════════════
// Extraction Strategy
// ═══════════════════════════════════════════════════════════════════════════════

export const chunkingMethods = ['fixed', 'semantic', 'sentence'] as const;
export const keyTermMethods = ['llm', 'tfidf', 'regex', 'simple'] as const;
export const validationModes = ['strict', 'warn', 'store_valid', 'ignore'] as const;
export const validationLogLevels = ['debug', 'info', 'warning'] as const;

const regexPattern = z.string().refine(
  (pattern) => {
    try {
      new RegExp(pattern);
      return true;
    } catch {
      return false;
    }
  },
  { message: 'Invalid regular expression' }
);

export const extractionStrategySchema = z.strictObject({
  name: z.string().min(1),
  description: z.string(),
  chunking: z.strictObject({
    strategy: z.enum(chunkingMethods),
    chunk_size: z.number().int().min(100).max(10000),
    chunk_overlap: z.number().int().min(0).max(500)
  }),
  chunks: z.strictObject({
    enabled: z.boolean(),
    store_text: z.boolean(),
    /** 0 = no truncation */
    max_text_length: z.number().int().min(0)
  }),
  chunk_linking: z.strictObject({
    sequential: z.boolean(),
    to_document: z.boolean()
  }),
  metadata: z.strictObject({
    page_numbers: z.strictObject({ enabled: z.boolean() }),
    section_headings: z.strictObject({
      enabled: z.boolean(),
      patterns: z.array(regexPattern)
    }),
    temporal_references: z.strictObject({
      enabled: z.boolean(),
      extract_dates: z.boolean(),
      extract_durations: z.boolean(),
      extract_relative: z.boolean()
    }),
    key_terms: z.strictObject({
      enabled: z.boolean(),
      method: z.enum(keyTermMethods),
      max_terms: z.number().int().min(1).max(50)
    }),
    statistics: z.strictObject({
      word_count: z.boolean(),
      char_count: z.boolean(),
      sentence_count: z.boolean()
    })
  }),
  entity_linking: z.strictObject({
    enabled: z.boolean(),
    store_source_text: z.boolean(),
    store_chunk_index: z.boolean()
  }),
  validation: z.strictObject({
    mode: z.enum(validationModes),
    log_level: z.enum(validationLogLevels),
    fail_on_missing_required: z.boolean(),
    fail_on_broken_relationships: z.boolean()
  })
});

// ═══════════════════════════════════════════════════════════════════════════════
// Retrieval Strategy
// ═══════════════════════════════════════════════════════════════════════════════

export const chunkTextMethods = ['contains', 'fulltext', 'regex'] as const;

const weight = z.number().min(0);

export const retrievalStrategySchema = z.strictObject({
  name: z.string().min(1),
  description: z.string(),
  search: z.strictObject({
    graph_traversal: z.strictObject({
      enabled: z.boolean(),
      max_depth: z.number().int().min(1).max(5)
    }),
    chunk_text_search: z.strictObject({
      enabled: z.boolean(),
      method: z.enum(chunkTextMethods)
    }),
    keyword_matching: z.strictObject({
      enabled: z.boolean(),
      match_threshold: z.number().min(0).max(1)
    }),
    temporal_filtering: z.strictObject({
      enabled: z.boolean(),
      auto_detect: z.boolean()
    })
  }),
  context: z.strictObject({
    expand_neighbors: z.strictObject({
      enabled: z.boolean(),
      before: z.number().int().min(0).max(5),
      after: z.number().int().min(0).max(5)
    }),
    include_metadata: z.strictObject({
      section_heading: z.boolean(),
      page_number: z.boolean(),
      temporal_refs: z.boolean(),
      key_terms: z.boolean()
    })
  }),
  scoring: z.strictObject({
    entity_confidence_min: z.number().min(0).max(1),
    graph_match_weight: weight,
    text_match_weight: weight,
    keyword_match_weight: weight,
    temporal_match_weight: weight,
    recency_boost: z.boolean()
  }),
  limits: z.strictObject({
    max_chunks: z.number().int().min(1).max(50),
    max_entities: z.number().int().min(1).max(100),
    max_context_tokens: z.number().int().min(500).max(32000)
  })
});
