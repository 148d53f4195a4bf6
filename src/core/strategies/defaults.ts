/**
 * Default Strategies
 *
 * The process starts from this pair, and `reset()` returns to it.
 * Presets are written as overrides on top of these values.
 */

import type { ExtractionStrategy, RetrievalStrategy } from './types';

/** Heading patterns tried in order; the first match on a line wins */
export const DEFAULT_SECTION_PATTERNS = [
  '^(ARTICLE|Article|SECTION|Section)\\s+\\d+',
  '^\\d+\\.\\s+[A-Z]',
  '^[A-Z][A-Z\\s]{3,}$'
];

export const DEFAULT_EXTRACTION = {
  name: 'default',
  description: 'Default extraction strategy',
  chunking: {
    strategy: 'fixed',
    chunk_size: 1000,
    chunk_overlap: 200
  },
  chunks: {
    enabled: true,
    store_text: true,
    max_text_length: 0
  },
  chunk_linking: {
    sequential: true,
    to_document: true
  },
  metadata: {
    page_numbers: { enabled: true },
    section_headings: {
      enabled: true,
      patterns: [...DEFAULT_SECTION_PATTERNS]
    },
    temporal_references: {
      enabled: true,
      extract_dates: true,
      extract_durations: true,
      extract_relative: true
    },
    key_terms: {
      enabled: true,
      method: 'simple',
      max_terms: 10
    },
    statistics: {
      word_count: true,
      char_count: true,
      sentence_count: false
    }
  },
  entity_linking: {
    enabled: true,
    store_source_text: false,
    store_chunk_index: true
  },
  validation: {
    mode: 'warn',
    log_level: 'info',
    fail_on_missing_required: false,
    fail_on_broken_relationships: true
  }
} satisfies ExtractionStrategy;

export const DEFAULT_RETRIEVAL = {
  name: 'default',
  description: 'Default retrieval strategy',
  search: {
    graph_traversal: { enabled: true, max_depth: 2 },
    chunk_text_search: { enabled: true, method: 'contains' },
    keyword_matching: { enabled: true, match_threshold: 0.5 },
    temporal_filtering: { enabled: true, auto_detect: true }
  },
  context: {
    expand_neighbors: { enabled: true, before: 1, after: 1 },
    include_metadata: {
      section_heading: true,
      page_number: true,
      temporal_refs: true,
      key_terms: false
    }
  },
  scoring: {
    entity_confidence_min: 0.5,
    graph_match_weight: 1.5,
    text_match_weight: 1.0,
    keyword_match_weight: 1.0,
    temporal_match_weight: 0.5,
    recency_boost: false
  },
  limits: {
    max_chunks: 10,
    max_entities: 20,
    max_context_tokens: 4000
  }
} satisfies RetrievalStrategy;
