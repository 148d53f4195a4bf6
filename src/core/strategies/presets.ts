/**
 * Strategy Presets
 *
 * Each preset is a complete, validated extraction/retrieval pair, written as
 * overrides on top of the defaults. Values not named here keep their default.
 */

import { DEFAULT_EXTRACTION, DEFAULT_RETRIEVAL } from './defaults';
import { deepFreeze, deepMerge } from './merge';
import { extractionStrategySchema, retrievalStrategySchema } from './schemas';
import type { DeepPartial, ExtractionStrategy, RetrievalStrategy, StrategyPreset } from './types';

interface PresetOverrides {
  extraction: DeepPartial<ExtractionStrategy> & { name: string; description: string };
  retrieval: DeepPartial<RetrievalStrategy> & { name: string; description: string };
}

const RESEARCH_SECTION_PATTERNS = [
  '^(Abstract|Introduction|Methods?|Results?|Discussion|Conclusion|References)',
  '^\\d+\\.\\s+[A-Z]',
  '^[A-Z][A-Z\\s]{3,}$'
];

// ═══════════════════════════════════════════════════════════════════════════════
// Preset Definitions
// ═══════════════════════════════════════════════════════════════════════════════

/** Entities only: no chunk storage, graph-only retrieval */
const minimal: PresetOverrides = {
  extraction: {
    name: 'minimal',
    description: 'Minimal extraction - entities only, no chunk storage',
    chunking: { chunk_size: 1500, chunk_overlap: 100 },
    chunks: { enabled: false, store_text: false },
    chunk_linking: { sequential: false, to_document: false },
    metadata: {
      page_numbers: { enabled: false },
      section_headings: { enabled: false },
      temporal_references: { enabled: false },
      key_terms: { enabled: false },
      statistics: { word_count: false, char_count: false, sentence_count: false }
    },
    // No chunks to point at, so the entity carries its source text
    entity_linking: { enabled: false, store_source_text: true },
    validation: { mode: 'ignore', log_level: 'warning' }
  },
  retrieval: {
    name: 'minimal',
    description: 'Minimal retrieval - graph only',
    search: {
      graph_traversal: { enabled: true, max_depth: 2 },
      chunk_text_search: { enabled: false },
      keyword_matching: { enabled: false },
      temporal_filtering: { enabled: false }
    },
    context: {
      expand_neighbors: { enabled: false },
      include_metadata: {
        section_heading: false,
        page_number: false,
        temporal_refs: false,
        key_terms: false
      }
    },
    scoring: { entity_confidence_min: 0.3, graph_match_weight: 1.0, text_match_weight: 0.0 },
    limits: { max_chunks: 5, max_entities: 15, max_context_tokens: 2000 }
  }
};

const balanced: PresetOverrides = {
  extraction: {
    name: 'balanced',
    description: 'Balanced extraction - chunks with basic metadata',
    chunking: { chunk_size: 1000, chunk_overlap: 200 },
    metadata: {
      temporal_references: { extract_relative: false },
      key_terms: { max_terms: 8 }
    },
    validation: { mode: 'warn' }
  },
  retrieval: {
    name: 'balanced',
    description: 'Balanced retrieval - graph + text search',
    search: {
      chunk_text_search: { enabled: true, method: 'contains' },
      keyword_matching: { enabled: true, match_threshold: 0.5 }
    },
    context: {
      expand_neighbors: { enabled: true, before: 1, after: 1 },
      include_metadata: {
        section_heading: true,
        page_number: true,
        temporal_refs: false,
        key_terms: false
      }
    },
    scoring: { entity_confidence_min: 0.5, graph_match_weight: 1.5, text_match_weight: 1.0 },
    limits: { max_chunks: 10, max_entities: 20, max_context_tokens: 4000 }
  }
};

const comprehensive: PresetOverrides = {
  extraction: {
    name: 'comprehensive',
    description: 'Comprehensive extraction - all metadata enabled',
    chunking: { chunk_size: 800, chunk_overlap: 200 },
    metadata: {
      key_terms: { max_terms: 15 },
      statistics: { word_count: true, char_count: true, sentence_count: true }
    },
    entity_linking: { store_source_text: true },
    validation: { mode: 'store_valid', fail_on_missing_required: true }
  },
  retrieval: {
    name: 'comprehensive',
    description: 'Comprehensive retrieval - all search methods',
    search: {
      graph_traversal: { max_depth: 3 },
      keyword_matching: { match_threshold: 0.4 }
    },
    context: {
      expand_neighbors: { enabled: true, before: 2, after: 2 },
      include_metadata: {
        section_heading: true,
        page_number: true,
        temporal_refs: true,
        key_terms: true
      }
    },
    scoring: { entity_confidence_min: 0.4, graph_match_weight: 1.5, text_match_weight: 1.2 },
    limits: { max_chunks: 15, max_entities: 30, max_context_tokens: 6000 }
  }
};

const speed: PresetOverrides = {
  extraction: {
    name: 'speed',
    description: 'Speed optimized - minimal metadata, fast processing',
    chunking: { chunk_size: 2000, chunk_overlap: 100 },
    chunks: { max_text_length: 2000 },
    metadata: {
      section_headings: { enabled: false },
      temporal_references: { enabled: false },
      key_terms: { enabled: false },
      statistics: { word_count: true, char_count: false, sentence_count: false }
    },
    validation: { mode: 'ignore', log_level: 'warning' }
  },
  retrieval: {
    name: 'speed',
    description: 'Speed optimized - graph only, limited context',
    search: {
      graph_traversal: { enabled: true, max_depth: 1 },
      chunk_text_search: { enabled: true, method: 'contains' },
      keyword_matching: { enabled: false },
      temporal_filtering: { enabled: false }
    },
    context: {
      expand_neighbors: { enabled: false },
      include_metadata: {
        section_heading: false,
        page_number: true,
        temporal_refs: false,
        key_terms: false
      }
    },
    scoring: { entity_confidence_min: 0.6, graph_match_weight: 1.0, text_match_weight: 1.0 },
    limits: { max_chunks: 5, max_entities: 10, max_context_tokens: 2000 }
  }
};

const research: PresetOverrides = {
  extraction: {
    name: 'research',
    description: 'Research optimized - key terms, citations, sections',
    chunking: { chunk_size: 1200, chunk_overlap: 200 },
    metadata: {
      section_headings: { enabled: true, patterns: RESEARCH_SECTION_PATTERNS },
      temporal_references: {
        enabled: true,
        extract_dates: true,
        extract_durations: false,
        extract_relative: false
      },
      key_terms: { enabled: true, max_terms: 15 },
      statistics: { word_count: true, char_count: false, sentence_count: true }
    },
    validation: { mode: 'warn', log_level: 'info' }
  },
  retrieval: {
    name: 'research',
    description: 'Research optimized - keyword focus, section context',
    search: {
      chunk_text_search: { enabled: true, method: 'contains' },
      keyword_matching: { enabled: true, match_threshold: 0.4 },
      temporal_filtering: { enabled: false }
    },
    context: {
      expand_neighbors: { enabled: true, before: 1, after: 1 },
      include_metadata: {
        section_heading: true,
        page_number: true,
        temporal_refs: false,
        key_terms: true
      }
    },
    scoring: { entity_confidence_min: 0.5, graph_match_weight: 1.2, text_match_weight: 1.5 },
    limits: { max_chunks: 12, max_entities: 25, max_context_tokens: 5000 }
  }
};

const strict: PresetOverrides = {
  extraction: {
    name: 'strict',
    description: 'Strict extraction - only validated entities stored',
    chunking: { chunk_size: 800, chunk_overlap: 200 },
    metadata: {
      temporal_references: { extract_relative: false },
      key_terms: { max_terms: 10 }
    },
    validation: {
      mode: 'strict',
      log_level: 'info',
      fail_on_missing_required: true,
      fail_on_broken_relationships: true
    }
  },
  retrieval: {
    name: 'strict',
    description: 'Strict retrieval - high confidence matches only',
    search: {
      keyword_matching: { enabled: true, match_threshold: 0.6 }
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
    scoring: { entity_confidence_min: 0.7, graph_match_weight: 1.5, text_match_weight: 1.0 },
    limits: { max_chunks: 10, max_entities: 20, max_context_tokens: 4000 }
  }
};

// ═══════════════════════════════════════════════════════════════════════════════
// Registry
// ═══════════════════════════════════════════════════════════════════════════════

function buildPreset(overrides: PresetOverrides): StrategyPreset {
  return deepFreeze({
    name: overrides.extraction.name,
    extraction: extractionStrategySchema.parse(deepMerge(DEFAULT_EXTRACTION, overrides.extraction)),
    retrieval: retrievalStrategySchema.parse(deepMerge(DEFAULT_RETRIEVAL, overrides.retrieval))
  });
}

/**
 * Built-in presets, in listing order. Parsed once at load time, so a typo
 * in a preset fails at startup rather than on first use.
 */
export const BUILTIN_PRESETS: readonly StrategyPreset[] = [
  minimal,
  balanced,
  comprehensive,
  speed,
  research,
  strict
].map(buildPreset);
