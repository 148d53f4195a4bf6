/**
 * Chunk Metadata Enrichment
 *
 * Turns a chunk from the chunker into the field set the extraction strategy
 * asks for. Disabled fields are left out entirely.
 */

import type { ExtractionStrategy } from '@/core/strategies';
import type { ChunkNode } from '@/providers/graph';
import type { ChunkInput } from '../types';
import { detectSectionHeading } from './sections';
import { computeStatistics } from './statistics';
import { extractKeyTerms } from './terms';
import { extractTemporalRefs } from './temporal';

export type ChunkMetadata = Omit<ChunkNode, 'id' | 'document_id' | 'chunk_index' | 'text'>;

export interface EnrichContext {
  /** Heading of the previous chunk; inherited when this chunk has none */
  previousHeading: string | null;
  /** Terms computed ahead of time (tfidf, llm); used instead of local extraction */
  keyTerms?: string[];
}

export function enrichChunk(
  chunk: ChunkInput,
  strategy: ExtractionStrategy,
  context: EnrichContext
): ChunkMetadata {
  const { metadata } = strategy;
  const enriched: ChunkMetadata = {};

  if (metadata.page_numbers.enabled && chunk.page_number !== undefined) {
    enriched.page_number = chunk.page_number;
  }

  if (metadata.section_headings.enabled) {
    enriched.section_heading =
      chunk.section_heading !== undefined
        ? chunk.section_heading
        : (detectSectionHeading(chunk.text, metadata.section_headings.patterns) ??
          context.previousHeading);
  }

  if (metadata.temporal_references.enabled) {
    const temporal = metadata.temporal_references;
    enriched.temporal_refs =
      chunk.temporal_refs ??
      extractTemporalRefs(chunk.text, {
        dates: temporal.extract_dates,
        durations: temporal.extract_durations,
        relative: temporal.extract_relative
      });
  }

  if (metadata.key_terms.enabled) {
    const { method, max_terms } = metadata.key_terms;
    enriched.key_terms =
      chunk.key_terms ??
      context.keyTerms ??
      extractKeyTerms(chunk.text, max_terms, method === 'regex' ? 'regex' : 'simple');
  }

  return { ...enriched, ...computeStatistics(chunk.text, metadata.statistics) };
}

export { detectSectionHeading } from './sections';
export type { ChunkStatistics, StatisticsOptions } from './statistics';
export { computeStatistics, countSentences, countWords } from './statistics';
export type { LocalKeyTermMethod } from './terms';
export {
  extractDefinedTerms,
  extractFrequentTerms,
  extractKeyTerms,
  extractKeyTermsTfidf,
  STOPWORDS
} from './terms';
export type { DateRange, TemporalKind, TemporalMatch, TemporalOptions } from './temporal';
export {
  extractTemporalRefs,
  findTemporalReferences,
  normalizeDate,
  normalizeDuration,
  parseDateRanges,
  rangesOverlap
} from './temporal';
