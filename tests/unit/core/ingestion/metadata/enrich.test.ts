import { describe, expect, test } from 'vitest';
import {
  computeStatistics,
  countSentences,
  countWords,
  detectSectionHeading,
  enrichChunk
} from '@/core/ingestion';
import {
  DEFAULT_EXTRACTION,
  DEFAULT_SECTION_PATTERNS,
  deepMerge,
  extractionStrategySchema
} from '@/core/strategies';

function extraction(patch: unknown) {
  return extractionStrategySchema.parse(deepMerge(DEFAULT_EXTRACTION, patch));
}

describe('detectSectionHeading', () => {
  test('returns the whole matching line', () => {
    expect(
      detectSectionHeading('Section 4 Payment Terms\nThe Buyer shall pay.', DEFAULT_SECTION_PATTERNS)
    ).toBe('Section 4 Payment Terms');
  });

  test('matches headings on later lines', () => {
    expect(
      detectSectionHeading('Preamble text\n2. Definitions apply here.', DEFAULT_SECTION_PATTERNS)
    ).toBe('2. Definitions apply here.');
  });

  test('uses custom patterns', () => {
    expect(detectSectionHeading('Part 3\nbody', ['^Part \\d+'])).toBe('Part 3');
  });

  test('returns null when nothing matches', () => {
    expect(detectSectionHeading('no heading here.', DEFAULT_SECTION_PATTERNS)).toBeNull();
  });
});

describe('statistics', () => {
  test('countWords ignores extra whitespace', () => {
    expect(countWords('  one two  three ')).toBe(3);
  });

  test('countSentences', () => {
    expect(countSentences('First. Second! Third?')).toBe(3);
    expect(countSentences('Version 1.5 is out.')).toBe(1);
    expect(countSentences('no terminator')).toBe(1);
    expect(countSentences('')).toBe(0);
  });

  test('computeStatistics includes enabled counts only', () => {
    expect(
      computeStatistics('Hello world.', { word_count: true, char_count: false, sentence_count: true })
    ).toEqual({ word_count: 2, sentence_count: 1 });
  });
});

describe('enrichChunk', () => {
  const chunk = { chunk_index: 0, text: 'Payment is due within 30 days.', page_number: 2 };

  test('computes every enabled field', () => {
    const metadata = enrichChunk(chunk, extraction({}), { previousHeading: 'Section 4 Payment' });

    expect(metadata).toEqual({
      page_number: 2,
      section_heading: 'Section 4 Payment',
      temporal_refs: ['within 30 days'],
      key_terms: ['Payment', 'due', 'within', 'days'],
      word_count: 6,
      char_count: 30
    });
  });

  test('leaves disabled fields out entirely', () => {
    const strategy = extraction({
      metadata: {
        page_numbers: { enabled: false },
        section_headings: { enabled: false },
        temporal_references: { enabled: false },
        key_terms: { enabled: false },
        statistics: { word_count: false, char_count: false, sentence_count: false }
      }
    });

    expect(enrichChunk(chunk, strategy, { previousHeading: 'Section 1' })).toEqual({});
  });

  test('caller-supplied metadata wins over extraction', () => {
    const metadata = enrichChunk(
      { ...chunk, section_heading: 'Fees', temporal_refs: ['net 30'], key_terms: ['fees'] },
      extraction({}),
      { previousHeading: null, keyTerms: ['ignored'] }
    );

    expect(metadata.section_heading).toBe('Fees');
    expect(metadata.temporal_refs).toEqual(['net 30']);
    expect(metadata.key_terms).toEqual(['fees']);
  });

  test('precomputed key terms replace local extraction', () => {
    const metadata = enrichChunk(chunk, extraction({}), {
      previousHeading: null,
      keyTerms: ['payment terms']
    });
    expect(metadata.key_terms).toEqual(['payment terms']);
  });

  test('a null heading is kept when nothing precedes the chunk', () => {
    const metadata = enrichChunk(chunk, extraction({}), { previousHeading: null });
    expect(metadata.section_heading).toBeNull();
  });
});
