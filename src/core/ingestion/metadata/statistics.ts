export interface StatisticsOptions {
  word_count: boolean;
  char_count: boolean;
  sentence_count: boolean;
}

export interface ChunkStatistics {
  word_count?: number;
  char_count?: number;
  sentence_count?: number;
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

/**
 * Sentence terminators followed by whitespace or end of text. Non-empty text
 * without one counts as a single sentence.
 */
export function countSentences(text: string): number {
  if (!text.trim()) return 0;
  const terminators = text.match(/[.!?]+(?=\s|$)/g)?.length ?? 0;
  return Math.max(terminators, 1);
}

export function computeStatistics(text: string, options: StatisticsOptions): ChunkStatistics {
  const stats: ChunkStatistics = {};
  if (options.word_count) stats.word_count = countWords(text);
  if (options.char_count) stats.char_count = text.length;
  if (options.sentence_count) stats.sentence_count = countSentences(text);
  return stats;
}
