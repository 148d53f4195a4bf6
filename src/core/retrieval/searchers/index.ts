import type { SignalSearcher } from '../types';
import { graphTraversalSearch } from './graph';
import { keywordMatchSearch } from './keyword';
import { temporalFilterSearch } from './temporal';
import { chunkTextSearch } from './text';

/**
 * Registered searchers, in signal priority order.
 */
export const DEFAULT_SEARCHERS: readonly SignalSearcher[] = [
  graphTraversalSearch,
  chunkTextSearch,
  keywordMatchSearch,
  temporalFilterSearch
];

export { graphTraversalSearch } from './graph';
export { keywordMatchSearch, keywordOverlap } from './keyword';
export type { TemporalQuery } from './temporal';
export {
  matchesTemporalQuery,
  parseTemporalQuery,
  prefilterTokens,
  temporalFilterSearch
} from './temporal';
export { chunkTextSearch } from './text';
