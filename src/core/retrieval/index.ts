/**
 * Retrieval Module
 *
 * Strategy-driven multi-signal retrieval:
 * intent → searchers → merge → expand → limits → format
 */

// Configuration
export type { RetrievalConfig } from './config';
export { createConfig, defaults } from './config';

// Stages (for advanced usage / testing)
export { expandContext, neighbourWindow } from './expand';
export type { FanoutResult } from './fanout';
export { runSearchers, SearchTimeoutError } from './fanout';
export type { FormatInput, IncludeMetadata } from './format';
export { entityLabel, formatContext } from './format';
export type { AnalyzeOptions } from './intent';
export { analyzeQuery, fallbackIntent } from './intent';
export type { LimitResult } from './limits';
export { enforceLimits, estimateTokens } from './limits';
export { combinedScore, compareRanked, latestYear, mergeResults, signalWeights } from './merge';

// Searchers
export * from './searchers';

// Pipeline (main entry point)
export type { RetrievalDependencies, RetrievalInput, RetrievalOptions } from './pipeline';
export { retrieve } from './pipeline';

// Types
export type {
  BudgetExceededWarning,
  Candidate,
  DroppedCounts,
  LimitStage,
  QueryIntent,
  QueryIntentInput,
  RankedChunk,
  RankedEntity,
  RankedSet,
  RetrievalResult,
  RetrievedChunk,
  RetrievedEntity,
  SearchContext,
  SearchOutcome,
  SignalName,
  SignalOutcome,
  SignalScores,
  SignalSearcher,
  SignalSearchFailure
} from './types';
export { queryIntentSchema, SIGNAL_PRIORITY } from './types';
