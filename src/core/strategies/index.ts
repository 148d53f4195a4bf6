/**
 * Strategies Module
 *
 * Runtime-tunable extraction and retrieval behavior.
 */

export { DEFAULT_EXTRACTION, DEFAULT_RETRIEVAL, DEFAULT_SECTION_PATTERNS } from './defaults';
export type { ValidationIssue } from './errors';
export { StrategyValidationError, UnknownPresetError } from './errors';
export { deepFreeze, deepMerge, isPlainObject } from './merge';
export { BUILTIN_PRESETS } from './presets';
export { extractionStrategySchema, retrievalStrategySchema } from './schemas';
export type { StrategyStoreOptions } from './store';
export { StrategyStore } from './store';
export type {
  ChunkTextMethod,
  DeepPartial,
  ExtractionStrategy,
  KeyTermMethod,
  PresetSummary,
  RetrievalStrategy,
  StrategyKind,
  StrategyPreset,
  StrategySnapshot,
  StrategyTrees,
  ValidationMode
} from './types';
