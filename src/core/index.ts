/**
 * Core Engine
 *
 * Public API barrel file. Re-exports strategies, ingestion and retrieval.
 *
 * @example
 * ```typescript
 * import { ChunkGraphBuilder, retrieve, StrategyStore } from '@/core';
 * import type { IngestionResult, RetrievalResult } from '@/core';
 * ```
 */

// ═══════════════════════════════════════════════════════════════════════════════
// Strategies
// ═══════════════════════════════════════════════════════════════════════════════

export {
  BUILTIN_PRESETS,
  StrategyStore,
  StrategyValidationError,
  UnknownPresetError
} from './strategies';

export type {
  ExtractionStrategy,
  PresetSummary,
  RetrievalStrategy,
  StrategyKind,
  StrategySnapshot
} from './strategies';

// ═══════════════════════════════════════════════════════════════════════════════
// Ingestion
// ═══════════════════════════════════════════════════════════════════════════════

export {
  ChunkGraphBuilder,
  IngestRequestError,
  loadSchemaDescriptor,
  PartialChainError,
  SchemaValidationError
} from './ingestion';

export type {
  ChunkGraphBuilderDependencies,
  IngestionIssue,
  IngestionResult,
  IngestRequestInput,
  SchemaDescriptor
} from './ingestion';

// ═══════════════════════════════════════════════════════════════════════════════
// Retrieval
// ═══════════════════════════════════════════════════════════════════════════════

export { formatContext, retrieve } from './retrieval';

export type {
  QueryIntent,
  RetrievalDependencies,
  RetrievalInput,
  RetrievalOptions,
  RetrievalResult,
  SignalSearchFailure
} from './retrieval';
