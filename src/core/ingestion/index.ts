/**
 * Ingestion Module
 *
 * Document, chunk and entity writes, gated by the extraction strategy.
 */

export type { ChunkGraphBuilderDependencies } from './builder';
export { ChunkGraphBuilder, KEY_TERM_BATCH_SIZE } from './builder';
export { IngestRequestError, PartialChainError, SchemaValidationError } from './errors';
export { KeyedLock } from './locks';
export * from './metadata';
export type { SchemaDescriptor } from './schema';
export {
  loadSchemaDescriptor,
  parseSchemaDescriptor,
  SchemaLoadError,
  schemaDescriptorSchema
} from './schema';
export type {
  ChunkInput,
  EntityInput,
  IngestionResult,
  IngestRequest,
  IngestRequestInput,
  RelationshipInput
} from './types';
export { ingestRequestSchema } from './types';
export type {
  IngestionIssue,
  IssueCode,
  IssueSeverity,
  ValidatedBatch,
  ValidationBatch,
  ValidationOptions
} from './validation';
export { applyValidationMode, validateBatch, validationOptions } from './validation';
