/**
 * Neo4j Operations Module
 *
 * Re-exports all operation functions for clean imports.
 */

// Edge operations
export { getProvenanceChunks, getRelationshipsAmong, traverseEntities } from './edges';

// Inspection operations
export { getEntity, getRelatedEntities, listDocuments, listEntities } from './inspect';

// Node operations
export {
  clearGraph,
  deleteDocument,
  getChunkChain,
  getChunksByIndex,
  getDocument,
  getStats
} from './nodes';

// Search operations
export {
  findEntities,
  getChunksWithTemporalRefs,
  searchChunksByKeyTerms,
  searchChunkText
} from './search';

// Transaction operations
export { createTransactionClient } from './transaction';
