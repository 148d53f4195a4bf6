/**
 * Neo4j Schema Management
 *
 * Creates constraints and indexes. Idempotent: safe to run on every start.
 */

import type { Session } from 'neo4j-driver';
import { isSchemaAlreadyExistsError } from './errors';
import { CONSTRAINTS, FULLTEXT_INDEXES, RANGE_INDEXES } from './queries';

// ============================================================
// SCHEMA INITIALIZATION
// ============================================================

/**
 * Initialize all database schema elements.
 *
 * Constraints go first since they create implicit indexes, then range
 * indexes for positional lookups, then the chunk fulltext index.
 */
export async function initializeSchema(session: Session): Promise<void> {
  await runSchemaOperation(session, CONSTRAINTS.DOCUMENT_ID);
  await runSchemaOperation(session, CONSTRAINTS.CHUNK_ID);
  await runSchemaOperation(session, CONSTRAINTS.ENTITY_UID);

  await runSchemaOperation(session, RANGE_INDEXES.CHUNK_POSITION);
  await runSchemaOperation(session, RANGE_INDEXES.ENTITY_TYPE);

  await runSchemaOperation(session, FULLTEXT_INDEXES.CHUNK);
}

/**
 * Run a single schema operation. Another instance may have created the
 * element between our check and our write; that counts as success.
 */
async function runSchemaOperation(session: Session, cypher: string): Promise<void> {
  try {
    await session.run(cypher);
  } catch (error) {
    if (isSchemaAlreadyExistsError(error)) {
      return;
    }
    throw error;
  }
}
