/**
 * Neo4j Graph Client
 *
 * Thin orchestrator that implements the GraphClient interface
 * by delegating to specialized operation modules.
 */

import neo4j, { type Driver, Neo4jError } from 'neo4j-driver';
import type {
  ChunkNode,
  ChunkTextMethod,
  DocumentDeletion,
  DocumentNode,
  DocumentSummary,
  EntityNode,
  EntityQuery,
  GraphClient,
  GraphStats,
  ProvenanceHit,
  RelatedEntity,
  RelationshipRecord,
  SearchResult,
  TransactionClient,
  TraversalHit
} from '../types';
import { GraphClientError } from '../types';
import { classifyNeo4jError, withRetry } from './errors';
import {
  clearGraph,
  createTransactionClient,
  deleteDocument,
  findEntities,
  getChunkChain,
  getChunksByIndex,
  getChunksWithTemporalRefs,
  getDocument,
  getEntity,
  getProvenanceChunks,
  getRelatedEntities,
  getRelationshipsAmong,
  getStats,
  listDocuments,
  listEntities,
  searchChunksByKeyTerms,
  searchChunkText,
  traverseEntities
} from './operations';
import { initializeSchema } from './schema';

// ============================================================
// CONFIGURATION
// ============================================================

/**
 * Configuration for Neo4j connection.
 */
export interface Neo4jConfig {
  uri: string;
  user: string;
  password: string;
  database: string;
  /** Upper bound for one ingestion transaction */
  transactionTimeoutMs?: number;
}

// ============================================================
// CLIENT IMPLEMENTATION
// ============================================================

/**
 * Neo4j implementation of the GraphClient interface.
 *
 * Manages the driver lifecycle and hands the driver and database
 * to each operation module.
 */
export class Neo4jGraphClient implements GraphClient {
  private _driver: Driver | null = null;
  private readonly config: Neo4jConfig;

  constructor(config: Neo4jConfig) {
    this.config = config;
  }

  /**
   * Get the Neo4j driver instance.
   * Throws if not connected.
   */
  get driver(): Driver {
    if (!this._driver) {
      throw new GraphClientError('Not connected to Neo4j', 'CONNECTION_ERROR');
    }
    return this._driver;
  }

  get database(): string {
    return this.config.database;
  }

  // ============================================================
  // CONNECTION MANAGEMENT
  // ============================================================

  async connect(): Promise<void> {
    this._driver = neo4j.driver(
      this.config.uri,
      neo4j.auth.basic(this.config.user, this.config.password)
    );

    try {
      await this.driver.verifyConnectivity();
    } catch (error) {
      throw new GraphClientError(
        `Failed to connect to Neo4j at ${this.config.uri}: ${error instanceof Error ? error.message : String(error)}`,
        'CONNECTION_ERROR',
        error instanceof Error ? error : undefined
      );
    }
  }

  async disconnect(): Promise<void> {
    if (this._driver) {
      await this._driver.close();
      this._driver = null;
    }
  }

  async healthCheck(): Promise<boolean> {
    if (!this._driver) {
      return false;
    }
    try {
      await this._driver.verifyConnectivity();
      return true;
    } catch {
      return false;
    }
  }

  // ============================================================
  // SCHEMA MANAGEMENT
  // ============================================================

  async initializeSchema(): Promise<void> {
    await withRetry(async () => {
      const session = this.driver.session({ database: this.config.database });
      try {
        await initializeSchema(session);
      } finally {
        await session.close();
      }
    }, 'initializeSchema');
  }

  // ============================================================
  // READS
  // ============================================================

  async getDocument(id: string): Promise<DocumentNode | null> {
    return getDocument(this.driver, this.config.database, id);
  }

  async findEntities(query: EntityQuery, signal?: AbortSignal): Promise<EntityNode[]> {
    return findEntities(this.driver, this.config.database, query, signal);
  }

  async traverseEntities(
    seedKeys: string[],
    maxDepth: number,
    limit: number,
    signal?: AbortSignal
  ): Promise<TraversalHit[]> {
    return traverseEntities(this.driver, this.config.database, seedKeys, maxDepth, limit, signal);
  }

  async getProvenanceChunks(entityKeys: string[], signal?: AbortSignal): Promise<ProvenanceHit[]> {
    return getProvenanceChunks(this.driver, this.config.database, entityKeys, signal);
  }

  async getRelationshipsAmong(
    entityKeys: string[],
    signal?: AbortSignal
  ): Promise<RelationshipRecord[]> {
    return getRelationshipsAmong(this.driver, this.config.database, entityKeys, signal);
  }

  async searchChunkText(
    method: ChunkTextMethod,
    text: string,
    limit: number,
    signal?: AbortSignal
  ): Promise<SearchResult<ChunkNode>[]> {
    return searchChunkText(this.driver, this.config.database, method, text, limit, signal);
  }

  async searchChunksByKeyTerms(
    terms: string[],
    limit: number,
    signal?: AbortSignal
  ): Promise<ChunkNode[]> {
    return searchChunksByKeyTerms(this.driver, this.config.database, terms, limit, signal);
  }

  async getChunksWithTemporalRefs(
    tokens: string[],
    limit: number,
    signal?: AbortSignal
  ): Promise<ChunkNode[]> {
    return getChunksWithTemporalRefs(this.driver, this.config.database, tokens, limit, signal);
  }

  async getChunksByIndex(
    documentId: string,
    indices: number[],
    signal?: AbortSignal
  ): Promise<ChunkNode[]> {
    return getChunksByIndex(this.driver, this.config.database, documentId, indices, signal);
  }

  async getChunkChain(documentId: string): Promise<ChunkNode[]> {
    return getChunkChain(this.driver, this.config.database, documentId);
  }

  async getStats(): Promise<GraphStats> {
    return getStats(this.driver, this.config.database);
  }

  // ============================================================
  // INSPECTION
  // ============================================================

  async listDocuments(): Promise<DocumentSummary[]> {
    return listDocuments(this.driver, this.config.database);
  }

  async listEntities(type: string, limit: number): Promise<EntityNode[]> {
    return listEntities(this.driver, this.config.database, type, limit);
  }

  async getEntity(key: string): Promise<EntityNode | null> {
    return getEntity(this.driver, this.config.database, key);
  }

  async getRelatedEntities(key: string): Promise<RelatedEntity[]> {
    return getRelatedEntities(this.driver, this.config.database, key);
  }

  // ============================================================
  // DELETION
  // ============================================================

  async deleteDocument(documentId: string): Promise<DocumentDeletion> {
    return deleteDocument(this.driver, this.config.database, documentId);
  }

  async clearGraph(): Promise<void> {
    return clearGraph(this.driver, this.config.database);
  }

  // ============================================================
  // TRANSACTION SUPPORT
  // ============================================================

  async executeTransaction<T>(fn: (tx: TransactionClient) => Promise<T>): Promise<T> {
    const session = this.driver.session({ database: this.config.database });
    const txConfig =
      this.config.transactionTimeoutMs !== undefined
        ? { timeout: this.config.transactionTimeoutMs }
        : undefined;

    try {
      return await session.executeWrite(async (managedTx) => {
        const txClient = createTransactionClient(managedTx);
        return fn(txClient);
      }, txConfig);
    } catch (error) {
      if (error instanceof GraphClientError) throw error;
      // Domain errors raised inside the callback roll back and surface unchanged
      if (error instanceof Error && !(error instanceof Neo4jError)) throw error;
      throw new GraphClientError(
        `Transaction failed: ${error instanceof Error ? error.message : String(error)}`,
        classifyNeo4jError(error),
        error instanceof Error ? error : undefined
      );
    } finally {
      await session.close();
    }
  }
}
