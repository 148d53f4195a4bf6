/**
 * Server Module
 *
 * Creates and configures the Hono application.
 * Composition root that wires the engine's components to their routes.
 */

import { Hono } from 'hono';
import type { ChunkGraphBuilder, SchemaDescriptor } from '@/core/ingestion';
import type { StrategyStore } from '@/core/strategies';
import type { GraphClient } from '@/providers/graph';
import type { LLMClient } from '@/providers/llm';
import { handleError } from './errors';
import { createGraphRoutes } from './routes/graph';
import { createIngestRoutes } from './routes/ingest';
import { createQueryRoutes } from './routes/query';
import { createStrategyRoutes } from './routes/strategies';

export interface AppDependencies {
  graphClient: GraphClient;
  strategies: StrategyStore;
  builder: ChunkGraphBuilder;
  llmClient?: LLMClient;
  schema?: SchemaDescriptor;
  /** Per-searcher timeout for /query */
  searchTimeoutMs?: number;
}

/**
 * Routes:
 * - GET  /health
 * - /strategies (read, presets, preset load, update, replace, reset)
 * - POST /ingest
 * - POST /query
 * - /graph (stats, documents, entities, schema, deletion)
 */
export function createApp(deps: AppDependencies): Hono {
  const app = new Hono();

  app.get('/health', async (c) => {
    const graph = await deps.graphClient.healthCheck();
    return c.json({ status: graph ? 'ok' : 'degraded', graph }, graph ? 200 : 503);
  });

  app.route('/strategies', createStrategyRoutes(deps.strategies));
  app.route('/ingest', createIngestRoutes(deps.builder));
  app.route(
    '/query',
    createQueryRoutes(
      {
        graphClient: deps.graphClient,
        strategies: deps.strategies,
        llmClient: deps.llmClient,
        schema: deps.schema
      },
      { searchTimeoutMs: deps.searchTimeoutMs }
    )
  );
  app.route('/graph', createGraphRoutes(deps.graphClient, deps.schema));

  app.onError(handleError);
  return app;
}

export { describeError, InvalidBodyError } from './errors';
