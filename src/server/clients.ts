/**
 * Shared Client Initialization
 *
 * Lazy initialization of the components every route shares.
 * The graph connection, LLM client, schema and strategy store are created
 * on first use from the loaded config.
 */

import { resolve } from 'node:path';
import { getConfig } from '@/config/config';
import { ChunkGraphBuilder, loadSchemaDescriptor, type SchemaDescriptor } from '@/core/ingestion';
import { StrategyStore } from '@/core/strategies';
import { type GraphClient, openGraphClient } from '@/providers/graph';
import { createLLMClient, type LLMClient } from '@/providers/llm';

export interface Clients {
  graphClient: GraphClient;
  llmClient: LLMClient;
  strategies: StrategyStore;
  schema: SchemaDescriptor;
  builder: ChunkGraphBuilder;
}

/** Cached clients instance */
let clients: Clients | null = null;
let initPromise: Promise<Clients> | null = null;

/**
 * Get initialized clients.
 * Concurrent first calls share one initialization.
 */
export async function getClients(): Promise<Clients> {
  if (clients) return clients;

  if (!initPromise) {
    initPromise = initializeClients().catch((error: unknown) => {
      initPromise = null;
      throw error;
    });
  }

  clients = await initPromise;
  return clients;
}

async function initializeClients(): Promise<Clients> {
  const config = getConfig();

  const schema = loadSchemaDescriptor(resolve(process.cwd(), config.schema.path));
  const strategies = new StrategyStore({ initialPreset: config.strategies.preset });
  const graphClient = await openGraphClient(config.neo4j);
  const llmClient = createLLMClient(config.llm);
  const builder = new ChunkGraphBuilder({ graphClient, strategies, schema, llmClient });

  return { graphClient, llmClient, strategies, schema, builder };
}

/**
 * Close the graph connection, if one was opened.
 */
export async function closeClients(): Promise<void> {
  const current = clients;
  clients = null;
  initPromise = null;
  await current?.graphClient.disconnect();
}
