/**
 * Graph Client Factory
 *
 * Builds the Neo4j client from the `neo4j` config section. `openGraphClient`
 * also connects and creates constraints and indexes.
 */

import type { Config } from '@/config/schema';
import { Neo4jGraphClient } from './neo4j';
import type { GraphClient } from './types';

export function createGraphClient(config: Config['neo4j']): GraphClient {
  return new Neo4jGraphClient({
    uri: config.uri,
    user: config.user,
    password: config.password,
    database: config.database,
    transactionTimeoutMs: config.transactionTimeoutMs
  });
}

export async function openGraphClient(config: Config['neo4j']): Promise<GraphClient> {
  const client = createGraphClient(config);
  await client.connect();
  await client.initializeSchema();
  return client;
}
