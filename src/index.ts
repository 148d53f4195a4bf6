/**
 * Server Entry Point
 *
 * Loads config, connects to Neo4j and serves the HTTP API.
 */

import { serve } from '@hono/node-server';
import { getConfig } from '@/config/config';
import { closeClients, getClients } from '@/server/clients';
import { createApp } from '@/server/index';
import { buildStartupInfo, displayStartup } from '@/utils';

async function main(): Promise<void> {
  const config = getConfig();
  const { graphClient, llmClient, strategies, schema, builder } = await getClients();

  const app = createApp({
    graphClient,
    llmClient,
    strategies,
    schema,
    builder,
    searchTimeoutMs: config.retrieval.searchTimeoutMs
  });

  displayStartup(config, buildStartupInfo(config, schema, strategies.get().active_preset));

  const server = serve({ fetch: app.fetch, port: config.server.port });

  const shutdown = () => {
    server.close();
    closeClients().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error('Shutdown failed:', error);
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
  console.error('Startup failed:', error);
  process.exit(1);
});
