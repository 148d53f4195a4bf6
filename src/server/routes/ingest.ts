/**
 * Ingest Route
 *
 * The body goes to the builder unparsed; it owns the request schema.
 */

import { Hono } from 'hono';
import type { ChunkGraphBuilder } from '@/core/ingestion';

export function createIngestRoutes(builder: ChunkGraphBuilder): Hono {
  const app = new Hono();

  app.post('/', async (c) => {
    const body = await c.req.json<unknown>();
    const result = await builder.ingest(body);
    return c.json(result, 201);
  });

  return app;
}
