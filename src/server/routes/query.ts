/**
 * Query Route
 *
 * Runs retrieval for a question. The request's abort signal cancels the
 * query when the client disconnects.
 */

import { Hono } from 'hono';
import { z } from 'zod';
import { queryIntentSchema, type RetrievalDependencies, retrieve } from '@/core/retrieval';
import { parseBody } from '../errors';

const queryBodySchema = z.object({
  question: z.string().trim().min(1),
  intent: queryIntentSchema.partial().optional(),
  /** Respond with the formatted context as plain text */
  format: z.boolean().default(false)
});

export interface QueryRouteOptions {
  searchTimeoutMs?: number;
}

export function createQueryRoutes(deps: RetrievalDependencies, options: QueryRouteOptions = {}): Hono {
  const app = new Hono();

  app.post('/', async (c) => {
    const body = await parseBody(c, queryBodySchema);
    const result = await retrieve({ question: body.question, intent: body.intent }, deps, {
      signal: c.req.raw.signal,
      searchTimeoutMs: options.searchTimeoutMs
    });
    return body.format ? c.text(result.context) : c.json(result);
  });

  return app;
}
