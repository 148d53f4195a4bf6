/**
 * Graph Routes
 *
 * Counts, read-only browsing of documents, entities and the loaded
 * schema, and bulk deletion scoped to one document or the whole graph.
 */

import { Hono } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { z } from 'zod';
import type { SchemaDescriptor } from '@/core/ingestion';
import { entityKey, type GraphClient } from '@/providers/graph';
import { parseQuery } from '../errors';

const listQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(100)
});

export function createGraphRoutes(graphClient: GraphClient, schema?: SchemaDescriptor): Hono {
  const app = new Hono();

  const requireSchema = (): SchemaDescriptor => {
    if (!schema) throw new HTTPException(404, { message: 'No schema loaded' });
    return schema;
  };

  app.get('/stats', async (c) => c.json(await graphClient.getStats()));

  // ============================================================
  // DOCUMENTS
  // ============================================================

  app.get('/documents', async (c) => {
    const documents = await graphClient.listDocuments();
    return c.json({ total: documents.length, documents });
  });

  app.get('/documents/:id/chunks', async (c) => {
    const id = c.req.param('id');
    const document = await graphClient.getDocument(id);
    if (!document) {
      throw new HTTPException(404, { message: `Document '${id}' not found` });
    }
    const chunks = await graphClient.getChunkChain(id);
    return c.json({ document, chunks });
  });

  // ============================================================
  // ENTITIES
  // ============================================================

  app.get('/entities/:type', async (c) => {
    const type = c.req.param('type');
    const { limit } = parseQuery(c, listQuerySchema);
    const entities = await graphClient.listEntities(type, limit);
    return c.json({ entity_type: type, total: entities.length, entities });
  });

  app.get('/entities/:type/:id', async (c) => {
    const { type, id } = c.req.param();
    const entity = await graphClient.getEntity(entityKey({ type, id }));
    if (!entity) {
      throw new HTTPException(404, { message: `${type} '${id}' not found` });
    }
    return c.json(entity);
  });

  app.get('/entities/:type/:id/related', async (c) => {
    const { type, id } = c.req.param();
    const key = entityKey({ type, id });
    const entity = await graphClient.getEntity(key);
    if (!entity) {
      throw new HTTPException(404, { message: `${type} '${id}' not found` });
    }
    const related = await graphClient.getRelatedEntities(key);
    return c.json({ entity, related });
  });

  // ============================================================
  // SCHEMA
  // ============================================================

  app.get('/schema', async (c) => {
    const descriptor = requireSchema();
    const stats = await graphClient.getStats();
    return c.json({
      name: descriptor.name,
      description: descriptor.description ?? null,
      entity_types: descriptor.entity_types,
      relationship_types: descriptor.relationship_types,
      stored_entity_types: Object.keys(stats.entity_types).sort(),
      stored_relationship_types: Object.keys(stats.relationship_types).sort()
    });
  });

  app.get('/schema/entities', (c) => {
    const descriptor = requireSchema();
    const required = new Map(Object.entries(descriptor.required_properties_per_type));
    return c.json({
      schema_name: descriptor.name,
      entities: descriptor.entity_types.map((name) => ({
        name,
        required_properties: required.get(name) ?? []
      }))
    });
  });

  app.get('/schema/relationships', (c) => {
    const descriptor = requireSchema();
    return c.json({
      schema_name: descriptor.name,
      relationships: descriptor.relationship_types.map((name) => ({ name }))
    });
  });

  // ============================================================
  // DELETION
  // ============================================================

  app.delete('/documents/:id', async (c) => {
    const id = c.req.param('id');
    const deletion = await graphClient.deleteDocument(id);
    if (!deletion.deleted) {
      throw new HTTPException(404, { message: `Document '${id}' not found` });
    }
    return c.json({ document_id: id, ...deletion });
  });

  app.delete('/', async (c) => {
    await graphClient.clearGraph();
    return c.json({ cleared: true });
  });

  return app;
}
