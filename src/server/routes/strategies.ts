/**
 * Strategy Routes
 *
 * Administration of the active extraction/retrieval pair. Every write
 * responds with the full resulting pair, never just the change.
 */

import { Hono } from 'hono';
import { z } from 'zod';
import type { StrategyKind, StrategySnapshot, StrategyStore } from '@/core/strategies';
import { logStrategyChange } from '@/utils/logger';
import { parseBody } from '../errors';

const presetBodySchema = z.object({ name: z.string().min(1) });

const treeBodySchema = z.record(z.string(), z.unknown());

function pair(snapshot: StrategySnapshot) {
  return {
    extraction: snapshot.extraction,
    retrieval: snapshot.retrieval,
    active_preset: snapshot.active_preset,
    revision: snapshot.revision
  };
}

export function createStrategyRoutes(store: StrategyStore): Hono {
  const app = new Hono();

  app.get('/', (c) => c.json(pair(store.get())));

  app.get('/presets', (c) => c.json({ presets: store.presets() }));

  app.post('/preset', async (c) => {
    const { name } = await parseBody(c, presetBodySchema);
    const snapshot = store.loadPreset(name);
    logStrategyChange(`Loaded preset '${name}'`, snapshot);
    return c.json(pair(snapshot));
  });

  app.post('/reset', (c) => {
    const snapshot = store.reset();
    logStrategyChange('Reset to defaults', snapshot);
    return c.json(pair(snapshot));
  });

  for (const kind of ['extraction', 'retrieval'] as const satisfies readonly StrategyKind[]) {
    app.get(`/${kind}`, (c) => c.json(store.get()[kind]));

    app.patch(`/${kind}`, async (c) => {
      const patch = await parseBody(c, treeBodySchema);
      const snapshot = store.update(kind, patch);
      logStrategyChange(`Updated ${kind}`, snapshot);
      return c.json(pair(snapshot));
    });

    app.put(`/${kind}`, async (c) => {
      const tree = await parseBody(c, treeBodySchema);
      const snapshot = store.replace(kind, tree);
      logStrategyChange(`Replaced ${kind}`, snapshot);
      return c.json(pair(snapshot));
    });
  }

  return app;
}
