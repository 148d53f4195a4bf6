/**
 * Startup Display
 *
 * Initialization steps and the served endpoints.
 */

import type { Config } from '@/config/schema';
import { c, colors } from './colors';

export interface StartupInfo {
  neo4jUri: string;
  llm: {
    provider: string;
    model: string;
  };
  schema: {
    name: string;
    entityTypes: number;
    relationshipTypes: number;
  };
  /** Active preset, or null for the defaults */
  preset: string | null;
}

/** Divider line */
const DIVIDER = '━'.repeat(78);

/**
 * Log an initialization step with checkmark.
 */
function logStep(label: string, detail?: string): void {
  const check = c.brightGreen('✓');
  const labelText = c.white(label);
  const detailText = detail ? `${colors.dim}${detail}${colors.reset}` : '';

  // Align details to column 30
  const padding = Math.max(1, 26 - label.length);
  console.log(`  ${check} ${labelText}${' '.repeat(padding)}${detailText}`);
}

function displayEndpoint(method: string, path: string, description: string): void {
  const methodColor = method === 'GET' ? c.brightGreen : c.brightYellow;
  const methodText = methodColor(method.padEnd(6));
  const pathText = c.cyan(path.padEnd(28));
  console.log(`    • ${methodText} ${pathText} ${c.dim(description)}`);
}

export function displayStartup(config: Config, info: StartupInfo): void {
  console.log(`\n  ${c.dim('Initializing...')}\n`);

  logStep('Configuration loaded');
  logStep('Neo4j connected', info.neo4jUri);
  logStep('LLM client ready', `${info.llm.provider}/${info.llm.model}`);
  logStep(
    'Schema loaded',
    `${info.schema.name} (${info.schema.entityTypes} entity, ${info.schema.relationshipTypes} relationship types)`
  );
  logStep('Strategies ready', info.preset ?? 'defaults');

  console.log(`\n  ${c.dim(DIVIDER)}\n`);

  const url = `http://localhost:${config.server.port}`;
  console.log(`  ${c.white('Server ready on')} ${c.brightCyan(url)}\n`);

  console.log(`  ${c.white('Endpoints:')}`);
  displayEndpoint('POST', '/ingest', 'Store a chunked document and its entities');
  displayEndpoint('POST', '/query', 'Retrieve context for a question');
  displayEndpoint('GET', '/strategies', 'Active extraction and retrieval strategies');
  displayEndpoint('GET', '/graph/stats', 'Node and edge counts');
  displayEndpoint('GET', '/health', 'Health check');

  console.log(`\n  ${c.dim(DIVIDER)}\n`);
}

export function buildStartupInfo(
  config: Config,
  schema: { name: string; entity_types: string[]; relationship_types: string[] },
  preset: string | null
): StartupInfo {
  return {
    neo4jUri: config.neo4j.uri,
    llm: { provider: config.llm.provider, model: config.llm.model },
    schema: {
      name: schema.name,
      entityTypes: schema.entity_types.length,
      relationshipTypes: schema.relationship_types.length
    },
    preset
  };
}
