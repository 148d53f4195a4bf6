/**
 * Config Loader
 *
 * Loads config/chunkgraph.json with {env:VAR} resolution.
 * CHUNKGRAPH_CONFIG overrides the path.
 */

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { type Config, configSchema } from './schema';

const DEFAULT_CONFIG_PATH = 'config/chunkgraph.json';

/**
 * Resolve {env:VAR} patterns in text. Unset variables become empty strings.
 */
export function resolveEnvVars(text: string, env: NodeJS.ProcessEnv = process.env): string {
  return text.replace(/\{env:([A-Z_][A-Z0-9_]*)\}/g, (_, varName: string) => env[varName] ?? '');
}

export type ConfigParseResult =
  | { success: true; config: Config }
  | { success: false; errors: string[] };

/**
 * Parse config file text: env substitution, JSON, then schema.
 */
export function parseConfig(text: string, env: NodeJS.ProcessEnv = process.env): ConfigParseResult {
  let data: unknown;
  try {
    data = JSON.parse(resolveEnvVars(text, env));
  } catch (error) {
    return {
      success: false,
      errors: [`Invalid JSON: ${error instanceof Error ? error.message : String(error)}`]
    };
  }

  const result = configSchema.safeParse(data);
  if (!result.success) {
    return {
      success: false,
      errors: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    };
  }
  return { success: true, config: result.data };
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function loadConfig(configPath: string): Config {
  let text: string;
  try {
    text = readFileSync(configPath, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) {
      console.error(`Config file not found: ${configPath}`);
      console.error(
        'Copy config/chunkgraph.example.json to config/chunkgraph.json and configure it.'
      );
      process.exit(1);
    }
    throw error;
  }

  const result = parseConfig(text);
  if (!result.success) {
    console.error(`Invalid config (${configPath}):`);
    for (const line of result.errors) {
      console.error(`  ${line}`);
    }
    process.exit(1);
  }

  return result.config;
}

// Lazy load and cache
let cachedConfig: Config | null = null;

export function getConfig(): Config {
  if (!cachedConfig) {
    const configPath =
      process.env['CHUNKGRAPH_CONFIG'] ?? resolve(process.cwd(), DEFAULT_CONFIG_PATH);
    cachedConfig = loadConfig(configPath);
  }
  return cachedConfig;
}
