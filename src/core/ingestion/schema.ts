/**
 * Schema Descriptor
 *
 * The entity and relationship vocabulary a deployment ingests against.
 * Consumed, never defined here: it is loaded from a JSON file.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { isSafeIdentifier } from '@/providers/graph';

export const schemaDescriptorSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  entity_types: z.array(z.string().min(1)).min(1),
  relationship_types: z.array(
    z.string().refine(isSafeIdentifier, {
      message: 'Relationship types must be identifiers (letters, digits, underscore)'
    })
  ),
  required_properties_per_type: z.record(z.string(), z.array(z.string())).default({})
});

export type SchemaDescriptor = z.output<typeof schemaDescriptorSchema>;

export class SchemaLoadError extends Error {
  constructor(
    public readonly path: string,
    message: string
  ) {
    super(`Failed to load schema from ${path}: ${message}`);
    this.name = 'SchemaLoadError';
  }
}

export function parseSchemaDescriptor(value: unknown): SchemaDescriptor {
  return schemaDescriptorSchema.parse(value);
}

export function loadSchemaDescriptor(path: string): SchemaDescriptor {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new SchemaLoadError(path, error instanceof Error ? error.message : String(error));
  }

  const result = schemaDescriptorSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new SchemaLoadError(path, details);
  }
  return result.data;
}
