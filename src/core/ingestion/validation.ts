/**
 * Schema Validation
 *
 * Checks extracted entities and relationships against the schema descriptor
 * and decides, per validation mode, what gets stored.
 */

import type { ExtractionStrategy, ValidationMode } from '@/core/strategies';
import { entityKey } from '@/providers/graph';
import { SchemaValidationError } from './errors';
import type { SchemaDescriptor } from './schema';
import type { EntityInput, RelationshipInput } from './types';

// ═══════════════════════════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════════════════════════

export type IssueSeverity = 'error' | 'warning';

export type IssueCode =
  | 'unknown_entity_type'
  | 'unknown_relationship_type'
  | 'missing_required_property'
  | 'dangling_relationship';

export interface IngestionIssue {
  severity: IssueSeverity;
  code: IssueCode;
  item: 'entity' | 'relationship';
  /** Position of the item in the submitted batch */
  index: number;
  message: string;
}

export interface ValidationBatch {
  entities: EntityInput[];
  relationships: RelationshipInput[];
}

export interface ValidationOptions {
  fail_on_missing_required: boolean;
  fail_on_broken_relationships: boolean;
}

export interface ValidatedBatch {
  entities: EntityInput[];
  relationships: RelationshipInput[];
  skipped_entities: number;
  skipped_relationships: number;
  /** Every issue found, including those on stored items */
  issues: IngestionIssue[];
}

// ═══════════════════════════════════════════════════════════════════════════════
// Checks
// ═══════════════════════════════════════════════════════════════════════════════

function isMissing(value: unknown): boolean {
  return value === undefined || value === null || value === '';
}

/**
 * Find every issue in a batch. Pure: nothing is dropped here.
 *
 * @param existingKeys - Entity keys already in the graph; relationship
 *   endpoints may point at these as well as at entities in the batch
 */
export function validateBatch(
  batch: ValidationBatch,
  schema: SchemaDescriptor,
  options: ValidationOptions,
  existingKeys: ReadonlySet<string> = new Set()
): IngestionIssue[] {
  const issues: IngestionIssue[] = [];
  const entityTypes = new Set(schema.entity_types);
  const relationshipTypes = new Set(schema.relationship_types);
  const batchKeys = new Set(batch.entities.map(entityKey));

  batch.entities.forEach((entity, index) => {
    const key = entityKey(entity);
    if (!entityTypes.has(entity.type)) {
      issues.push({
        severity: 'error',
        code: 'unknown_entity_type',
        item: 'entity',
        index,
        message: `Entity ${key}: unknown type '${entity.type}'`
      });
    }

    const required = Object.hasOwn(schema.required_properties_per_type, entity.type)
      ? schema.required_properties_per_type[entity.type]
      : undefined;
    for (const property of required ?? []) {
      if (isMissing(entity.properties[property])) {
        issues.push({
          severity: options.fail_on_missing_required ? 'error' : 'warning',
          code: 'missing_required_property',
          item: 'entity',
          index,
          message: `Entity ${key}: missing required property '${property}'`
        });
      }
    }
  });

  batch.relationships.forEach((rel, index) => {
    const label = `${entityKey(rel.source)} -[${rel.type}]-> ${entityKey(rel.target)}`;
    if (!relationshipTypes.has(rel.type)) {
      issues.push({
        severity: 'error',
        code: 'unknown_relationship_type',
        item: 'relationship',
        index,
        message: `Relationship ${label}: unknown type '${rel.type}'`
      });
    }

    for (const endpoint of [rel.source, rel.target]) {
      const key = entityKey(endpoint);
      if (!batchKeys.has(key) && !existingKeys.has(key)) {
        issues.push({
          severity: options.fail_on_broken_relationships ? 'error' : 'warning',
          code: 'dangling_relationship',
          item: 'relationship',
          index,
          message: `Relationship ${label}: endpoint ${key} does not exist`
        });
      }
    }
  });

  return issues;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Mode Application
// ═══════════════════════════════════════════════════════════════════════════════

function erroredIndices(issues: IngestionIssue[], item: IngestionIssue['item']): Set<number> {
  return new Set(
    issues.filter((i) => i.item === item && i.severity === 'error').map((i) => i.index)
  );
}

/**
 * Decide what to store.
 *
 * - ignore / warn: all entities; relationships whose endpoints exist
 * - store_valid: items without errors; then relationships whose endpoints survived
 * - strict: everything, or SchemaValidationError on the first error
 *
 * A relationship with a missing endpoint is never stored, whatever the mode.
 */
export function applyValidationMode(
  batch: ValidationBatch,
  issues: IngestionIssue[],
  mode: ValidationMode,
  existingKeys: ReadonlySet<string> = new Set()
): ValidatedBatch {
  const errors = issues.filter((i) => i.severity === 'error');
  if (mode === 'strict' && errors.length > 0) {
    throw new SchemaValidationError(errors);
  }

  const dropInvalid = mode === 'store_valid';
  const badEntities = dropInvalid ? erroredIndices(issues, 'entity') : new Set<number>();
  const badRelationships = dropInvalid ? erroredIndices(issues, 'relationship') : new Set<number>();

  const entities = batch.entities.filter((_, i) => !badEntities.has(i));
  const available = new Set([...existingKeys, ...entities.map(entityKey)]);
  const relationships = batch.relationships.filter(
    (rel, i) =>
      !badRelationships.has(i) &&
      available.has(entityKey(rel.source)) &&
      available.has(entityKey(rel.target))
  );

  return {
    entities,
    relationships,
    skipped_entities: batch.entities.length - entities.length,
    skipped_relationships: batch.relationships.length - relationships.length,
    issues
  };
}

export function validationOptions(strategy: ExtractionStrategy): ValidationOptions {
  return {
    fail_on_missing_required: strategy.validation.fail_on_missing_required,
    fail_on_broken_relationships: strategy.validation.fail_on_broken_relationships
  };
}
