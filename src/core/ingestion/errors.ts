import type { z } from 'zod';
import type { IngestionIssue } from './validation';

/**
 * Raised in strict mode when a batch has at least one error-level issue.
 * Nothing from the batch is written.
 */
export class SchemaValidationError extends Error {
  constructor(public readonly issues: IngestionIssue[]) {
    super(
      `Schema validation failed with ${issues.length} issue(s): ${issues
        .slice(0, 3)
        .map((i) => i.message)
        .join('; ')}`
    );
    this.name = 'SchemaValidationError';
  }
}

/**
 * The NEXT_CHUNK/PREV_CHUNK chain did not come out whole. Thrown inside the
 * write transaction, so the document rolls back.
 */
export class PartialChainError extends Error {
  constructor(
    public readonly documentId: string,
    public readonly expected: number,
    public readonly linked: number
  ) {
    super(
      `Chunk chain for document '${documentId}' is incomplete: linked ${linked} of ${expected} pairs`
    );
    this.name = 'PartialChainError';
  }
}

/**
 * The ingest payload itself is malformed (as opposed to schema issues in
 * the extracted entities).
 */
export class IngestRequestError extends Error {
  constructor(public readonly issues: { path: string; message: string }[]) {
    super(`Invalid ingest request: ${issues.map((i) => `${i.path || '(root)'}: ${i.message}`).join('; ')}`);
    this.name = 'IngestRequestError';
  }

  static fromZod(error: z.ZodError): IngestRequestError {
    return new IngestRequestError(
      error.issues.map((issue) => ({ path: issue.path.map(String).join('.'), message: issue.message }))
    );
  }
}
