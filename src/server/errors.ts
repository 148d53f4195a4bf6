/**
 * HTTP Error Mapping
 *
 * Domain errors become JSON responses with a stable `error` code.
 */

import type { Context } from 'hono';
import { HTTPException } from 'hono/http-exception';
import type { z } from 'zod';
import {
  IngestRequestError,
  PartialChainError,
  SchemaValidationError
} from '@/core/ingestion';
import { StrategyValidationError, UnknownPresetError } from '@/core/strategies';
import { GraphClientError } from '@/providers/graph';

/**
 * A request body or query string that failed its zod schema.
 */
export class InvalidBodyError extends Error {
  constructor(
    public readonly issues: { path: string; message: string }[],
    part: 'body' | 'query' = 'body'
  ) {
    super(`Invalid request ${part}: ${issues.map((i) => `${i.path || '(root)'}: ${i.message}`).join('; ')}`);
    this.name = 'InvalidBodyError';
  }

  static fromZod(error: z.ZodError, part: 'body' | 'query' = 'body'): InvalidBodyError {
    return new InvalidBodyError(
      error.issues.map((issue) => ({ path: issue.path.map(String).join('.'), message: issue.message })),
      part
    );
  }
}

type ErrorStatus = 400 | 404 | 422 | 500 | 503;

interface ErrorBody {
  error: string;
  message: string;
  [detail: string]: unknown;
}

export function describeError(error: unknown): { status: ErrorStatus; body: ErrorBody } {
  if (error instanceof UnknownPresetError) {
    return {
      status: 404,
      body: { error: 'UnknownPreset', message: error.message, available: error.available }
    };
  }
  if (error instanceof StrategyValidationError) {
    return {
      status: 400,
      body: { error: 'StrategyValidationError', message: error.message, issues: error.issues }
    };
  }
  if (error instanceof IngestRequestError || error instanceof InvalidBodyError) {
    return {
      status: 400,
      body: { error: 'InvalidRequest', message: error.message, issues: error.issues }
    };
  }
  if (error instanceof SyntaxError) {
    return { status: 400, body: { error: 'InvalidJSON', message: error.message } };
  }
  if (error instanceof SchemaValidationError) {
    return {
      status: 422,
      body: { error: 'SchemaValidationError', message: error.message, issues: error.issues }
    };
  }
  if (error instanceof PartialChainError) {
    return {
      status: 500,
      body: {
        error: 'PartialChainError',
        message: error.message,
        document_id: error.documentId
      }
    };
  }
  if (error instanceof GraphClientError) {
    return {
      status: error.type === 'CONNECTION_ERROR' ? 503 : 500,
      body: { error: 'GraphError', message: error.message, type: error.type }
    };
  }
  return {
    status: 500,
    body: {
      error: 'InternalError',
      message: error instanceof Error ? error.message : String(error)
    }
  };
}

/**
 * `app.onError` handler.
 */
export function handleError(error: Error, c: Context): Response {
  if (error instanceof HTTPException) {
    return error.getResponse();
  }
  const { status, body } = describeError(error);
  return c.json(body, status);
}

/**
 * Parse a JSON body against a schema.
 * @throws SyntaxError on malformed JSON, InvalidBodyError on schema failure
 */
export async function parseBody<T>(c: Context, schema: z.ZodType<T>): Promise<T> {
  const raw = await c.req.json<unknown>();
  const result = schema.safeParse(raw);
  if (!result.success) throw InvalidBodyError.fromZod(result.error);
  return result.data;
}

/**
 * Parse the query string against a schema.
 * @throws InvalidBodyError
 */
export function parseQuery<T>(c: Context, schema: z.ZodType<T>): T {
  const result = schema.safeParse(c.req.query());
  if (!result.success) throw InvalidBodyError.fromZod(result.error, 'query');
  return result.data;
}
