/**
 * Neo4j Error Handling & Session Management
 *
 * Provides error classification, retry logic, and the runCommand
 * orchestrator that keeps session handling out of the operations.
 */

import type { Driver, Session } from 'neo4j-driver';
import type { GraphErrorType } from '../types';
import { GraphClientError } from '../types';
import { RETRY } from './constants';

// ============================================================
// ERROR CLASSIFICATION
// ============================================================

function errorCode(error: Error): string {
  if ('code' in error && typeof error.code === 'string') {
    return error.code.toLowerCase();
  }
  return '';
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Map Neo4j-specific errors to standard GraphErrorType.
 *
 * Categories:
 * - CONNECTION_ERROR: Network/availability issues
 * - CONSTRAINT_VIOLATION: Unique constraint failures (not retryable)
 * - TRANSIENT_ERROR: Deadlocks, timeouts (retryable)
 * - QUERY_ERROR: Syntax or logic errors
 */
export function classifyNeo4jError(error: unknown): GraphErrorType {
  if (error instanceof GraphClientError) return error.type;
  if (!(error instanceof Error)) return 'QUERY_ERROR';

  const message = error.message.toLowerCase();
  const code = errorCode(error);

  if (
    message.includes('connection') ||
    message.includes('unavailable') ||
    message.includes('failed to connect') ||
    code.includes('serviceunavailable')
  ) {
    return 'CONNECTION_ERROR';
  }

  if (message.includes('constraint') || message.includes('unique') || code.includes('constraint')) {
    return 'CONSTRAINT_VIOLATION';
  }

  if (
    message.includes('deadlock') ||
    message.includes('timeout') ||
    message.includes('transient') ||
    code.includes('transient') ||
    code.includes('deadlock')
  ) {
    return 'TRANSIENT_ERROR';
  }

  return 'QUERY_ERROR';
}

/**
 * Check if an error indicates a schema element already exists.
 */
export function isSchemaAlreadyExistsError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  const message = error.message.toLowerCase();
  const code = errorCode(error);
  return (
    message.includes('equivalent') ||
    message.includes('already exists') ||
    code.includes('equivalentschemarulealreadyexists') ||
    code.includes('constraintalreadyexists') ||
    code.includes('indexalreadyexists')
  );
}

// ============================================================
// RETRY LOGIC
// ============================================================

/**
 * Execute an operation with exponential backoff retry for transient errors.
 *
 * - CONSTRAINT_VIOLATION: fail immediately
 * - TRANSIENT_ERROR: retry with exponential backoff
 * - anything else: fail after the first attempt, keeping its type
 */
export async function withRetry<T>(operation: () => Promise<T>, operationName: string): Promise<T> {
  let lastError: Error | undefined;
  let lastType: GraphErrorType = 'TRANSIENT_ERROR';

  for (let attempt = 0; attempt < RETRY.MAX_ATTEMPTS; attempt++) {
    try {
      return await operation();
    } catch (error) {
      const errorType = classifyNeo4jError(error);
      lastError = toError(error);
      lastType = errorType;

      if (errorType === 'CONSTRAINT_VIOLATION') {
        throw new GraphClientError(
          `Constraint violation in ${operationName}: ${lastError.message}`,
          'CONSTRAINT_VIOLATION',
          lastError
        );
      }

      if (errorType === 'TRANSIENT_ERROR' && attempt < RETRY.MAX_ATTEMPTS - 1) {
        const delay = RETRY.BASE_DELAY_MS * 2 ** attempt;
        await new Promise((resolve) => setTimeout(resolve, delay));
        continue;
      }

      break;
    }
  }

  throw new GraphClientError(
    `Operation ${operationName} failed: ${lastError?.message ?? 'unknown error'}`,
    lastType,
    lastError
  );
}

// ============================================================
// SESSION LIFECYCLE MANAGEMENT
// ============================================================

export type CommandMode = 'read' | 'write';

/**
 * Rejects with the signal's reason once it aborts. `dispose` detaches the
 * listener.
 */
function rejectOnAbort(signal: AbortSignal): { promise: Promise<never>; dispose: () => void } {
  let onAbort = () => {};
  const promise = new Promise<never>((_, reject) => {
    onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
  });
  return { promise, dispose: () => signal.removeEventListener('abort', onAbort) };
}

/**
 * Unified session lifecycle orchestrator.
 *
 * Opens a session in the requested access mode against the target database,
 * runs the operation, wraps failures in GraphClientError and always closes
 * the session.
 *
 * With a signal, an abort rejects with the signal's reason as is, and the
 * session is closed, which cancels the running query.
 */
export async function runCommand<T>(
  driver: Driver,
  database: string,
  mode: CommandMode,
  operation: (session: Session) => Promise<T>,
  operationName: string,
  signal?: AbortSignal
): Promise<T> {
  signal?.throwIfAborted();
  const session = driver.session({ database, defaultAccessMode: mode === 'read' ? 'READ' : 'WRITE' });
  const abort = signal ? rejectOnAbort(signal) : null;
  try {
    const running = operation(session);
    return await (abort ? Promise.race([running, abort.promise]) : running);
  } catch (error) {
    if (signal?.aborted) throw signal.reason;
    if (error instanceof GraphClientError) throw error;
    const cause = toError(error);
    throw new GraphClientError(
      `${operationName} failed: ${cause.message}`,
      classifyNeo4jError(error),
      cause
    );
  } finally {
    abort?.dispose();
    await session.close();
  }
}

/**
 * Run a command with automatic retry for transient errors.
 */
export async function runCommandWithRetry<T>(
  driver: Driver,
  database: string,
  mode: CommandMode,
  operation: (session: Session) => Promise<T>,
  operationName: string
): Promise<T> {
  return withRetry(
    () => runCommand(driver, database, mode, operation, operationName),
    operationName
  );
}
