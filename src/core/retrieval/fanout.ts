/**
 * Searcher Fan-out
 *
 * Starts every enabled searcher at once, each under its own timeout and
 * AbortController, and waits for all of them. This is the barrier in front
 * of the merge.
 */

import type {
  SearchContext,
  SignalOutcome,
  SignalSearcher,
  SignalSearchFailure
} from './types';

export class SearchTimeoutError extends Error {
  constructor(
    public readonly signal: string,
    public readonly timeoutMs: number
  ) {
    super(`${signal} timed out after ${timeoutMs}ms`);
    this.name = 'SearchTimeoutError';
  }
}

export interface FanoutResult {
  outcomes: SignalOutcome[];
  failures: SignalSearchFailure[];
}

type SearchContextBase = Omit<SearchContext, 'signal'>;

type Settled =
  | { ok: true; value: SignalOutcome }
  | { ok: false; value: SignalSearchFailure };

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function runOne(
  searcher: SignalSearcher,
  base: SearchContextBase,
  parent: AbortSignal | undefined,
  timeoutMs: number
): Promise<Settled> {
  const controller = new AbortController();
  const onParentAbort = () => controller.abort(parent?.reason);
  parent?.addEventListener('abort', onParentAbort, { once: true });
  const timer = setTimeout(
    () => controller.abort(new SearchTimeoutError(searcher.name, timeoutMs)),
    timeoutMs
  );

  // Settles on abort even when the searcher ignores its signal
  const stopped = new Promise<never>((_, reject) => {
    if (controller.signal.aborted) reject(controller.signal.reason);
    controller.signal.addEventListener('abort', () => reject(controller.signal.reason), {
      once: true
    });
  });
  stopped.catch(() => undefined);

  try {
    const outcome = await Promise.race([
      searcher.search({ ...base, signal: controller.signal }),
      stopped
    ]);
    return { ok: true, value: { signal: searcher.name, outcome } };
  } catch (error) {
    if (parent?.aborted) throw parent.reason;
    const timedOut = error instanceof SearchTimeoutError;
    return {
      ok: false,
      value: {
        signal: searcher.name,
        reason: timedOut ? 'timeout' : 'error',
        message: describe(error)
      }
    };
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener('abort', onParentAbort);
    // Stop whatever the searcher still has in flight
    if (!controller.signal.aborted) controller.abort();
  }
}

/**
 * Run the enabled searchers concurrently.
 *
 * A searcher that throws or outlives `timeoutMs` is reported in `failures`
 * and contributes nothing. Aborting `parent` aborts every searcher and
 * rejects with the abort reason.
 */
export async function runSearchers(
  searchers: readonly SignalSearcher[],
  base: SearchContextBase,
  options: { signal?: AbortSignal; timeoutMs: number }
): Promise<FanoutResult> {
  options.signal?.throwIfAborted();

  const enabled = searchers.filter((s) => s.isEnabled(base.strategy));
  const settled = await Promise.all(
    enabled.map((searcher) => runOne(searcher, base, options.signal, options.timeoutMs))
  );

  const outcomes: SignalOutcome[] = [];
  const failures: SignalSearchFailure[] = [];
  for (const result of settled) {
    if (result.ok) outcomes.push(result.value);
    else failures.push(result.value);
  }
  return { outcomes, failures };
}
