/**
 * Logger
 *
 * Semantic logging for the engine's operations:
 * - INGEST: document writes (chunks, entities, relationships)
 * - QUERY: retrieval (searchers, truncation, results)
 * - STRATEGY: preset loads and edits
 *
 * One timestamped headline per operation, indented detail lines below it.
 */

import type { IngestionIssue, IngestionResult, IngestRequest } from '@/core/ingestion';
import type { RetrievalResult, SignalSearchFailure } from '@/core/retrieval';
import type { StrategySnapshot } from '@/core/strategies';
import { c } from './colors';

// ═══════════════════════════════════════════════════════════════════════════════
// Formatting Utilities
// ═══════════════════════════════════════════════════════════════════════════════

/** Format current time as [HH:MM:SS] */
function formatTime(): string {
  const now = new Date();
  const hours = String(now.getHours()).padStart(2, '0');
  const minutes = String(now.getMinutes()).padStart(2, '0');
  const seconds = String(now.getSeconds()).padStart(2, '0');
  return `[${hours}:${minutes}:${seconds}]`;
}

/** Truncate text to max length with ellipsis */
function truncate(text: string, maxLength: number): string {
  const normalized = text.replace(/\s+/g, ' ').trim();
  if (normalized.length <= maxLength) return normalized;
  return `${normalized.slice(0, maxLength - 3)}...`;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? '' : 's'}`;
}

/** Indent string for continuation lines (matches timestamp width) */
const INDENT = '           '; // 11 chars to align with [HH:MM:SS] + space

// ═══════════════════════════════════════════════════════════════════════════════
// Ingestion Logging (INGEST)
// ═══════════════════════════════════════════════════════════════════════════════

export function logIngestStart(request: IngestRequest): void {
  const time = c.dim(formatTime());
  const { document, chunks, entities, relationships } = request;
  const counts = c.dim(
    `(${plural(chunks.length, 'chunk')}, ${plural(entities.length, 'entity')}, ${plural(relationships.length, 'relationship')})`
  );
  console.log(`${time} ${c.cyan('INGEST')} ${c.white(document.id)} ${counts}`);
}

export function logIngestResult(result: IngestionResult): void {
  const parts = [
    `${result.chunk_count} chunks`,
    `${result.entity_count} entities`,
    `${result.relationship_count} relationships`
  ];
  console.log(
    `${INDENT}${c.brightGreen('✓ Stored')}: ${parts.join(', ')} ${c.dim(`(${result.duration_ms}ms)`)}`
  );

  const skipped = result.skipped_entities + result.skipped_relationships;
  if (skipped > 0) {
    console.log(
      `${INDENT}${c.yellow('⊘ Skipped')}: ${plural(result.skipped_entities, 'entity')}, ${plural(result.skipped_relationships, 'relationship')}`
    );
  }
}

export function logIngestFailure(documentId: string, error: unknown): void {
  console.log(`${INDENT}${c.brightRed('✗ Failed')}: ${documentId} ${c.dim(errorMessage(error))}`);
}

/**
 * Validation issues at the strategy's log level: `debug` adds issue codes,
 * `info` lists every issue, `warning` prints one summary line.
 */
export function logValidationIssues(
  issues: IngestionIssue[],
  level: 'debug' | 'info' | 'warning'
): void {
  if (issues.length === 0) return;

  if (level === 'warning') {
    const errors = issues.filter((i) => i.severity === 'error').length;
    const summary = `${plural(errors, 'error')}, ${plural(issues.length - errors, 'warning')}`;
    console.log(`${INDENT}${c.yellow('! Validation')}: ${summary}`);
    return;
  }

  for (const issue of issues) {
    const tag = issue.severity === 'error' ? c.error('✗') : c.warning('!');
    const code = level === 'debug' ? ` ${c.dim(`[${issue.code}]`)}` : '';
    console.log(`${INDENT}${tag} ${issue.message}${code}`);
  }
}

export function logKeyTermFallback(error: unknown): void {
  console.log(
    `${INDENT}${c.yellow('! Key terms')}: LLM extraction failed, using local extraction ${c.dim(`(${errorMessage(error)})`)}`
  );
}

// ═══════════════════════════════════════════════════════════════════════════════
// Retrieval Logging (QUERY)
// ═══════════════════════════════════════════════════════════════════════════════

export function logQueryStart(question: string, strategyName: string): void {
  const time = c.dim(formatTime());
  const preview = truncate(question, 60);
  console.log(`${time} ${c.magenta('QUERY')} "${c.white(preview)}" ${c.dim(`[${strategyName}]`)}`);
}

export function logIntentFallback(error: unknown): void {
  console.log(
    `${INDENT}${c.yellow('! Intent')}: analysis failed, using keyword fallback ${c.dim(`(${errorMessage(error)})`)}`
  );
}

export function logSearchFailure(failure: SignalSearchFailure): void {
  const label = failure.reason === 'timeout' ? 'timed out' : 'failed';
  console.log(
    `${INDENT}${c.yellow(`⊘ ${failure.signal}`)} ${label} ${c.dim(`(${failure.message})`)}`
  );
}

export function logQueryResult(result: RetrievalResult): void {
  const methods = result.search_methods_used.join(', ') || 'none';
  console.log(`${INDENT}${c.dim('→ Signals:')} ${methods}`);

  for (const warning of result.warnings) {
    console.log(`${INDENT}${c.yellow('✂ Truncated')}: ${warning.message}`);
  }

  if (result.entities.length === 0 && result.chunks.length === 0) {
    console.log(`${INDENT}${c.dim('(nothing found)')}`);
    return;
  }

  if (result.entities.length > 0) {
    console.log(`${INDENT}${c.dim('→ Entities:')} ${result.entities.map((e) => e.key).join(', ')}`);
  }
  const chunks = result.chunks.map((chunk) => {
    const label = `${chunk.document_id}#${chunk.chunk_index}`;
    return chunk.expanded ? c.dim(label) : label;
  });
  if (chunks.length > 0) {
    console.log(`${INDENT}${c.dim('→ Chunks:')} ${chunks.join(', ')}`);
  }
  console.log(
    `${INDENT}${c.dim(`~${result.token_estimate} tokens (${result.duration_ms}ms)`)}`
  );
}

// ═══════════════════════════════════════════════════════════════════════════════
// Strategy Logging (STRATEGY)
// ═══════════════════════════════════════════════════════════════════════════════

export function logStrategyChange(action: string, snapshot: StrategySnapshot): void {
  const time = c.dim(formatTime());
  const preset = snapshot.active_preset ?? 'custom';
  console.log(
    `${time} ${c.blue('STRATEGY')} ${action} ${c.dim(`→ ${preset} (revision ${snapshot.revision})`)}`
  );
}
