/**
 * Query Intent Analysis
 *
 * Turns a question into the intent descriptor the searchers consume. The
 * LLM does the analysis; without one, or when it fails, a local fallback
 * built from the chunk metadata extractors takes over.
 */

import type { SchemaDescriptor } from '@/core/ingestion';
import { extractKeyTerms, extractTemporalRefs } from '@/core/ingestion/metadata';
import type { LLMClient, Message } from '@/providers/llm';
import { logIntentFallback } from '@/utils/logger';
import { type QueryIntent, queryIntentSchema } from './types';

const FALLBACK_KEYWORDS = 8;

function buildMessages(question: string, schema?: SchemaDescriptor): Message[] {
  const types = schema
    ? `Known entity types: ${schema.entity_types.join(', ')}.`
    : 'Entity types are free-form.';
  return [
    {
      role: 'system',
      content: [
        'Analyze a question about a document collection for graph retrieval.',
        types,
        'Return: intent (one short phrase), entity_types (only known types the question is about),',
        'keywords (lowercase content words), filters (property name to value),',
        'temporal_hints (dates, periods or durations as written), and',
        'search_text (the most specific phrase to find in the text).'
      ].join('\n')
    },
    { role: 'user', content: question }
  ];
}

/**
 * Intent from local extractors only.
 */
export function fallbackIntent(question: string): QueryIntent {
  const keywords = extractKeyTerms(question, FALLBACK_KEYWORDS).map((k) => k.toLowerCase());
  return queryIntentSchema.parse({
    intent: 'search',
    keywords,
    temporal_hints: extractTemporalRefs(question),
    search_text: keywords[0] ?? question.trim()
  });
}

export interface AnalyzeOptions {
  signal?: AbortSignal;
}

export async function analyzeQuery(
  question: string,
  llm: LLMClient | undefined,
  schema: SchemaDescriptor | undefined,
  options: AnalyzeOptions = {}
): Promise<QueryIntent> {
  if (!llm) return fallbackIntent(question);

  try {
    const intent = await llm.completeJSON(buildMessages(question, schema), queryIntentSchema, {
      temperature: 0,
      abortSignal: options.signal
    });
    if (!schema) return intent;
    const known = new Set(schema.entity_types);
    return { ...intent, entity_types: intent.entity_types.filter((t) => known.has(t)) };
  } catch (error) {
    options.signal?.throwIfAborted();
    logIntentFallback(error);
    return fallbackIntent(question);
  }
}
