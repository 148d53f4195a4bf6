/**
 * Structured Output Strategy Tests
 *
 * Strategy selection and JSON extraction. Generation itself needs a
 * live model and is not covered here.
 */

import type { LanguageModelV3 } from '@ai-sdk/provider';
import { describe, expect, test } from 'vitest';
import { z } from 'zod';
import {
  executeWithStrategies,
  extractJSON,
  getDefaultCapabilities,
  getStrategiesForProvider
} from '@/providers/llm/structured-output';
import { describeSchema, withInstruction } from '@/providers/llm/structured-output/types';

const unusedModel: LanguageModelV3 = {
  specificationVersion: 'v3',
  provider: 'test',
  modelId: 'unused',
  supportedUrls: {},
  doGenerate: async () => {
    throw new Error('not called');
  },
  doStream: async () => {
    throw new Error('not called');
  }
};

function strategyNames(provider: string): string[] {
  return getStrategiesForProvider(getDefaultCapabilities(provider)).map((s) => s.name);
}

describe('extractJSON', () => {
  test('prefers a fenced json block', () => {
    const text = 'Here you go:\n```json\n{"keywords": ["payment"]}\n```\nAnything else?';
    expect(extractJSON(text)).toBe('{"keywords": ["payment"]}');
  });

  test('accepts a fence without a language tag', () => {
    expect(extractJSON('```\n[1, 2]\n```')).toBe('[1, 2]');
  });

  test('finds a bare object inside prose', () => {
    expect(extractJSON('Sure! {"a": {"b": 1}} Hope this helps.')).toBe('{"a": {"b": 1}}');
  });

  test('ignores brackets inside strings', () => {
    const text = 'Result: {"search_text": "clause } with {braces", "n": 1} done';
    expect(JSON.parse(extractJSON(text))).toEqual({ search_text: 'clause } with {braces', n: 1 });
  });

  test('handles escaped quotes inside strings', () => {
    const text = '{"quote": "he said \\"}\\" loudly"} trailing';
    expect(extractJSON(text)).toBe('{"quote": "he said \\"}\\" loudly"}');
  });

  test('finds a bare array', () => {
    expect(extractJSON('terms: ["net 30", "late fee"] end')).toBe('["net 30", "late fee"]');
  });

  test('returns trimmed text when nothing balances', () => {
    expect(extractJSON('  {"unterminated": 1  ')).toBe('{"unterminated": 1');
  });
});

describe('getDefaultCapabilities', () => {
  test('openai supports both native modes', () => {
    expect(getDefaultCapabilities('openai')).toEqual({
      provider: 'openai',
      supportsStructuredOutputs: true,
      supportsJsonMode: true
    });
  });

  test('ollama has JSON mode only', () => {
    expect(getDefaultCapabilities('ollama')).toEqual({
      provider: 'ollama',
      supportsStructuredOutputs: false,
      supportsJsonMode: true
    });
  });

  test('unknown providers support neither', () => {
    expect(getDefaultCapabilities('mystery')).toEqual({
      provider: 'mystery',
      supportsStructuredOutputs: false,
      supportsJsonMode: false
    });
  });
});

describe('getStrategiesForProvider', () => {
  test('openai tries native structured output first', () => {
    expect(strategyNames('openai')).toEqual(['structured-output', 'json-mode', 'prompt-based']);
  });

  test('google tries JSON mode first', () => {
    expect(strategyNames('google')).toEqual(['json-mode', 'structured-output', 'prompt-based']);
  });

  test('anthropic skips JSON mode', () => {
    expect(strategyNames('anthropic')).toEqual(['structured-output', 'prompt-based']);
  });

  test('ollama skips native structured output', () => {
    expect(strategyNames('ollama')).toEqual(['json-mode', 'prompt-based']);
  });

  test('every provider keeps the prompt-based fallback', () => {
    expect(strategyNames('mystery')).toEqual(['prompt-based']);
  });
});

describe('executeWithStrategies', () => {
  test('rejects a forced strategy the provider does not support', async () => {
    const run = executeWithStrategies(
      unusedModel,
      [{ role: 'user', content: 'hi' }],
      z.object({}),
      getDefaultCapabilities('anthropic'),
      undefined,
      { forceStrategy: 'json-mode' }
    );

    await expect(run).rejects.toThrow(
      'Forced strategy "json-mode" is not supported for provider "anthropic"'
    );
  });
});

describe('withInstruction', () => {
  test('appends to the last message only', () => {
    const messages = withInstruction(
      [
        { role: 'system', content: 'You analyze questions.' },
        { role: 'user', content: 'Who pays?' }
      ],
      'Respond with JSON.'
    );

    expect(messages).toEqual([
      { role: 'system', content: 'You analyze questions.' },
      { role: 'user', content: 'Who pays?\n\nRespond with JSON.' }
    ]);
  });

  test('throws without messages', () => {
    expect(() => withInstruction([], 'x')).toThrow('No messages provided');
  });
});

describe('describeSchema', () => {
  test('renders a JSON Schema', () => {
    const described = JSON.parse(describeSchema(z.object({ keywords: z.array(z.string()) })));
    expect(described.type).toBe('object');
    expect(described.properties.keywords).toEqual({ type: 'array', items: { type: 'string' } });
  });

  test('falls back to a description for schemas without a JSON form', () => {
    const schema = z.string().transform((s) => s.length);
    expect(describeSchema(schema)).toBe('a JSON object matching the expected schema');
  });
});
