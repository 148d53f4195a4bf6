/**
 * Key Term Extraction
 *
 * Three local methods, selected by `metadata.key_terms.method`:
 *
 * - simple: quoted/defined terms first, then the most frequent non-stopwords
 * - regex:  defined terms, multi-word proper nouns and acronyms only
 * - tfidf:  terms ranked against the other chunks of the same document
 *
 * The `llm` method lives in the builder, since it needs a client.
 */

import natural from 'natural';

/** Drafting words that carry no meaning in contracts and filings */
const DRAFTING_WORDS = [
  'shall',
  'will',
  'may',
  'hereby',
  'herein',
  'hereto',
  'hereof',
  'hereunder',
  'thereof',
  'thereto',
  'thereunder',
  'wherein',
  'whereas',
  'whereof',
  'pursuant',
  'notwithstanding',
  'provided',
  'including',
  'without',
  'upon',
  'among',
  'unless',
  'except',
  'regarding',
  'however',
  'therefore',
  'every',
  'not'
];

export const STOPWORDS: ReadonlySet<string> = new Set([...natural.stopwords, ...DRAFTING_WORDS]);

const DEFINED_TERM_PATTERNS = [
  /"([A-Z][^"]{2,50})"/gi,
  /'([A-Z][^']{2,50})'/gi,
  /\(the\s+"([^"]+)"\)/gi,
  /\("([^"]+)"\)/gi,
  /(?:means|refers\s+to|shall\s+mean)\s+([A-Za-z][^.,]{3,50})/gi
];

const FREQUENCY_TOKEN = /\b[A-Za-z]+(?:\s+[A-Z][a-z]+)*\b/g;
const PROPER_PHRASE = /\b[A-Z][a-z]+(?:\s+[A-Z][a-z]+)+\b/g;
const ACRONYM = /\b[A-Z]{2,}\b/g;

function collapse(term: string): string {
  return term.replace(/\s+/g, ' ').trim();
}

function unique(terms: string[]): string[] {
  return [...new Set(terms)];
}

/**
 * Quoted or explicitly defined terms ("the "Licensee"", "X means ..."),
 * in pattern order, deduplicated.
 */
export function extractDefinedTerms(text: string): string[] {
  const terms: string[] = [];
  for (const pattern of DEFINED_TERM_PATTERNS) {
    for (const match of text.matchAll(pattern)) {
      const term = collapse(match[1] ?? '');
      if (term.length > 2) terms.push(term);
    }
  }
  return unique(terms);
}

function isProperNoun(word: string): boolean {
  const first = word.charAt(0);
  const second = word.charAt(1);
  return first === first.toUpperCase() && second !== '' && second === second.toLowerCase();
}

/**
 * Most frequent non-stopword tokens. Ties keep first-occurrence order.
 */
export function extractFrequentTerms(
  text: string,
  maxTerms: number,
  exclude: ReadonlySet<string> = new Set()
): string[] {
  const counts = new Map<string, number>();
  for (const match of text.matchAll(FREQUENCY_TOKEN)) {
    const word = match[0];
    const lower = word.toLowerCase();
    if (word.length <= 2 || STOPWORDS.has(lower) || exclude.has(lower)) continue;
    const term = isProperNoun(word) ? word : lower;
    counts.set(term, (counts.get(term) ?? 0) + 1);
  }

  return [...counts.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, maxTerms)
    .map(([term]) => term);
}

function simpleTerms(text: string, maxTerms: number): string[] {
  const defined = extractDefinedTerms(text).slice(0, Math.floor(maxTerms / 2));
  const excluded = new Set(defined.map((t) => t.toLowerCase()));
  const frequent = extractFrequentTerms(text, maxTerms - defined.length, excluded);
  return unique([...defined, ...frequent]).slice(0, maxTerms);
}

function regexTerms(text: string, maxTerms: number): string[] {
  const phrases = [...text.matchAll(PROPER_PHRASE)].map((m) => collapse(m[0]));
  const acronyms = [...text.matchAll(ACRONYM)].map((m) => m[0]);
  return unique([...extractDefinedTerms(text), ...phrases, ...acronyms]).slice(0, maxTerms);
}

export type LocalKeyTermMethod = 'simple' | 'regex';

export function extractKeyTerms(
  text: string,
  maxTerms: number,
  method: LocalKeyTermMethod = 'simple'
): string[] {
  if (maxTerms <= 0 || !text.trim()) return [];
  return method === 'regex' ? regexTerms(text, maxTerms) : simpleTerms(text, maxTerms);
}

// ═══════════════════════════════════════════════════════════════════════════════
// TF-IDF
// ═══════════════════════════════════════════════════════════════════════════════

const tokenizer = new natural.WordTokenizer();

function tokenize(text: string): string[] {
  return tokenizer
    .tokenize(text.toLowerCase())
    .filter((w) => /^[a-z]+$/.test(w) && w.length > 2 && !STOPWORDS.has(w));
}

/**
 * Key terms per text, ranked by natural's TF-IDF against the document's
 * other chunks. Ties keep first occurrence.
 */
export function extractKeyTermsTfidf(texts: string[], maxTerms: number): string[][] {
  const tfidf = new natural.TfIdf();
  const tokenized = texts.map(tokenize);
  // Token arrays skip natural's own stopword pass
  for (const tokens of tokenized) tfidf.addDocument(tokens);

  return tokenized.map((tokens, index) => {
    if (tokens.length === 0) return [];
    return tfidf
      .listTerms(index)
      .slice(0, maxTerms)
      .map(({ term }) => term);
  });
}
