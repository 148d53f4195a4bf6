/**
 * Temporal Reference Extraction
 *
 * Pattern-based detection of dates, durations and relative time phrases
 * in chunk text, plus the normalizers retrieval uses to compare them.
 */

export type TemporalKind = 'date' | 'duration' | 'relative';

export interface TemporalMatch {
  kind: TemporalKind;
  text: string;
  start: number;
  end: number;
}

export interface TemporalOptions {
  dates: boolean;
  durations: boolean;
  relative: boolean;
}

const ALL_KINDS: TemporalOptions = { dates: true, durations: true, relative: true };

const MONTHS =
  'January|February|March|April|May|June|July|August|September|October|November|December|Jan|Feb|Mar|Apr|Jun|Jul|Aug|Sep|Sept|Oct|Nov|Dec';

const DATE_PATTERNS = [
  // January 15, 2024 / Jan 15 2024
  new RegExp(`\\b(?:${MONTHS})[.\\s]+\\d{1,2}[,\\s]+\\d{4}\\b`, 'gi'),
  // 15 January 2024
  new RegExp(`\\b\\d{1,2}[.\\s]+(?:${MONTHS})[,\\s]+\\d{4}\\b`, 'gi'),
  // 2024-01-15 / 2024/01/15
  /\b\d{4}[-/]\d{1,2}[-/]\d{1,2}\b/gi,
  // 01/15/2024 (US order)
  /\b\d{1,2}[-/]\d{1,2}[-/]\d{4}\b/gi,
  // Q1 2024
  /\b[Qq][1-4]\s+\d{4}\b/gi,
  // FY2024 / FY 2024
  /\b[Ff][Yy]\s*\d{4}\b/gi
];

const DURATION_PATTERNS = [
  // 30 days / sixty (60) business days
  /\b(?:(?:\w+\s+)?\(?\d+\)?\s+)?(?:calendar\s+|business\s+|working\s+)?(?:days?|weeks?|months?|quarters?|years?)\b/gi,
  /\b(?:one|two|three|four|five|six|seven|eight|nine|ten|eleven|twelve)\s+(?:days?|weeks?|months?|quarters?|years?)\b/gi,
  /\ba\s+(?:day|week|month|quarter|year)\b/gi
];

const RELATIVE_PATTERNS = [
  /\b(?:effective\s+date|commencement\s+date|termination\s+date|closing\s+date|execution\s+date)\b/gi,
  /\b(?:upon|after|before|prior\s+to|following|within)\s+(?:signing|execution|termination|closing|expiration)\b/gi,
  /\b(?:immediately|promptly|forthwith)\s+(?:upon|after|following)\b/gi,
  /\b(?:at\s+any\s+time|from\s+time\s+to\s+time)\b/gi,
  /\b(?:until|unless|so\s+long\s+as)\b/gi
];

function collect(text: string, patterns: RegExp[], kind: TemporalKind): TemporalMatch[] {
  const matches: TemporalMatch[] = [];
  for (const pattern of patterns) {
    for (const match of text.matchAll(pattern)) {
      const start = match.index;
      matches.push({
        kind,
        text: match[0].trim(),
        start,
        end: start + match[0].length
      });
    }
  }
  return matches;
}

/**
 * Find temporal references in position order. Overlapping matches collapse
 * to the longer one.
 */
export function findTemporalReferences(
  text: string,
  options: TemporalOptions = ALL_KINDS
): TemporalMatch[] {
  const found: TemporalMatch[] = [];
  if (options.dates) found.push(...collect(text, DATE_PATTERNS, 'date'));
  if (options.durations) found.push(...collect(text, DURATION_PATTERNS, 'duration'));
  if (options.relative) found.push(...collect(text, RELATIVE_PATTERNS, 'relative'));

  found.sort((a, b) => a.start - b.start);

  const kept: TemporalMatch[] = [];
  for (const match of found) {
    const last = kept[kept.length - 1];
    if (last && match.start < last.end) {
      if (match.text.length > last.text.length) kept[kept.length - 1] = match;
    } else {
      kept.push(match);
    }
  }
  return kept;
}

/**
 * Distinct reference texts, first occurrence order. This is what chunks store.
 */
export function extractTemporalRefs(text: string, options: TemporalOptions = ALL_KINDS): string[] {
  const seen = new Set<string>();
  const refs: string[] = [];
  for (const match of findTemporalReferences(text, options)) {
    if (!match.text || seen.has(match.text)) continue;
    seen.add(match.text);
    refs.push(match.text);
  }
  return refs;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Normalization
// ═══════════════════════════════════════════════════════════════════════════════

const NUMBER_WORDS: Record<string, number> = {
  a: 1,
  one: 1,
  two: 2,
  three: 3,
  four: 4,
  five: 5,
  six: 6,
  seven: 7,
  eight: 8,
  nine: 9,
  ten: 10,
  eleven: 11,
  twelve: 12
};

const DURATION_UNITS = ['year', 'quarter', 'month', 'week', 'day'] as const;

/**
 * Normalize a duration phrase to `<n> <unit>[s]`, e.g. "sixty (60) days" -> "60 days".
 */
export function normalizeDuration(text: string): string | null {
  const lower = text.toLowerCase();
  const unit = DURATION_UNITS.find((u) => lower.includes(u));
  if (!unit) return null;

  let amount = 1;
  const digits = lower.match(/\d+/);
  if (digits) {
    amount = Number(digits[0]);
  } else {
    for (const word of lower.split(/\s+/)) {
      const value = NUMBER_WORDS[word];
      if (value !== undefined) {
        amount = value;
        break;
      }
    }
  }
  return `${amount} ${unit}${amount === 1 ? '' : 's'}`;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Date Ranges
// ═══════════════════════════════════════════════════════════════════════════════

/** Inclusive calendar range, both ends `YYYY-MM-DD` */
export interface DateRange {
  start: string;
  end: string;
}

const MONTH_INDEX: Record<string, number> = {
  jan: 1,
  feb: 2,
  mar: 3,
  apr: 4,
  may: 5,
  jun: 6,
  jul: 7,
  aug: 8,
  sep: 9,
  oct: 10,
  nov: 11,
  dec: 12
};

function monthNumber(name: string): number | null {
  return MONTH_INDEX[name.slice(0, 3).toLowerCase()] ?? null;
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function isoDay(year: number, month: number, day: number): string | null {
  if (month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) return null;
  return `${year}-${pad(month)}-${pad(day)}`;
}

function dayRange(year: number, month: number, day: number): DateRange | null {
  const iso = isoDay(year, month, day);
  return iso ? { start: iso, end: iso } : null;
}

function monthRange(year: number, firstMonth: number, lastMonth: number): DateRange {
  return {
    start: `${year}-${pad(firstMonth)}-01`,
    end: `${year}-${pad(lastMonth)}-${pad(daysInMonth(year, lastMonth))}`
  };
}

interface RangeRule {
  pattern: RegExp;
  toRange: (m: RegExpMatchArray) => DateRange | null;
}

const num = (value: string | undefined): number => Number(value ?? NaN);

// More specific forms first; later rules skip text an earlier rule claimed.
const RANGE_RULES: RangeRule[] = [
  {
    pattern: /\b(\d{4})[-/](\d{1,2})[-/](\d{1,2})\b/g,
    toRange: (m) => dayRange(num(m[1]), num(m[2]), num(m[3]))
  },
  {
    pattern: /\b(\d{1,2})[-/](\d{1,2})[-/](\d{4})\b/g,
    toRange: (m) => dayRange(num(m[3]), num(m[1]), num(m[2]))
  },
  {
    pattern: new RegExp(`\\b(${MONTHS})[.\\s]+(\\d{1,2})(?:st|nd|rd|th)?[,\\s]+(\\d{4})\\b`, 'gi'),
    toRange: (m) => {
      const month = monthNumber(m[1] ?? '');
      return month ? dayRange(num(m[3]), month, num(m[2])) : null;
    }
  },
  {
    pattern: new RegExp(`\\b(\\d{1,2})[.\\s]+(${MONTHS})[,\\s]+(\\d{4})\\b`, 'gi'),
    toRange: (m) => {
      const month = monthNumber(m[2] ?? '');
      return month ? dayRange(num(m[3]), month, num(m[1])) : null;
    }
  },
  {
    pattern: new RegExp(`\\b(${MONTHS})\\.?,?\\s+(\\d{4})\\b`, 'gi'),
    toRange: (m) => {
      const month = monthNumber(m[1] ?? '');
      return month ? monthRange(num(m[2]), month, month) : null;
    }
  },
  {
    pattern: /\bQ([1-4])\s*(\d{4})\b/gi,
    toRange: (m) => {
      const quarter = num(m[1]);
      return monthRange(num(m[2]), quarter * 3 - 2, quarter * 3);
    }
  },
  {
    pattern: /\bFY\s*(\d{4})\b/gi,
    toRange: (m) => monthRange(num(m[1]), 1, 12)
  },
  {
    pattern: /\b((?:19|20)\d{2})\b/g,
    toRange: (m) => monthRange(num(m[1]), 1, 12)
  }
];

const SPAN_CONNECTOR = /^\s*(?:-|–|to|through|until|and|thru)\s*$/i;

interface LocatedRange extends DateRange {
  from: number;
  to: number;
}

/**
 * Calendar ranges mentioned in free text, in position order.
 *
 * "between March 2023 and Q2 2024" yields one span from 2023-03-01 to
 * 2024-06-30; "2024" alone yields the whole year.
 */
export function parseDateRanges(text: string): DateRange[] {
  const located: LocatedRange[] = [];
  const overlapsClaimed = (from: number, to: number) =>
    located.some((r) => from < r.to && r.from < to);

  for (const rule of RANGE_RULES) {
    for (const match of text.matchAll(rule.pattern)) {
      const from = match.index;
      const to = from + match[0].length;
      if (overlapsClaimed(from, to)) continue;
      const range = rule.toRange(match);
      if (range) located.push({ ...range, from, to });
    }
  }

  located.sort((a, b) => a.from - b.from);

  const merged: LocatedRange[] = [];
  for (const range of located) {
    const last = merged[merged.length - 1];
    if (last && SPAN_CONNECTOR.test(text.slice(last.to, range.from))) {
      merged[merged.length - 1] = {
        start: last.start < range.start ? last.start : range.start,
        end: last.end > range.end ? last.end : range.end,
        from: last.from,
        to: range.to
      };
    } else {
      merged.push(range);
    }
  }

  return merged.map(({ start, end }) => ({ start, end }));
}

/**
 * Normalize a single-day date expression to `YYYY-MM-DD`.
 */
export function normalizeDate(text: string): string | null {
  const [range] = parseDateRanges(text);
  return range && range.start === range.end ? range.start : null;
}

export function rangesOverlap(a: DateRange, b: DateRange): boolean {
  return a.start <= b.end && b.start <= a.end;
}
