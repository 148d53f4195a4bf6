import { describe, expect, test } from 'vitest';
import {
  extractTemporalRefs,
  findTemporalReferences,
  normalizeDate,
  normalizeDuration,
  parseDateRanges,
  rangesOverlap
} from '@/core/ingestion';

describe('extractTemporalRefs', () => {
  test('finds a written date', () => {
    expect(extractTemporalRefs('This Supply Agreement is entered into on January 5, 2024.')).toEqual([
      'January 5, 2024'
    ]);
  });

  test('finds ISO dates and quarters', () => {
    expect(extractTemporalRefs('Signed 2024-03-01, reviewed in Q2 2024.')).toEqual([
      '2024-03-01',
      'Q2 2024'
    ]);
  });

  test('finds relative phrases', () => {
    expect(extractTemporalRefs('Fees are payable upon termination.')).toEqual(['upon termination']);
  });

  test('deduplicates repeated references', () => {
    expect(extractTemporalRefs('On 2024-03-01 and again on 2024-03-01.')).toEqual(['2024-03-01']);
  });

  test('honors disabled kinds', () => {
    const text = 'Due on 2024-03-01 or upon termination.';
    expect(extractTemporalRefs(text, { dates: false, durations: false, relative: true })).toEqual([
      'upon termination'
    ]);
    expect(extractTemporalRefs(text, { dates: true, durations: false, relative: false })).toEqual([
      '2024-03-01'
    ]);
  });

  test('returns nothing for text without references', () => {
    expect(extractTemporalRefs('Payment is due upon delivery.')).toEqual([]);
  });
});

describe('findTemporalReferences', () => {
  test('reports kind and position', () => {
    const [match] = findTemporalReferences('Signed 2024-03-01.');
    expect(match).toEqual({ kind: 'date', text: '2024-03-01', start: 7, end: 17 });
  });
});

describe('normalizeDuration', () => {
  test('prefers digits over number words', () => {
    expect(normalizeDuration('sixty (60) days')).toBe('60 days');
  });

  test('reads number words', () => {
    expect(normalizeDuration('two weeks')).toBe('2 weeks');
    expect(normalizeDuration('a year')).toBe('1 year');
  });

  test('returns null without a unit', () => {
    expect(normalizeDuration('promptly')).toBeNull();
  });
});

describe('parseDateRanges', () => {
  test('a bare year covers the whole year', () => {
    expect(parseDateRanges('in 2024')).toEqual([{ start: '2024-01-01', end: '2024-12-31' }]);
  });

  test('joins two ends into one span', () => {
    expect(parseDateRanges('between March 2023 and Q2 2024')).toEqual([
      { start: '2023-03-01', end: '2024-06-30' }
    ]);
  });

  test('keeps unrelated dates separate', () => {
    expect(parseDateRanges('2023-01-10, later 2024-02-20')).toEqual([
      { start: '2023-01-10', end: '2023-01-10' },
      { start: '2024-02-20', end: '2024-02-20' }
    ]);
  });

  test('handles leap years in month ranges', () => {
    expect(parseDateRanges('February 2024')).toEqual([{ start: '2024-02-01', end: '2024-02-29' }]);
  });
});

describe('normalizeDate', () => {
  test('normalizes single days', () => {
    expect(normalizeDate('2024-01-15')).toBe('2024-01-15');
    expect(normalizeDate('01/15/2024')).toBe('2024-01-15');
    expect(normalizeDate('January 5, 2024')).toBe('2024-01-05');
  });

  test('rejects impossible days and wider ranges', () => {
    expect(normalizeDate('2024-02-30')).toBeNull();
    expect(normalizeDate('Q1 2024')).toBeNull();
  });
});

describe('rangesOverlap', () => {
  test('inclusive on both ends', () => {
    const q1 = { start: '2024-01-01', end: '2024-03-31' };
    expect(rangesOverlap(q1, { start: '2024-03-31', end: '2024-04-30' })).toBe(true);
    expect(rangesOverlap(q1, { start: '2024-04-01', end: '2024-04-30' })).toBe(false);
  });
});
