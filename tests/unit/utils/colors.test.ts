/**
 * Terminal Color Utility Tests
 */

import { describe, expect, test } from 'vitest';
import { c, colorize, colors } from '@/utils/colors';

describe('colorize', () => {
  test('applies color with reset suffix', () => {
    expect(colorize('hello', 'red')).toBe('\x1b[31mhello\x1b[0m');
  });

  test('works with modifiers', () => {
    expect(colorize('text', 'dim')).toBe('\x1b[2mtext\x1b[0m');
  });

  test('handles empty string', () => {
    expect(colorize('', 'green')).toBe(`${colors.green}${colors.reset}`);
  });
});

describe('c shortcuts', () => {
  test('match colorize', () => {
    expect(c.cyan('INGEST')).toBe(colorize('INGEST', 'cyan'));
    expect(c.brightGreen('ok')).toBe('\x1b[92mok\x1b[0m');
  });

  test('severity helpers map to their colors', () => {
    expect(c.warning('!')).toBe(colorize('!', 'yellow'));
    expect(c.error('✗')).toBe(colorize('✗', 'brightRed'));
  });
});
