/**
 * Terminal Colors
 *
 * ANSI codes for the INGEST / QUERY / STRATEGY console lines.
 */

// ═══════════════════════════════════════════════════════════════════════════════
// ANSI Color Codes
// ═══════════════════════════════════════════════════════════════════════════════

export const colors = {
  // Reset
  reset: '\x1b[0m',

  // Modifiers
  bright: '\x1b[1m',
  dim: '\x1b[2m',

  // Foreground colors
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',
  gray: '\x1b[90m',

  // Bright foreground colors
  brightRed: '\x1b[91m',
  brightGreen: '\x1b[92m',
  brightYellow: '\x1b[93m',
  brightCyan: '\x1b[96m'
} as const;

export type ColorName = keyof typeof colors;

// ═══════════════════════════════════════════════════════════════════════════════
// Color Functions
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Apply a color to text.
 */
export function colorize(text: string, color: ColorName): string {
  return `${colors[color]}${text}${colors.reset}`;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Convenience Functions
// ═══════════════════════════════════════════════════════════════════════════════

export const c = {
  reset: (text: string) => colorize(text, 'reset'),
  dim: (text: string) => colorize(text, 'dim'),
  bright: (text: string) => colorize(text, 'bright'),

  // Standard colors
  red: (text: string) => colorize(text, 'red'),
  green: (text: string) => colorize(text, 'green'),
  yellow: (text: string) => colorize(text, 'yellow'),
  blue: (text: string) => colorize(text, 'blue'),
  magenta: (text: string) => colorize(text, 'magenta'),
  cyan: (text: string) => colorize(text, 'cyan'),
  white: (text: string) => colorize(text, 'white'),
  gray: (text: string) => colorize(text, 'gray'),

  // Bright colors
  brightRed: (text: string) => colorize(text, 'brightRed'),
  brightGreen: (text: string) => colorize(text, 'brightGreen'),
  brightYellow: (text: string) => colorize(text, 'brightYellow'),
  brightCyan: (text: string) => colorize(text, 'brightCyan'),

  // Severity
  warning: (text: string) => colorize(text, 'yellow'),
  error: (text: string) => colorize(text, 'brightRed')
} as const;
