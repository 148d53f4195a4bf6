/**
 * Section heading detection. Patterns are tried in order against each line;
 * the first pattern with a match names the heading.
 */

const compiled = new Map<string, RegExp>();

function compile(pattern: string): RegExp {
  let regex = compiled.get(pattern);
  if (!regex) {
    regex = new RegExp(pattern, 'm');
    compiled.set(pattern, regex);
  }
  return regex;
}

function lineAt(text: string, index: number): string {
  const start = text.lastIndexOf('\n', index - 1) + 1;
  const end = text.indexOf('\n', index);
  return text.slice(start, end === -1 ? undefined : end);
}

export function detectSectionHeading(text: string, patterns: readonly string[]): string | null {
  for (const pattern of patterns) {
    const match = compile(pattern).exec(text);
    if (match) {
      const heading = lineAt(text, match.index).trim();
      if (heading) return heading;
    }
  }
  return null;
}
