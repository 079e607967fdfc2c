import type { Granularity } from '../../shared/types';

// Characters that end a line, matching the usual universal-newline set.
const LINE_BREAKS = new Set(['\n', '\r', '\v', '\f', '\x1c', '\x1d', '\x1e', '\x85', '\u2028', '\u2029']);

/**
 * Split text into lines, each keeping its terminator, so that joining the
 * result gives back the input. `\r\n` counts as a single terminator.
 */
export function splitLines(text: string): string[] {
  const lines: string[] = [];
  let start = 0;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (!LINE_BREAKS.has(ch)) continue;

    if (ch === '\r' && text[i + 1] === '\n') {
      i++;
    }
    lines.push(text.slice(start, i + 1));
    start = i + 1;
  }

  if (start < text.length) {
    lines.push(text.slice(start));
  }

  return lines;
}

/** Code points, so astral characters are a single unit. */
export function splitChars(text: string): string[] {
  return Array.from(text);
}

export function toUnits(text: string, granularity: Granularity): string[] {
  return granularity === 'line' ? splitLines(text) : splitChars(text);
}

export function codePointLength(text: string): number {
  return Array.from(text).length;
}
