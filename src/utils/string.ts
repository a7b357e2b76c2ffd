/**
 * String utilities that count and cut in Unicode scalar values, never UTF-16 code units.
 */

/**
 * Number of Unicode scalar values in a string.
 * A surrogate pair counts once.
 */
export function scalarLength(str: string): number {
  let count = 0;
  for (const _ of str) {
    count++;
  }
  return count;
}

/**
 * Fit a string to exactly `width` scalars: truncate (no ellipsis) or right-pad with spaces.
 */
export function fitToWidth(str: string, width: number): string {
  if (width <= 0) {
    return '';
  }

  const chars = Array.from(str);
  if (chars.length > width) {
    return chars.slice(0, width).join('');
  }

  return str + ' '.repeat(width - chars.length);
}

/**
 * Split text into lines.
 *
 * Breaks on `\n` and drops one `\r` right before each `\n`. A trailing line break
 * does not start another line, so `''` has no lines and `'a\n'` has one. A `\r`
 * that ends the text without a following `\n` stays part of the last line.
 */
export function splitLines(text: string): string[] {
  if (text === '') {
    return [];
  }

  const segments = text.split('\n');
  const last = segments.pop() ?? '';
  const lines = segments.map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line));

  if (last !== '') {
    lines.push(last);
  }
  return lines;
}
