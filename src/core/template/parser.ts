/**
 * Template parser: turns `"{} | {:?:40} -> {:#?}"` into column descriptors.
 *
 * Parsing is permissive. An unterminated `{` swallows the rest of the template,
 * and mode detection is a substring check on the token text.
 */
import type { ColumnDescriptor, RenderMode, TemplatePart } from './types.js';

const IN_BRACE_WIDTH = /:(\d+)$/;

function isAsciiDigit(c: string): boolean {
  return c >= '0' && c <= '9';
}

/**
 * Split a template into format tokens and the separator text around them.
 * Works on code points so multi-byte characters are never split.
 */
export function scanTemplate(template: string): TemplatePart[] {
  const chars = Array.from(template);
  const parts: TemplatePart[] = [];

  let inFormat = false;
  let start = 0;

  for (let i = 0; i < chars.length; i++) {
    const c = chars[i];

    if (c === '{' && !inFormat) {
      if (i > start) {
        parts.push({ kind: 'separator', text: chars.slice(start, i).join('') });
      }
      start = i;
      inFormat = true;
    } else if (c === '}' && inFormat) {
      inFormat = false;
      const end = i + 1;
      const spec = chars.slice(start, end).join('');

      // `}:N` width suffix. The colon is consumed even without digits.
      let next = end;
      if (chars[end] === ':') {
        next = end + 1;
        while (next < chars.length && isAsciiDigit(chars[next])) {
          next++;
        }
        parts.push({ kind: 'format', spec, width: chars.slice(end + 1, next).join('') });
      } else {
        parts.push({ kind: 'format', spec });
      }

      start = next;
    }
  }

  if (start < chars.length) {
    parts.push({ kind: 'separator', text: chars.slice(start).join('') });
  }

  return parts;
}

/**
 * Classify a format token by substring: `:#?` wins over `:?`, anything else is display.
 */
export function detectRenderMode(spec: string): RenderMode {
  if (spec.includes(':#?')) {
    return 'pretty-debug';
  }
  if (spec.includes(':?')) {
    return 'debug';
  }
  return 'display';
}

/**
 * Parse a width digit run. Empty or out-of-range runs mean auto width.
 */
export function parseWidth(raw: string | undefined): number | undefined {
  if (raw === undefined || !/^\d+$/.test(raw)) {
    return undefined;
  }
  const width = Number.parseInt(raw, 10);
  return Number.isSafeInteger(width) ? width : undefined;
}

function innerText(spec: string): string {
  return spec.slice(1, -1);
}

/**
 * Width of a format part: the `}:N` suffix first, then a trailing `:N` inside the braces.
 */
function resolveWidth(part: Extract<TemplatePart, { kind: 'format' }>): number | undefined {
  const suffix = parseWidth(part.width);
  if (suffix !== undefined) {
    return suffix;
  }
  const match = IN_BRACE_WIDTH.exec(innerText(part.spec));
  return match ? parseWidth(match[1]) : undefined;
}

/**
 * Parse a template into column descriptors, in template order.
 *
 * A descriptor's separator is the text between its token and the next token. Text
 * before the first token or after the last one belongs to no column.
 */
export function parseTemplate(template: string): ColumnDescriptor[] {
  const parts = scanTemplate(template);
  const descriptors: ColumnDescriptor[] = [];

  let lastFormat = -1;
  parts.forEach((part, i) => {
    if (part.kind === 'format') {
      lastFormat = i;
    }
  });

  parts.forEach((part, i) => {
    if (part.kind !== 'format') {
      return;
    }

    const descriptor: ColumnDescriptor = { mode: detectRenderMode(innerText(part.spec)) };

    const width = resolveWidth(part);
    if (width !== undefined) {
      descriptor.width = width;
    }

    const next = i < lastFormat ? parts[i + 1] : undefined;
    if (next?.kind === 'separator') {
      descriptor.separator = next.text;
    }

    descriptors.push(descriptor);
  });

  return descriptors;
}
