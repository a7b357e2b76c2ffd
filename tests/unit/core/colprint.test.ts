/**
 * Tests for the convenience entry points.
 */
import { describe, it, expect, vi, afterEach } from 'vitest';
import { tagValues, formatColumns, colprint } from '../../../src/core/colprint.js';
import { RenderError } from '../../../src/utils/errors.js';

describe('tagValues', () => {
  it('should tag values by their token mode', () => {
    const items = tagValues('{} {:?} {:#?}', [1, 2, 3]);
    expect(items.map((i) => i.capability)).toEqual(['display', 'debug', 'debug']);
    expect(items.map((i) => i.value)).toEqual([1, 2, 3]);
  });

  it('should drop values beyond the token count', () => {
    expect(tagValues('{}', ['a', 'b'])).toHaveLength(1);
  });

  it('should return fewer items when values run out', () => {
    expect(tagValues('{}{}{}', ['a'])).toHaveLength(1);
  });
});

describe('formatColumns', () => {
  it('should render display and debug columns', () => {
    expect(formatColumns('{} | {:?}', 'ab', { id: 1 })).toBe('ab | { id: 1 }\n');
  });

  it('should quote strings in debug columns', () => {
    expect(formatColumns('{:?}', 'ab')).toBe("'ab'\n");
  });

  it('should expand pretty debug columns at a fixed width', () => {
    expect(formatColumns('{:#?:8}|{}', { a: 1 }, 'x')).toBe('{       |x\n  a: 1  | \n}       | \n');
  });

  it('should return empty text for an empty template', () => {
    expect(formatColumns('', 'a')).toBe('');
  });
});

/** Stand-in for `process.stdout.write` that accepts every chunk at once. */
function acceptWrite(...args: unknown[]): boolean {
  const callback = args.find((arg): arg is (error?: Error | null) => void => typeof arg === 'function');
  callback?.();
  return true;
}

describe('colprint', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should print the block followed by a line break', async () => {
    const writeSpy = vi.spyOn(process.stdout, 'write').mockImplementation(acceptWrite);

    await colprint('{}|{}', 'a', 'b');

    const output = writeSpy.mock.calls.map((call) => String(call[0])).join('');
    expect(output).toBe('a|b\n\n');
  });

  it('should reject with a render error when stdout fails', async () => {
    vi.spyOn(process.stdout, 'write').mockImplementation((...args: unknown[]) => {
      const callback = args.find((arg): arg is (error?: Error | null) => void => typeof arg === 'function');
      callback?.(new Error('EPIPE'));
      return false;
    });

    await expect(colprint('{}', 'a')).rejects.toBeInstanceOf(RenderError);
  });
});
