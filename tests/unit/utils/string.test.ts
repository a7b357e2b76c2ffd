/**
 * Tests for scalar-aware string utilities.
 */
import { describe, it, expect } from 'vitest';
import { scalarLength, fitToWidth, splitLines } from '../../../src/utils/string.js';

describe('scalarLength', () => {
  it('should count ASCII characters', () => {
    expect(scalarLength('abc')).toBe(3);
    expect(scalarLength('')).toBe(0);
  });

  it('should count a surrogate pair once', () => {
    expect(scalarLength('😀a')).toBe(2);
  });

  it('should count multi-byte characters once', () => {
    expect(scalarLength('日本語')).toBe(3);
  });
});

describe('fitToWidth', () => {
  it('should pad short strings with spaces', () => {
    expect(fitToWidth('ab', 4)).toBe('ab  ');
  });

  it('should truncate long strings without ellipsis', () => {
    expect(fitToWidth('abcdef', 3)).toBe('abc');
  });

  it('should return exact-width strings unchanged', () => {
    expect(fitToWidth('abc', 3)).toBe('abc');
  });

  it('should never split a surrogate pair', () => {
    expect(fitToWidth('😀😁', 1)).toBe('😀');
  });

  it('should pad by scalars, not code units', () => {
    expect(fitToWidth('😀', 3)).toBe('😀  ');
  });

  it('should return empty string for zero or negative width', () => {
    expect(fitToWidth('x', 0)).toBe('');
    expect(fitToWidth('x', -1)).toBe('');
  });
});

describe('splitLines', () => {
  it('should return no lines for empty text', () => {
    expect(splitLines('')).toEqual([]);
  });

  it('should split on line feeds', () => {
    expect(splitLines('a\nb')).toEqual(['a', 'b']);
  });

  it('should not add a line for a trailing line break', () => {
    expect(splitLines('a\n')).toEqual(['a']);
  });

  it('should keep interior empty lines', () => {
    expect(splitLines('a\n\nb')).toEqual(['a', '', 'b']);
    expect(splitLines('\n')).toEqual(['']);
  });

  it('should strip a carriage return before each line feed', () => {
    expect(splitLines('a\r\nb\r\n')).toEqual(['a', 'b']);
  });

  it('should keep a carriage return that is not followed by a line feed', () => {
    expect(splitLines('a\r')).toEqual(['a\r']);
    expect(splitLines('a\r\nb\r')).toEqual(['a', 'b\r']);
  });
});
