import { describe, it, expect } from 'vitest';
import { ColumnFormatter } from '../../../../src/core/render/formatter.js';
import { displayItem, debugItem } from '../../../../src/core/render/items.js';
import { createStringSink } from '../../../../src/core/render/sink.js';

describe('ColumnFormatter', () => {
  const formatter = new ColumnFormatter('{:4} | {:?}', [displayItem('ab'), debugItem([1, 2])]);

  it('should expose the parsed descriptors', () => {
    expect(formatter.descriptors).toEqual([
      { mode: 'display', width: 4, separator: ' | ' },
      { mode: 'debug' },
    ]);
  });

  it('should format the block', () => {
    expect(formatter.format()).toBe('ab   | [ 1, 2 ]\n');
  });

  it('should format through template literals', () => {
    expect(`${formatter}`).toBe('ab   | [ 1, 2 ]\n');
  });

  it('should write the same block to a sink', () => {
    const sink = createStringSink();
    formatter.writeTo(sink);
    expect(sink.toString()).toBe('ab   | [ 1, 2 ]\n');
  });
});
