/**
 * Column renderer: lays rendered cells side by side, row N of the output being
 * row N of every cell, each padded or truncated to its column's width.
 */
import type { ColumnDescriptor } from '../template/types.js';
import { renderItem, type FormattableItem } from './items.js';
import { createStringSink, toRenderError, type TextSink } from './sink.js';
import { fitToWidth, scalarLength, splitLines } from '../../utils/string.js';

/**
 * Render each paired item under its column's mode and split it into lines.
 * Pairs by position; extra descriptors or items are dropped.
 */
export function renderCells(
  descriptors: readonly ColumnDescriptor[],
  items: readonly FormattableItem[]
): string[][] {
  const count = Math.min(descriptors.length, items.length);
  const cells: string[][] = [];
  for (let i = 0; i < count; i++) {
    cells.push(splitLines(renderItem(items[i], descriptors[i].mode)));
  }
  return cells;
}

/**
 * Explicit width when given, otherwise the longest line of the column's own cell.
 */
export function computeColumnWidths(
  descriptors: readonly ColumnDescriptor[],
  cells: readonly string[][]
): number[] {
  return cells.map((lines, i) => {
    const explicit = descriptors[i].width;
    if (explicit !== undefined) {
      return explicit;
    }
    return lines.reduce((max, line) => Math.max(max, scalarLength(line)), 0);
  });
}

function emit(sink: TextSink, chunk: string): void {
  try {
    sink.write(chunk);
  } catch (error) {
    throw toRenderError(error);
  }
}

/**
 * Write the aligned block to a sink, one chunk per cell line and separator.
 *
 * @throws RenderError when the sink fails; chunks written before the failure remain.
 */
export function writeColumns(
  descriptors: readonly ColumnDescriptor[],
  items: readonly FormattableItem[],
  sink: TextSink
): void {
  const cells = renderCells(descriptors, items);
  if (cells.length === 0) {
    return;
  }

  const widths = computeColumnWidths(descriptors, cells);
  const rowCount = cells.reduce((max, lines) => Math.max(max, lines.length), 0);
  const last = cells.length - 1;

  for (let row = 0; row < rowCount; row++) {
    cells.forEach((lines, col) => {
      emit(sink, fitToWidth(row < lines.length ? lines[row] : '', widths[col]));

      const separator = descriptors[col].separator;
      if (col < last && separator !== undefined) {
        emit(sink, separator);
      }
    });
    emit(sink, '\n');
  }
}

/**
 * Render the aligned block as a string.
 */
export function renderColumns(
  descriptors: readonly ColumnDescriptor[],
  items: readonly FormattableItem[]
): string {
  const sink = createStringSink();
  writeColumns(descriptors, items, sink);
  return sink.toString();
}
