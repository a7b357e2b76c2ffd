import { parseTemplate } from '../template/parser.js';
import type { ColumnDescriptor } from '../template/types.js';
import type { FormattableItem } from './items.js';
import { renderColumns, writeColumns } from './renderer.js';
import type { TextSink } from './sink.js';

/**
 * A template bound to the items it lays out.
 *
 * @example
 * const formatter = new ColumnFormatter('{} | {:?}', [displayItem(report), debugItem(stats)]);
 * process.stdout.write(formatter.format());
 */
export class ColumnFormatter {
  private readonly columns: ColumnDescriptor[];

  constructor(
    template: string,
    private readonly items: readonly FormattableItem[]
  ) {
    this.columns = parseTemplate(template);
  }

  get descriptors(): readonly ColumnDescriptor[] {
    return this.columns;
  }

  format(): string {
    return renderColumns(this.columns, this.items);
  }

  writeTo(sink: TextSink): void {
    writeColumns(this.columns, this.items, sink);
  }

  toString(): string {
    return this.format();
  }
}
