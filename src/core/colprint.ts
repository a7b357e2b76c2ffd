/**
 * Convenience entry points that tag plain values from the template and render them.
 */
import { parseTemplate } from './template/parser.js';
import { debugItem, displayItem, type FormattableItem } from './render/items.js';
import { ColumnFormatter } from './render/formatter.js';
import { createStreamSink } from './render/sink.js';

/**
 * Tag values by position: a value whose token asks for `:?` or `:#?` becomes a debug
 * item, anything else a display item. Values without a token are dropped.
 */
export function tagValues(template: string, values: readonly unknown[]): FormattableItem[] {
  return parseTemplate(template)
    .slice(0, values.length)
    .map((descriptor, i) => (descriptor.mode === 'display' ? displayItem(values[i]) : debugItem(values[i])));
}

/**
 * Render values side by side.
 *
 * @example
 * formatColumns('{} | {:?}', 'ab', { id: 1 });
 * // => "ab | { id: 1 }\n"
 */
export function formatColumns(template: string, ...values: unknown[]): string {
  return new ColumnFormatter(template, tagValues(template, values)).format();
}

/**
 * Print values side by side on stdout, followed by a line break.
 *
 * @throws RenderError when stdout fails
 */
export async function colprint(template: string, ...values: unknown[]): Promise<void> {
  const sink = createStreamSink(process.stdout);
  new ColumnFormatter(template, tagValues(template, values)).writeTo(sink);
  sink.write('\n');
  await sink.finish();
}
