/**
 * Values handed to the renderer, tagged with the forms they can produce.
 */
import { inspect, type InspectOptions } from 'node:util';
import type { RenderMode } from '../template/types.js';

/**
 * Which text forms a value offers.
 * - `display`: short form only (its `toString`)
 * - `debug`: structured form only (`util.inspect`)
 * - `both`: either, chosen by the column's mode
 */
export type Capability = 'display' | 'debug' | 'both';

/**
 * A value borrowed for one render call.
 */
export interface FormattableItem {
  readonly capability: Capability;
  readonly value: unknown;
}

const COMPACT_DEBUG: InspectOptions = {
  depth: null,
  compact: true,
  breakLength: Infinity,
  colors: false,
};

const PRETTY_DEBUG: InspectOptions = {
  depth: null,
  compact: false,
  breakLength: 80,
  colors: false,
};

export function displayItem(value: unknown): FormattableItem {
  return { capability: 'display', value };
}

export function debugItem(value: unknown): FormattableItem {
  return { capability: 'debug', value };
}

export function item(value: unknown): FormattableItem {
  return { capability: 'both', value };
}

/**
 * Structured form. Objects customize it through `util.inspect.custom`.
 */
export function formatDebug(value: unknown, pretty: boolean): string {
  return inspect(value, pretty ? PRETTY_DEBUG : COMPACT_DEBUG);
}

/**
 * Short form. Objects without any `toString` (null-prototype objects) use the structured form.
 */
export function formatDisplay(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'object' && value !== null && !('toString' in value && typeof value.toString === 'function')) {
    return formatDebug(value, false);
  }
  return String(value);
}

/**
 * Render an item under a column mode, falling back to whichever form the item has.
 */
export function renderItem(formattable: FormattableItem, mode: RenderMode): string {
  switch (formattable.capability) {
    case 'display':
      return formatDisplay(formattable.value);
    case 'debug':
      return formatDebug(formattable.value, mode === 'pretty-debug');
    case 'both':
      return mode === 'display'
        ? formatDisplay(formattable.value)
        : formatDebug(formattable.value, mode === 'pretty-debug');
  }
}
