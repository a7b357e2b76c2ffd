/**
 * Types produced by template parsing.
 */

/**
 * How a column renders its value.
 * - `display`: short form (`{}`)
 * - `debug`: structured single-line form (`{:?}`)
 * - `pretty-debug`: structured, expanded multi-line form (`{:#?}`)
 */
export type RenderMode = 'display' | 'debug' | 'pretty-debug';

/**
 * One column, in template order.
 */
export interface ColumnDescriptor {
  mode: RenderMode;
  /** Fixed width in Unicode scalars; auto-sized from content when absent */
  width?: number;
  /** Literal text between this column's token and the next one */
  separator?: string;
}

/**
 * A slice of the template as produced by the scanner.
 */
export type TemplatePart =
  | {
      kind: 'format';
      /** The token text, braces included */
      spec: string;
      /** Raw digit run of a `}:N` suffix; present (possibly empty) when a `:` followed the token */
      width?: string;
    }
  | {
      kind: 'separator';
      text: string;
    };
