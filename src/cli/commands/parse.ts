import { Command } from 'commander';
import { parseTemplate } from '../../core/template/parser.js';
import type { ColumnDescriptor } from '../../core/template/types.js';
import { formatColumns } from '../../core/colprint.js';
import { logger as log } from '../../utils/logger.js';

/**
 * Create the parse command.
 */
export function createParseCommand(): Command {
  return new Command('parse')
    .description('Show the columns a template describes')
    .argument('<template>', 'Column template to inspect')
    .option('--json', 'Output as JSON')
    .action((template: string, options: ParseOptions) => {
      runParse(template, options);
    });
}

interface ParseOptions {
  json?: boolean;
}

/**
 * Lay the descriptors out as a table, one column per field.
 */
export function formatDescriptorTable(descriptors: readonly ColumnDescriptor[]): string {
  const column = (header: string, cells: string[]): string => [header, ...cells].join('\n');

  return formatColumns(
    '{}  {}  {}  {}',
    column('#', descriptors.map((_, i) => String(i + 1))),
    column('MODE', descriptors.map((d) => d.mode)),
    column('WIDTH', descriptors.map((d) => (d.width === undefined ? 'auto' : String(d.width)))),
    column('SEPARATOR', descriptors.map((d) => (d.separator === undefined ? '-' : JSON.stringify(d.separator))))
  );
}

function runParse(template: string, options: ParseOptions): void {
  const descriptors = parseTemplate(template);

  if (options.json) {
    console.log(JSON.stringify(descriptors, null, 2));
    return;
  }

  if (descriptors.length === 0) {
    log.warn('No columns found in template');
    return;
  }

  process.stdout.write(formatDescriptorTable(descriptors));
}
