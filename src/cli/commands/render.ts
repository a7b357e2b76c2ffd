import { Command } from 'commander';
import * as path from 'node:path';
import { loadConfig } from '../../core/config/loader.js';
import type { InputConfig } from '../../core/config/schema.js';
import { tagValues } from '../../core/colprint.js';
import { ColumnFormatter } from '../../core/render/formatter.js';
import { createStreamSink } from '../../core/render/sink.js';
import { readFile } from '../../utils/file-system.js';
import { InputError, ErrorCodes } from '../../utils/errors.js';
import { logger as log } from '../../utils/logger.js';

/**
 * Create the render command.
 */
export function createRenderCommand(): Command {
  return new Command('render')
    .description('Render values side by side in aligned columns')
    .argument('[values...]', 'Values to render, one per column')
    .option('-t, --template <template>', 'Column template, e.g. "{} | {:?}"')
    .option('-c, --config <path>', 'Path to config file', '.colprint.yaml')
    .option('--json', 'Parse each value as JSON')
    .option('--files', 'Treat each value as a file path and render its contents')
    .action(async (values: string[], options: RenderOptions) => {
      try {
        await runRender(values, options);
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

interface RenderOptions {
  template?: string;
  config: string;
  json?: boolean;
  files?: boolean;
}

async function readValue(raw: string, input: InputConfig, projectRoot: string): Promise<unknown> {
  let text = raw;

  if (input.from_files) {
    const filePath = path.resolve(projectRoot, raw);
    try {
      text = await readFile(filePath);
    } catch (error) {
      throw new InputError(
        ErrorCodes.UNREADABLE_VALUE_FILE,
        `Cannot read value file ${filePath}: ${error instanceof Error ? error.message : 'Unknown error'}`,
        { filePath }
      );
    }
  }

  if (input.format === 'json') {
    try {
      return JSON.parse(text);
    } catch (error) {
      throw new InputError(
        ErrorCodes.INVALID_JSON_VALUE,
        `Value is not valid JSON: ${error instanceof Error ? error.message : 'Unknown error'}`,
        { value: raw }
      );
    }
  }

  return text;
}

async function runRender(values: string[], options: RenderOptions): Promise<void> {
  const projectRoot = process.cwd();
  const config = await loadConfig(projectRoot, options.config);
  log.setLevel(config.logging.level);
  log.debug('Loaded config', { path: path.resolve(projectRoot, options.config), level: config.logging.level });

  const template = options.template ?? config.default_template;
  if (template === undefined) {
    throw new InputError(
      ErrorCodes.MISSING_TEMPLATE,
      'No template given: pass --template or set default_template in the config'
    );
  }
  log.info(`Using template ${JSON.stringify(template)}${options.template === undefined ? ' from config' : ''}`);

  const input: InputConfig = {
    format: options.json ? 'json' : config.input.format,
    from_files: options.files ?? config.input.from_files,
  };
  log.debug('Resolving values', { count: values.length, ...input });

  const resolved: unknown[] = [];
  for (const raw of values) {
    resolved.push(await readValue(raw, input, projectRoot));
  }

  const sink = createStreamSink(process.stdout);
  new ColumnFormatter(template, tagValues(template, resolved)).writeTo(sink);
  if (config.output.trailing_newline) {
    sink.write('\n');
  }
  await sink.finish();
}
