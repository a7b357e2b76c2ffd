import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { createRenderCommand } from './commands/render.js';
import { createParseCommand } from './commands/parse.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('colprint')
    .description('Print values side by side in aligned text columns')
    .version(readVersion());
  [createRenderCommand, createParseCommand].forEach((cmd) => program.addCommand(cmd()));
  return program;
}
