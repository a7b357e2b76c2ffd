/**
 * Tests for the parse command.
 */
import { describe, it, expect, vi, beforeEach } from 'vitest';
import { createParseCommand, formatDescriptorTable } from '../../../../src/cli/commands/parse.js';
import { parseTemplate } from '../../../../src/core/template/parser.js';

vi.mock('../../../../src/utils/logger.js', () => ({
  logger: {
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
  },
}));

const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
const writeSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

const EXPECTED_TABLE = [
  '#  MODE     WIDTH  SEPARATOR',
  '1  display  auto   " | "    ',
  '2  debug    12     -        ',
  '',
].join('\n');

describe('parse command', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should create a command with correct name and argument', () => {
    const command = createParseCommand();
    expect(command.name()).toBe('parse');
    expect(command.registeredArguments[0].name()).toBe('template');
    expect(command.registeredArguments[0].required).toBe(true);
  });

  it('should print descriptors as JSON', async () => {
    await createParseCommand().parseAsync(['node', 'test', '{} | {:?}:12', '--json']);

    expect(consoleSpy).toHaveBeenCalledWith(
      JSON.stringify([{ mode: 'display', separator: ' | ' }, { mode: 'debug', width: 12 }], null, 2)
    );
  });

  it('should print a descriptor table', async () => {
    await createParseCommand().parseAsync(['node', 'test', '{} | {:?}:12']);

    expect(writeSpy).toHaveBeenCalledWith(EXPECTED_TABLE);
  });

  it('should warn when the template has no columns', async () => {
    const { logger } = await import('../../../../src/utils/logger.js');

    await createParseCommand().parseAsync(['node', 'test', 'no tokens here']);

    expect(logger.warn).toHaveBeenCalledWith('No columns found in template');
    expect(writeSpy).not.toHaveBeenCalled();
  });

  describe('formatDescriptorTable', () => {
    it('should lay out one row per descriptor', () => {
      expect(formatDescriptorTable(parseTemplate('{} | {:?}:12'))).toBe(EXPECTED_TABLE);
    });
  });
});
