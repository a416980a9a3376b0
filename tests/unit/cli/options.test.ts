import { describe, it, expect } from 'vitest';
import { Command, InvalidArgumentError } from 'commander';
import {
  addCommonOptions,
  addGlobalOptions,
  parsePositiveInteger,
} from '../../../src/cli/config/options.js';
import type { CommonCommandOptions } from '../../../src/cli/config/types.js';

async function parseLogLevel(argv: string[]): Promise<string | undefined> {
  let seen: string | undefined;
  const program = addGlobalOptions(new Command('couchlift').exitOverride());
  program.addCommand(
    addCommonOptions(new Command('compare')).action((options: CommonCommandOptions) => {
      seen = options.logLevel;
    }),
  );
  await program.parseAsync(argv, { from: 'user' });
  return seen;
}

describe('parsePositiveInteger()', () => {
  it('should accept positive integers', () => {
    expect(parsePositiveInteger('300')).toBe(300);
  });

  it('should reject zero and fractions', () => {
    expect(() => parsePositiveInteger('0')).toThrow(InvalidArgumentError);
    expect(() => parsePositiveInteger('1.5')).toThrow(InvalidArgumentError);
  });
});

describe('addGlobalOptions()', () => {
  it('should pass a program-level log level to the subcommand', async () => {
    expect(await parseLogLevel(['--log-level', 'debug', 'compare'])).toBe('debug');
  });

  it('should let the subcommand level win', async () => {
    expect(await parseLogLevel(['--log-level', 'debug', 'compare', '--log-level', 'warn'])).toBe('warn');
  });

  it('should leave the level unset when neither is given', async () => {
    expect(await parseLogLevel(['compare'])).toBeUndefined();
  });
});
