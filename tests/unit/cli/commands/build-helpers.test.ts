import { describe, it, expect } from 'vitest';
import { Command } from 'commander';
import {
  formatError,
  resolveVerbosity,
  withCommonOptions,
} from '../../../../src/cli/commands/build-helpers.js';
import { getDefaultConfig } from '../../../../src/core/config/loader.js';
import { ConfigurationError, ErrorCodes } from '../../../../src/utils/errors.js';
import { createCli } from '../../../../src/cli/index.js';

describe('resolveVerbosity', () => {
  const config = getDefaultConfig();

  it('should prefer flags over the configured verbosity', () => {
    expect(resolveVerbosity({ config: '', verbose: true }, config)).toBe('verbose');
    expect(resolveVerbosity({ config: '', quiet: true }, config)).toBe('quiet');
  });

  it('should fall back to the configured verbosity', () => {
    const quietConfig = getDefaultConfig();
    quietConfig.output.verbosity = 'silent';

    expect(resolveVerbosity({ config: '' }, config)).toBe('default');
    expect(resolveVerbosity({ config: '' }, quietConfig)).toBe('silent');
  });
});

describe('formatError', () => {
  it('should prefix kiln errors with their code', () => {
    const error = new ConfigurationError(ErrorCodes.BSP_NOT_FOUND, 'BSP package not found: hw/bsp/x');

    expect(formatError(error)).toBe('BSP_NOT_FOUND: BSP package not found: hw/bsp/x');
  });

  it('should print other errors as their message', () => {
    expect(formatError(new Error('boom'))).toBe('boom');
    expect(formatError('boom')).toBe('Unknown error');
  });
});

describe('withCommonOptions', () => {
  it('should parse the shared flags', () => {
    const command = withCommonOptions(new Command('x').argument('<target>')).exitOverride();

    command.parse(['node', 'x', 'targets/t', '-q', '--debug', '-c', 'alt.yaml'], { from: 'node' });

    expect(command.opts()).toEqual({ config: 'alt.yaml', quiet: true, debug: true });
  });

  it('should default the config path', () => {
    const command = withCommonOptions(new Command('x').argument('<target>')).exitOverride();

    command.parse(['targets/t'], { from: 'user' });

    expect(command.opts()).toEqual({ config: '.kiln/config.yaml' });
  });
});

describe('createCli', () => {
  it('should register the build commands', () => {
    expect(createCli().commands.map((c) => c.name())).toEqual(['build', 'test', 'clean', 'show']);
  });
});
