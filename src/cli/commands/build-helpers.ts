/**
 * Setup shared by the build, test, clean and show commands.
 */
import * as path from 'node:path';
import { Command } from 'commander';
import { DEFAULT_CONFIG_PATH, loadConfig } from '../../core/config/loader.js';
import type { Config } from '../../core/config/schema.js';
import { Builder } from '../../core/builder/builder.js';
import { PackageRepository } from '../../core/packages/repository.js';
import { GccToolchainFactory } from '../../core/toolchain/gcc-toolchain.js';
import { KilnError } from '../../utils/errors.js';
import { logger as log, type Verbosity } from '../../utils/logger.js';

export interface CommonOptions {
  config: string;
  quiet?: boolean;
  verbose?: boolean;
  debug?: boolean;
}

export interface BuildSession {
  projectRoot: string;
  config: Config;
  repository: PackageRepository;
  builder: Builder;
}

/**
 * Attach the options every build command accepts.
 */
export function withCommonOptions(command: Command): Command {
  return command
    .option('-c, --config <path>', 'Path to config file', DEFAULT_CONFIG_PATH)
    .option('-q, --quiet', 'Only print essential status messages')
    .option('-v, --verbose', 'Print every status message')
    .option('--debug', 'Enable debug logging');
}

/**
 * Verbosity from flags, falling back to the configured one.
 */
export function resolveVerbosity(options: CommonOptions, config: Config): Verbosity {
  if (options.verbose) return 'verbose';
  if (options.quiet) return 'quiet';
  return config.output.verbosity;
}

/**
 * Load config and packages from the working directory and create a builder
 * for `targetName`.
 */
export async function openSession(targetName: string, options: CommonOptions): Promise<BuildSession> {
  const projectRoot = process.cwd();
  if (options.debug) {
    log.setLevel('debug');
  }

  const config = await loadConfig(projectRoot, options.config);
  log.setVerbosity(resolveVerbosity(options, config));

  const repository = await PackageRepository.load(projectRoot, config);
  const target = repository.target(targetName);
  const builder = new Builder(target, {
    repository,
    binRoot: path.resolve(projectRoot, config.build.bin_dir),
    toolchain: new GccToolchainFactory({ timeoutMs: config.toolchain.timeout_ms }),
    testTimeoutMs: config.test.timeout_ms,
  });

  return { projectRoot, config, repository, builder };
}

/**
 * One line per error: `CODE: message` for kiln errors.
 */
export function formatError(error: unknown): string {
  if (error instanceof KilnError) {
    return `${error.code}: ${error.message}`;
  }
  return error instanceof Error ? error.message : 'Unknown error';
}

/**
 * Run a command body, reporting any failure and exiting with status 1.
 */
export async function runOrExit(body: () => Promise<void>): Promise<void> {
  try {
    await body();
  } catch (error) {
    log.error(formatError(error));
    process.exit(1);
  }
}
