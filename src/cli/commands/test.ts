import { Command } from 'commander';
import { logger as log } from '../../utils/logger.js';
import { openSession, runOrExit, withCommonOptions, type CommonOptions } from './build-helpers.js';

/**
 * Create the test command.
 */
export function createTestCommand(): Command {
  return withCommonOptions(
    new Command('test')
      .description('Build a package as a self-test executable for a target and run it')
      .argument('<target>', 'Target package name')
      .argument('<package>', 'Package to test')
  ).action(async (targetName: string, packageName: string, options: CommonOptions) => {
    await runOrExit(async () => {
      const { builder, repository } = await openSession(targetName, options);
      await builder.test(repository.require(packageName));
      log.success(`Tests passed for ${packageName}`);
    });
  });
}
