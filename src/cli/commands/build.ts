import { Command } from 'commander';
import { openSession, runOrExit, withCommonOptions, type CommonOptions } from './build-helpers.js';

/**
 * Create the build command.
 */
export function createBuildCommand(): Command {
  return withCommonOptions(
    new Command('build')
      .description('Build the app of a target')
      .argument('<target>', 'Target package name')
  ).action(async (targetName: string, options: CommonOptions) => {
    await runOrExit(async () => {
      const { builder } = await openSession(targetName, options);
      await builder.build();
    });
  });
}
