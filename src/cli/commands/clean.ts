import { Command } from 'commander';
import { openSession, runOrExit, withCommonOptions, type CommonOptions } from './build-helpers.js';

/**
 * Create the clean command.
 */
export function createCleanCommand(): Command {
  return withCommonOptions(
    new Command('clean')
      .description("Remove a target's build output")
      .argument('<target>', 'Target package name')
  ).action(async (targetName: string, options: CommonOptions) => {
    await runOrExit(async () => {
      const { builder } = await openSession(targetName, options);
      await builder.clean();
    });
  });
}
