/**
 * Show command: resolve a target without compiling and print what would be
 * built.
 */
import { Command } from 'commander';
import chalk from 'chalk';
import type { BuildReport } from '../../core/builder/builder.js';
import { openSession, runOrExit, withCommonOptions, type CommonOptions } from './build-helpers.js';

interface ShowOptions extends CommonOptions {
  json?: boolean;
}

/**
 * Create the show command.
 */
export function createShowCommand(): Command {
  return withCommonOptions(
    new Command('show')
      .description('Resolve a target and show its packages, features and APIs')
      .argument('<target>', 'Target package name')
      .option('--json', 'Output as JSON')
  ).action(async (targetName: string, options: ShowOptions) => {
    await runOrExit(async () => {
      const { builder } = await openSession(targetName, options);
      builder.prepare();
      const report = builder.report();

      if (options.json) {
        console.log(JSON.stringify(report, null, 2));
        return;
      }
      printReport(report);
    });
  });
}

export function printReport(report: BuildReport): void {
  console.log();
  console.log(chalk.bold(`Target ${report.target}`) + chalk.dim(` (arch ${report.arch})`));
  console.log(chalk.dim('─'.repeat(40)));

  console.log(chalk.bold('Packages'));
  for (const pkg of report.packages) {
    console.log(`  ${chalk.cyan(pkg.fullName)}`);
    if (pkg.deps.length > 0) console.log(chalk.dim(`    deps:     ${pkg.deps.join(' ')}`));
    if (pkg.apis.length > 0) console.log(chalk.dim(`    apis:     ${pkg.apis.join(' ')}`));
    if (pkg.reqApis.length > 0) console.log(chalk.dim(`    req_apis: ${pkg.reqApis.join(' ')}`));
    if (pkg.features.length > 0) console.log(chalk.dim(`    features: ${pkg.features.join(' ')}`));
  }

  console.log();
  console.log(chalk.bold('Features'));
  console.log(`  ${report.features.length > 0 ? report.features.join(' ') : chalk.dim('(none)')}`);

  console.log();
  console.log(chalk.bold('APIs'));
  if (report.apis.length === 0) {
    console.log(chalk.dim('  (none)'));
  }
  for (const { api, provider } of report.apis) {
    console.log(`  ${api} ${chalk.dim('←')} ${provider}`);
  }

  console.log();
  console.log(
    chalk.dim(`Resolved in ${report.resolution.passes} passes (${report.resolution.restarts} restarts)`)
  );
}
