import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { createBuildCommand } from './commands/build.js';
import { createCleanCommand } from './commands/clean.js';
import { createShowCommand } from './commands/show.js';
import { createTestCommand } from './commands/test.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const packageJson: unknown = JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'));
const VERSION =
  typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson && typeof packageJson.version === 'string'
    ? packageJson.version
    : '0.0.0';

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('kiln')
    .description('Build orchestrator for embedded C firmware')
    .version(VERSION);
  [createBuildCommand, createTestCommand, createCleanCommand, createShowCommand].forEach((cmd) =>
    program.addCommand(cmd())
  );
  return program;
}
