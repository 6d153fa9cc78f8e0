/**
 * External command execution with an explicit working directory and timeout.
 */
import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

const execFileAsync = promisify(execFile);

/** Output is buffered; compiler diagnostics can be large. */
const MAX_BUFFER_BYTES = 64 * 1024 * 1024;

export interface RunOptions {
  /** Working directory for the child process. */
  cwd: string;
  /** Kill the child after this many milliseconds (0 disables). */
  timeoutMs: number;
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  /** True when the child was killed because the timeout expired. */
  timedOut: boolean;
}

/**
 * Runs an external command. Signature shared by the toolchain and the test
 * executor so both can be replaced in tests.
 */
export type CommandRunner = (
  command: string,
  args: string[],
  options: RunOptions
) => Promise<CommandResult>;

interface ExecFailure {
  code?: number | string | null;
  killed?: boolean;
  signal?: string | null;
  stdout?: string;
  stderr?: string;
}

function isExecFailure(error: unknown): error is Error & ExecFailure {
  return error instanceof Error && ('stdout' in error || 'killed' in error);
}

/**
 * Run a command to completion.
 * A non-zero exit or a timeout is reported in the result; failing to spawn
 * the command at all (missing executable, bad cwd) rejects.
 */
export const runCommand: CommandRunner = async (command, args, options) => {
  try {
    const { stdout, stderr } = await execFileAsync(command, args, {
      cwd: options.cwd,
      encoding: 'utf-8',
      timeout: options.timeoutMs,
      maxBuffer: MAX_BUFFER_BYTES,
    });
    return { exitCode: 0, stdout, stderr, timedOut: false };
  } catch (error) {
    if (!isExecFailure(error) || typeof error.code === 'string') {
      throw error;
    }
    const timedOut = error.killed === true && options.timeoutMs > 0;
    return {
      exitCode: typeof error.code === 'number' ? error.code : -1,
      stdout: error.stdout ?? '',
      stderr: error.stderr ?? '',
      timedOut,
    };
  }
};

/**
 * Render a command line for status output.
 */
export function formatCommand(command: string, args: string[]): string {
  return [command, ...args].join(' ');
}

/**
 * Combined stdout and stderr, trimmed.
 */
export function combinedOutput(result: CommandResult): string {
  return [result.stdout, result.stderr]
    .map((s) => s.trim())
    .filter((s) => s.length > 0)
    .join('\n');
}
