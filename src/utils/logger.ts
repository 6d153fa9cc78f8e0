/**
 * Structured logging infrastructure.
 *
 * Two independent knobs: `level` filters debug/info/warn/error lines,
 * `verbosity` filters build status messages.
 */
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

/** Build status verbosity, from least to most chatty. */
export type Verbosity = 'silent' | 'quiet' | 'default' | 'verbose';

const VERBOSITY_LEVELS: Record<Verbosity, number> = {
  silent: 0,
  quiet: 1,
  default: 2,
  verbose: 3,
};

/**
 * Simple structured logger for the kiln CLI.
 */
class Logger {
  private level: LogLevel = 'info';
  private verbosity: Verbosity = 'default';

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  setVerbosity(verbosity: Verbosity): void {
    this.verbosity = verbosity;
  }

  getVerbosity(): Verbosity {
    return this.verbosity;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  /**
   * Print a build status message if the current verbosity admits it.
   * A message tagged `quiet` is shown at every verbosity except `silent`.
   */
  status(verbosity: Exclude<Verbosity, 'silent'>, message: string): void {
    if (VERBOSITY_LEVELS[verbosity] > VERBOSITY_LEVELS[this.verbosity]) return;
    console.log(message);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('debug')) return;
    console.log(chalk.gray(`[DEBUG] ${message}`));
    if (data) {
      console.log(chalk.gray(JSON.stringify(data, null, 2)));
    }
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('info')) return;
    console.log(chalk.blue(`[INFO] ${message}`));
    if (data) {
      console.log(chalk.blue(JSON.stringify(data, null, 2)));
    }
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('warn')) return;
    console.warn(chalk.yellow(`[WARN] ${message}`));
    if (data) {
      console.warn(chalk.yellow(JSON.stringify(data, null, 2)));
    }
  }

  error(message: string, error?: Error | Record<string, unknown>): void {
    if (!this.shouldLog('error')) return;
    console.error(chalk.red(`[ERROR] ${message}`));
    if (error) {
      if (error instanceof Error) {
        console.error(chalk.red(error.stack || error.message));
      } else {
        console.error(chalk.red(JSON.stringify(error, null, 2)));
      }
    }
  }

  /**
   * Log a success message (always shown unless silent).
   */
  success(message: string): void {
    if (!this.shouldLog('info')) return;
    console.log(chalk.green(`✓ ${message}`));
  }
}

// Singleton instance
export const logger = new Logger();

export { Logger };
