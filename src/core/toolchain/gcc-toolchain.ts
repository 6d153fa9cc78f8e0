/**
 * gcc-compatible toolchain driver: compiles C and assembly sources into
 * objects, archives them with `ar`, links archives into an executable.
 */
import * as path from 'node:path';
import { CompileError, LinkError } from '../../utils/errors.js';
import { ensureDir, globFiles, modifiedTime, removeFile } from '../../utils/file-system.js';
import { logger, type Logger } from '../../utils/logger.js';
import { patternMatches } from '../../utils/pattern-matcher.js';
import {
  combinedOutput,
  formatCommand,
  runCommand,
  type CommandResult,
  type CommandRunner,
} from '../../utils/process.js';
import { CompilerInfo } from '../builder/compiler-info.js';
import { readCompilerConfig, type CompilerConfig } from './compiler-config.js';
import type { SourceKind, ToolchainDriver, ToolchainFactory, ToolchainOptions } from './types.js';

const SOURCE_PATTERNS: Record<SourceKind, string[]> = {
  c: ['**/*.c'],
  asm: ['**/*.s', '**/*.S'],
};

export interface GccToolchainOptions {
  baseDir: string;
  objectDir: string;
  /** Per-command timeout; 0 disables it. */
  timeoutMs: number;
  runner?: CommandRunner;
  logger?: Logger;
}

export class GccToolchain implements ToolchainDriver {
  private readonly info: CompilerInfo;
  private readonly extraDeps: string[] = [];
  /** Objects for every source seen by this driver, rebuilt or not. */
  private readonly objects = new Set<string>();
  private readonly runner: CommandRunner;
  private readonly log: Logger;

  constructor(
    private readonly config: CompilerConfig,
    private readonly options: GccToolchainOptions
  ) {
    // Compiler defaults sit underneath everything merged later.
    this.info = CompilerInfo.from({
      cflags: config.cflags,
      aflags: config.aflags,
      lflags: config.lflags,
    });
    this.runner = options.runner ?? runCommand;
    this.log = options.logger ?? logger;
  }

  /** Snapshot of the settings in effect. */
  settings(): CompilerInfo {
    return this.info.clone();
  }

  addInfo(info: CompilerInfo): void {
    this.info.merge(info);
  }

  addDeps(...files: string[]): void {
    this.extraDeps.push(...files);
  }

  async recursiveCompile(
    sourceRoot: string,
    kind: SourceKind,
    ignoreDirs: readonly string[]
  ): Promise<void> {
    const sources = await globFiles(SOURCE_PATTERNS[kind], {
      cwd: sourceRoot,
      ignore: ignoreDirs.map((dir) => `**/${dir}/**`),
    });

    for (const source of sources) {
      if (this.isIgnored(path.relative(sourceRoot, source))) {
        this.log.debug(`Ignoring ${source}`);
        continue;
      }
      await this.compileFile(source, kind, sourceRoot);
    }
  }

  async archive(outputPath: string): Promise<void> {
    // Removed first so a package without objects leaves no archive behind.
    await removeFile(outputPath);

    const objects = [...this.objects].sort();
    if (objects.length === 0) {
      this.log.debug(`No objects to archive for ${outputPath}`);
      return;
    }

    await ensureDir(path.dirname(outputPath));
    this.log.status('verbose', `Archiving ${path.basename(outputPath)}`);
    const args = ['rcs', outputPath, ...objects];
    const result = await this.run(this.config.ar, args, this.options.objectDir, (cause) =>
      new CompileError(`Failed to archive ${outputPath}`, { output: outputPath }, cause)
    );
    if (result.exitCode !== 0 || result.timedOut) {
      throw new CompileError(failureMessage(`Archiving ${outputPath} failed`, result), {
        output: outputPath,
        command: formatCommand(this.config.ar, args),
      });
    }
  }

  async link(outputPath: string, archives: readonly string[]): Promise<void> {
    await ensureDir(path.dirname(outputPath));

    const args = ['-o', outputPath, ...this.info.lflags];
    if (this.info.linkerScript) {
      args.push('-T', this.info.linkerScript);
    }
    args.push('-Wl,--start-group', ...archives, '-Wl,--end-group');

    this.log.status('default', `Linking ${path.basename(outputPath)}`);
    this.log.debug(formatCommand(this.config.cc, args));
    const result = await this.run(this.config.cc, args, path.dirname(outputPath), (cause) =>
      new LinkError(`Failed to link ${outputPath}`, { output: outputPath }, cause)
    );
    if (result.exitCode !== 0 || result.timedOut) {
      throw new LinkError(failureMessage(`Linking ${outputPath} failed`, result), {
        output: outputPath,
        command: formatCommand(this.config.cc, args),
      });
    }
  }

  /**
   * Object path for a source: its path relative to the base directory, under
   * the object directory, with a `.o` extension.
   */
  objectPath(source: string): string {
    const relative = path.relative(this.options.baseDir, source);
    const parsed = path.parse(relative);
    return path.join(this.options.objectDir, parsed.dir, `${parsed.name}.o`);
  }

  private async compileFile(source: string, kind: SourceKind, cwd: string): Promise<void> {
    const object = this.objectPath(source);
    this.objects.add(object);

    if (!(await this.isStale(source, object))) {
      this.log.debug(`Up to date: ${object}`);
      return;
    }

    await ensureDir(path.dirname(object));
    const command = kind === 'c' ? this.config.cc : this.config.as;
    const args = this.compileArgs(source, object, kind);

    this.log.status('default', `Compiling ${path.basename(source)}`);
    this.log.debug(formatCommand(command, args));
    const result = await this.run(command, args, cwd, (cause) =>
      new CompileError(`Failed to compile ${source}`, { file: source }, cause)
    );
    if (result.exitCode !== 0 || result.timedOut) {
      throw new CompileError(failureMessage(`Compiling ${source} failed`, result), {
        file: source,
        command: formatCommand(command, args),
      });
    }
  }

  private compileArgs(source: string, object: string, kind: SourceKind): string[] {
    const args = [...this.info.cflags];
    if (kind === 'asm') {
      args.push(...this.info.aflags, '-x', 'assembler-with-cpp');
    }
    args.push(...this.info.includes.map((dir) => `-I${dir}`));
    args.push('-c', '-o', object, source);
    return args;
  }

  /**
   * An object is stale when missing, or older than its source or any
   * registered extra dependency.
   */
  private async isStale(source: string, object: string): Promise<boolean> {
    const objectTime = await modifiedTime(object);
    if (objectTime === null) return true;

    for (const dep of [source, ...this.extraDeps]) {
      const depTime = await modifiedTime(dep);
      if (depTime !== null && depTime > objectTime) return true;
    }
    return false;
  }

  private isIgnored(relativeSource: string): boolean {
    const parsed = path.parse(relativeSource);
    if (this.info.ignoreFiles.some((pattern) => patternMatches(pattern, parsed.base))) {
      return true;
    }
    const dirs = parsed.dir.split(path.sep).filter((d) => d.length > 0);
    return dirs.some((dir) => this.info.ignoreDirs.some((pattern) => patternMatches(pattern, dir)));
  }

  private async run(
    command: string,
    args: string[],
    cwd: string,
    wrap: (cause: unknown) => Error
  ): Promise<CommandResult> {
    try {
      return await this.runner(command, args, { cwd, timeoutMs: this.options.timeoutMs });
    } catch (error) {
      throw wrap(error);
    }
  }
}

function failureMessage(summary: string, result: CommandResult): string {
  const reason = result.timedOut ? ' (timed out)' : ` (exit code ${result.exitCode})`;
  const output = combinedOutput(result);
  return output ? `${summary}${reason}:\n${output}` : `${summary}${reason}`;
}

/**
 * Creates a GccToolchain per compile unit from the compiler package.
 */
export class GccToolchainFactory implements ToolchainFactory {
  constructor(
    private readonly options: { timeoutMs: number; runner?: CommandRunner; logger?: Logger }
  ) {}

  create(options: ToolchainOptions): GccToolchain {
    return new GccToolchain(readCompilerConfig(options.compiler, options.buildProfile), {
      baseDir: options.baseDir,
      objectDir: options.objectDir,
      timeoutMs: this.options.timeoutMs,
      runner: this.options.runner,
      logger: this.options.logger,
    });
  }
}
