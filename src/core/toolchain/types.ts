/**
 * Contract between the builder and the compiler toolchain.
 *
 * Every location is passed explicitly; drivers never depend on the process
 * working directory.
 */
import type { CompilerInfo } from '../builder/compiler-info.js';
import type { LocalPackage } from '../packages/local-package.js';

/** Translation unit kind: C sources or assembly sources. */
export type SourceKind = 'c' | 'asm';

export interface ToolchainDriver {
  /** Merge compiler settings into this driver's settings. */
  addInfo(info: CompilerInfo): void;
  /** Files whose change forces recompilation of every unit. */
  addDeps(...files: string[]): void;
  /**
   * Compile every source of `kind` under `sourceRoot`, skipping directories
   * named in `ignoreDirs` at any depth.
   */
  recursiveCompile(sourceRoot: string, kind: SourceKind, ignoreDirs: readonly string[]): Promise<void>;
  /**
   * Archive the objects compiled by this driver into a static library.
   * Produces nothing when there are no objects.
   */
  archive(outputPath: string): Promise<void>;
  link(outputPath: string, archives: readonly string[]): Promise<void>;
}

export interface ToolchainOptions {
  /** The compiler package named by the BSP. */
  compiler: LocalPackage;
  /** Object file names mirror source paths relative to this directory. */
  baseDir: string;
  /** Where object files are written. */
  objectDir: string;
  buildProfile: string;
}

/**
 * Creates one driver per compile unit (package) or link step.
 */
export interface ToolchainFactory {
  create(options: ToolchainOptions): ToolchainDriver;
}
