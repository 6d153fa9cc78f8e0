/**
 * Build orchestrator: prepares the package set for a target, then compiles,
 * archives, links and optionally runs the result.
 *
 * State machine:
 *   uninitialized → prepped → compiled → linked
 * Any failing step moves the builder to `failed`, which is terminal.
 */
import * as path from 'node:path';
import {
  ConfigurationError,
  ErrorCodes,
  TestFailure,
  UnsatisfiedApiError,
  type UnsatisfiedApi,
} from '../../utils/errors.js';
import { fileExists, isDirectory, removeDir } from '../../utils/file-system.js';
import { logger, type Logger } from '../../utils/logger.js';
import {
  combinedOutput,
  runCommand,
  type CommandResult,
  type CommandRunner,
} from '../../utils/process.js';
import { BspPackage } from '../packages/bsp-package.js';
import type { LocalPackage } from '../packages/local-package.js';
import type { PackageRepository } from '../packages/repository.js';
import type { Target } from '../packages/target.js';
import type { ToolchainDriver, ToolchainFactory } from '../toolchain/types.js';
import { BuildContext } from './build-context.js';
import type { BuildPackage } from './build-package.js';
import { CompilerInfo } from './compiler-info.js';
import { BuildPaths } from './paths.js';
import { ResolutionEngine, type ResolutionStats } from './resolution-engine.js';

/** Feature enabling test subtrees. */
export const TEST_FEATURE = 'TEST';
/** Feature signalling there is no application entry point. */
export const SELFTEST_FEATURE = 'SELFTEST';
/** Define enabling the self-test entry point of the package under test. */
export const SELFTEST_DEFINE = 'KILN_SELFTEST';

export type BuilderState = 'uninitialized' | 'prepped' | 'compiled' | 'linked' | 'failed';

export interface BuilderOptions {
  repository: PackageRepository;
  /** Output root; the target builds into `<binRoot>/<target name>`. */
  binRoot: string;
  toolchain: ToolchainFactory;
  /** Runs test executables. */
  runner?: CommandRunner;
  /** Test executable timeout; 0 disables it. */
  testTimeoutMs?: number;
  logger?: Logger;
}

/** Resolved build contents, for reporting. */
export interface BuildReport {
  target: string;
  arch: string;
  packages: Array<{
    name: string;
    fullName: string;
    deps: string[];
    apis: string[];
    reqApis: string[];
    features: string[];
  }>;
  features: string[];
  apis: Array<{ api: string; provider: string }>;
  resolution: ResolutionStats;
}

export class Builder {
  readonly context: BuildContext;
  readonly paths: BuildPaths;
  private readonly log: Logger;
  private readonly runner: CommandRunner;
  private state: BuilderState = 'uninitialized';

  private bsp: BspPackage | undefined;
  private compilerPkg: LocalPackage | undefined;
  private appBpkg: BuildPackage | undefined;
  private baseInfo: CompilerInfo | undefined;
  private stats: ResolutionStats = { passes: 0, restarts: 0 };

  constructor(
    readonly target: Target,
    private readonly options: BuilderOptions
  ) {
    this.log = options.logger ?? logger;
    this.runner = options.runner ?? runCommand;
    this.context = new BuildContext(options.repository, this.log);
    this.paths = new BuildPaths(options.binRoot, target.name);
  }

  get status(): BuilderState {
    return this.state;
  }

  /** Every enabled feature, regardless of filters. */
  allFeatures(): string[] {
    return this.context.features.names();
  }

  /** Features valid for `pkg`. */
  features(pkg: LocalPackage | BuildPackage | undefined): string[] {
    return this.context.featuresFor(pkg);
  }

  addFeature(feature: string): void {
    this.context.features.add(feature);
  }

  addPackage(pkg: LocalPackage): BuildPackage {
    return this.context.addPackage(pkg).bpkg;
  }

  /**
   * Populate the package and feature sets and compute the base compiler
   * settings. A second call on a prepared builder does nothing.
   */
  prepare(): void {
    this.ensureUsable();
    if (this.state !== 'uninitialized') {
      return;
    }
    this.guard(() => this.prepBuild());
    this.state = 'prepped';
  }

  /**
   * Validate the target, prepare, compile every package in name order and
   * link the application.
   */
  async build(): Promise<void> {
    this.ensureUsable();
    await this.guardAsync(async () => {
      this.target.validate(true);
      this.prepare();
      await this.compileAll();

      const elfPath = this.paths.appElfPath(this.target.appName);
      await this.link(elfPath);
      this.state = 'linked';
      this.log.status('default', `App successfully built: ${elfPath}`);
    });
  }

  /**
   * Build `pkg` with its test code as a self-test executable and run it.
   */
  async test(pkg: LocalPackage): Promise<void> {
    this.ensureUsable();
    await this.guardAsync(async () => {
      this.target.validate(false);

      const testBpkg = this.addPackage(pkg);
      this.addFeature(TEST_FEATURE);
      this.addFeature(SELFTEST_FEATURE);
      this.prepare();

      testBpkg.inject({ cflags: [`-D${SELFTEST_DEFINE}`] });
      await this.compileAll();

      const exePath = this.paths.testExePath(pkg.name);
      await this.link(exePath);
      this.state = 'linked';

      await this.runTest(pkg, exePath);
    });
  }

  /**
   * Remove the target's output tree.
   */
  async clean(): Promise<void> {
    this.ensureUsable();
    const dir = this.paths.binDir;
    this.log.status('verbose', `Cleaning directory ${dir}`);
    await removeDir(dir);
  }

  /** Resolved contents of a prepared builder. */
  report(): BuildReport {
    this.ensureUsable();
    const ctx = this.context;
    return {
      target: this.target.fullName,
      arch: ctx.arch,
      packages: ctx.sorted().map((bpkg) => ({
        name: bpkg.name,
        fullName: bpkg.fullName,
        deps: bpkg.dependencies().map((d) => d.fullName).sort(),
        apis: bpkg.providedApiNames(),
        reqApis: bpkg.requiredApiNames(),
        features: bpkg.features(),
      })),
      features: ctx.features.names(),
      apis: ctx.apis.entries().map(({ api, provider }) => ({ api, provider: provider.fullName })),
      resolution: { ...this.stats },
    };
  }

  private prepBuild(): void {
    const ctx = this.context;

    const bspPkg = this.target.bsp();
    if (!bspPkg) {
      if (!this.target.bspName) {
        throw new ConfigurationError(ErrorCodes.BSP_NOT_SPECIFIED, 'BSP package not specified by target', {
          target: this.target.name,
        });
      }
      throw new ConfigurationError(ErrorCodes.BSP_NOT_FOUND, `BSP package not found: ${this.target.bspName}`, {
        target: this.target.name,
        bsp: this.target.bspName,
      });
    }
    ctx.filter.addSource(bspPkg);

    const bsp = new BspPackage(bspPkg);
    ctx.arch = bsp.arch;
    this.compilerPkg = this.resolveCompiler(bsp);

    // Seed with the app (optional), the BSP and the target.
    const appPkg = this.target.app();
    if (appPkg) {
      this.appBpkg = this.addPackage(appPkg);
      ctx.filter.addSource(appPkg);
    }
    const bspBpkg = this.addPackage(bspPkg);
    const targetBpkg = this.addPackage(this.target.pkg);
    ctx.filter.addSource(this.target.pkg);

    for (const feature of this.target.features()) {
      this.addFeature(feature);
    }

    const engine = new ResolutionEngine(() => ctx.list(), ctx.state, this.log);
    this.stats = engine.run();
    this.logDepInfo();
    this.verifyApisSatisfied();

    // Base flags apply to every source file. Merge order is target, app,
    // bsp; compiler defaults go underneath and the library package's own
    // flags are merged per compile unit.
    const baseInfo = new CompilerInfo();
    this.log.debug(`Generating build flags for target ${this.target.fullName}`);
    baseInfo.merge(targetBpkg.compilerInfo());

    if (this.appBpkg) {
      this.log.debug(`Generating build flags for app ${this.appBpkg.fullName}`);
      baseInfo.merge(this.appBpkg.compilerInfo());
    }

    this.log.debug(`Generating build flags for bsp ${bspBpkg.fullName}`);
    const bspInfo = bspBpkg.compilerInfo();
    bspInfo.addDefine(`ARCH_${bsp.arch}`);
    bspInfo.addDefine('BSP_NAME', `"${bspPkg.baseName}"`);
    if (appPkg) {
      bspInfo.addDefine('APP_NAME', `"${appPkg.baseName}"`);
    }
    baseInfo.merge(bspInfo);

    // The link step needs the feature-gated BSP settings.
    bsp.reload(ctx.featuresFor(bspPkg));
    ctx.arch = bsp.arch;

    this.bsp = bsp;
    this.baseInfo = baseInfo;
  }

  private resolveCompiler(bsp: BspPackage): LocalPackage {
    if (!bsp.compilerName) {
      throw new ConfigurationError(ErrorCodes.COMPILER_NOT_SPECIFIED, 'Compiler package not specified by BSP', {
        bsp: bsp.fullName,
      });
    }
    const compilerPkg = this.options.repository.find(bsp.compilerName);
    if (!compilerPkg || compilerPkg.type !== 'compiler') {
      throw new ConfigurationError(ErrorCodes.COMPILER_NOT_FOUND, `Compiler package not found: ${bsp.compilerName}`, {
        bsp: bsp.fullName,
        compiler: bsp.compilerName,
      });
    }
    return compilerPkg;
  }

  private verifyApisSatisfied(): void {
    const unsatisfied: UnsatisfiedApi[] = [];
    for (const bpkg of this.context.sorted()) {
      for (const api of bpkg.unsatisfiedApis()) {
        unsatisfied.push({ package: bpkg.fullName, api });
      }
    }
    if (unsatisfied.length > 0) {
      throw new UnsatisfiedApiError(unsatisfied);
    }
  }

  private logDepInfo(): void {
    this.log.debug(`Features: ${this.allFeatures().join(' ') || '(none)'}`);
    for (const bpkg of this.context.sorted()) {
      this.log.debug(`Package ${bpkg.fullName}`, {
        deps: bpkg.dependencies().map((d) => d.fullName),
        apis: bpkg.providedApiNames(),
        reqApis: bpkg.requiredApiNames(),
      });
    }
  }

  private async compileAll(): Promise<void> {
    // Alphabetical order keeps logs and outputs stable across runs.
    for (const bpkg of this.context.sorted()) {
      await this.buildPackage(bpkg);
    }
    this.state = 'compiled';
  }

  /**
   * Compile a package's sources and archive them into its static library.
   */
  private async buildPackage(bpkg: BuildPackage): Promise<void> {
    const srcDirs: string[] = [];
    const declared = bpkg.sourceDirectories();

    if (declared.length > 0) {
      for (const relDir of declared) {
        const dir = path.join(bpkg.basePath, relDir);
        if (!(await isDirectory(dir))) {
          throw new ConfigurationError(
            ErrorCodes.SRC_DIR_MISSING,
            `Specified source directory ${dir} does not exist`,
            { package: bpkg.fullName, dir }
          );
        }
        srcDirs.push(dir);
      }
    } else {
      const srcDir = path.join(bpkg.basePath, 'src');
      if (!(await isDirectory(srcDir))) {
        this.log.debug(`Nothing to compile for ${bpkg.fullName}`);
        return;
      }
      srcDirs.push(srcDir);
    }

    this.log.status('default', `Building package ${bpkg.name}`);
    const driver = this.newToolchain(bpkg, bpkg.basePath, this.paths.pkgBinDir(bpkg.name));

    // Non-test code first, then test code. The architecture subtrees sit at
    // different places in each: src/arch/<arch> and src/test/arch/<arch>.
    for (const dir of srcDirs) {
      await this.buildDir(dir, driver, ['test']);
      if (this.context.features.has(TEST_FEATURE)) {
        await this.buildDir(path.join(dir, 'test'), driver, []);
      }
    }

    await driver.archive(this.paths.archivePath(bpkg.name));
  }

  /**
   * Compile the C sources under `srcDir` outside its `arch` subtree, then the
   * C and assembly sources of `arch/<arch>`. A missing directory is skipped.
   */
  private async buildDir(srcDir: string, driver: ToolchainDriver, ignoreDirs: string[]): Promise<void> {
    if (!(await isDirectory(srcDir))) {
      return;
    }

    this.log.status('verbose', `Compiling src in base directory: ${srcDir}`);
    await driver.recursiveCompile(srcDir, 'c', [...ignoreDirs, 'arch']);

    const archDir = path.join(srcDir, 'arch', this.context.arch);
    if (await isDirectory(archDir)) {
      this.log.status('verbose', `Compiling architecture specific sources in directory: ${archDir}`);
      await driver.recursiveCompile(archDir, 'c', ignoreDirs);
      await driver.recursiveCompile(archDir, 'asm', ignoreDirs);
    }
  }

  private newToolchain(bpkg: BuildPackage | undefined, baseDir: string, objectDir: string): ToolchainDriver {
    const compiler = this.requirePrepared(this.compilerPkg);
    const driver = this.options.toolchain.create({
      compiler,
      baseDir,
      objectDir,
      buildProfile: this.target.buildProfile,
    });
    driver.addInfo(this.requirePrepared(this.baseInfo));

    if (bpkg) {
      this.log.debug(`Generating build flags for package ${bpkg.fullName}`);
      driver.addInfo(bpkg.compilerInfo());
    }

    // A change to any manifest forces a full rebuild.
    for (const other of this.context.list()) {
      driver.addDeps(...other.cfgFilenames());
    }
    return driver;
  }

  private async link(outputPath: string): Promise<void> {
    const outputDir = path.dirname(outputPath);
    const driver = this.newToolchain(this.appBpkg, outputDir, outputDir);

    const archives: string[] = [];
    for (const bpkg of this.context.sorted()) {
      const archivePath = this.paths.archivePath(bpkg.name);
      if (await fileExists(archivePath)) {
        archives.push(archivePath);
      }
    }

    const linkerScript = this.requirePrepared(this.bsp).linkerScriptPath();
    if (linkerScript) {
      driver.addInfo(CompilerInfo.from({ linkerScript }));
    }
    await driver.link(outputPath, archives);
  }

  private async runTest(pkg: LocalPackage, exePath: string): Promise<void> {
    this.log.status('default', `Executing test: ${exePath}`);
    const timeoutMs = this.options.testTimeoutMs ?? 0;

    let result: CommandResult;
    try {
      result = await this.runner(exePath, [], { cwd: path.dirname(exePath), timeoutMs });
    } catch (error) {
      throw new TestFailure(pkg.name, error instanceof Error ? error.message : String(error));
    }

    if (result.exitCode !== 0 || result.timedOut) {
      const output = combinedOutput(result);
      const note = result.timedOut ? `timed out after ${timeoutMs}ms` : `exit code ${result.exitCode}`;
      throw new TestFailure(pkg.name, output ? `${output}\n(${note})` : `(${note})`);
    }
    this.log.status('default', `Test passed: ${pkg.name}`);
  }

  private requirePrepared<T>(value: T | undefined): T {
    if (value === undefined) {
      throw new ConfigurationError(ErrorCodes.BUILDER_FAILED, 'Builder has not been prepared');
    }
    return value;
  }

  private ensureUsable(): void {
    if (this.state === 'failed') {
      throw new ConfigurationError(
        ErrorCodes.BUILDER_FAILED,
        `Builder for target ${this.target.name} failed earlier and cannot be reused`,
        { target: this.target.name }
      );
    }
  }

  private guard(step: () => void): void {
    try {
      step();
    } catch (error) {
      this.state = 'failed';
      throw error;
    }
  }

  private async guardAsync(step: () => Promise<void>): Promise<void> {
    try {
      await step();
    } catch (error) {
      this.state = 'failed';
      throw error;
    }
  }
}
