/**
 * Per-package resolution state and compiler settings.
 */
import * as path from 'node:path';
import type { LocalPackage } from '../packages/local-package.js';
import type { FilterEntry } from '../packages/types.js';
import type { BuildContext } from './build-context.js';
import { CompilerInfo, type CompilerInfoData } from './compiler-info.js';
import type { Resolvable, ResolveOutcome } from './resolution-engine.js';

/**
 * A package taking part in a build.
 *
 * `resolve()` reads the package's feature-gated settings against the
 * current feature set: it enables the features the package declares, pulls
 * its dependencies into the build, registers the APIs it provides and checks
 * the ones it requires.
 */
export class BuildPackage implements Resolvable {
  private depsResolvedAt = -1;
  private apisSatisfiedAt = -1;
  /** Direct dependencies, by full name. */
  private readonly deps = new Map<string, BuildPackage>();
  private requiredApis: string[] = [];
  private providedApis: string[] = [];
  /** Settings injected by the builder, e.g. the self-test define. */
  private readonly injected = new CompilerInfo();

  constructor(
    readonly pkg: LocalPackage,
    private readonly ctx: BuildContext
  ) {}

  get name(): string {
    return this.pkg.name;
  }

  get fullName(): string {
    return this.pkg.fullName;
  }

  get basePath(): string {
    return this.pkg.basePath;
  }

  get depsResolved(): boolean {
    return this.depsResolvedAt === this.ctx.state.generation;
  }

  get apisSatisfied(): boolean {
    return this.apisSatisfiedAt === this.ctx.state.generation;
  }

  resolve(): ResolveOutcome {
    let newDeps = false;

    if (!this.depsResolved) {
      if (this.loadFeatures()) {
        return { newDeps: false, newFeatures: true };
      }
      newDeps = this.loadDeps();
      if (!newDeps) {
        this.depsResolvedAt = this.ctx.state.generation;
      }
    }

    if (!this.apisSatisfied && this.satisfyApis()) {
      this.apisSatisfiedAt = this.ctx.state.generation;
    }

    return { newDeps, newFeatures: false };
  }

  /** Enabled features valid for this package. */
  features(): string[] {
    return this.ctx.featuresFor(this.pkg);
  }

  dependencies(): BuildPackage[] {
    return [...this.deps.values()];
  }

  requiredApiNames(): string[] {
    return [...this.requiredApis];
  }

  providedApiNames(): string[] {
    return [...this.providedApis];
  }

  /** Required APIs with no provider in the build. */
  unsatisfiedApis(): string[] {
    return this.requiredApis.filter((api) => this.ctx.apis.provider(api) === undefined);
  }

  sourceDirectories(): string[] {
    return this.pkg.sourceDirectories();
  }

  featureBlacklist(): FilterEntry[] {
    return this.pkg.featureBlacklist();
  }

  featureWhitelist(): FilterEntry[] {
    return this.pkg.featureWhitelist();
  }

  /** Manifest files of this package. */
  cfgFilenames(): readonly string[] {
    return this.pkg.cfgFilenames;
  }

  /**
   * Add settings that apply only while this package is compiled.
   */
  inject(info: Partial<CompilerInfoData>): void {
    this.injected.merge(info);
  }

  /**
   * Compiler settings contributed by this package: its own flags, a
   * `FEATURE_<NAME>` define per valid feature, include paths for itself, its
   * dependencies and the providers of its required APIs, then anything
   * injected by the builder.
   */
  compilerInfo(): CompilerInfo {
    const features = this.features();
    const settings = this.pkg.settings;

    const ci = CompilerInfo.from({
      cflags: settings.stringList('pkg.cflags', features),
      lflags: settings.stringList('pkg.lflags', features),
      aflags: settings.stringList('pkg.aflags', features),
      ignoreFiles: settings.stringList('pkg.ign_files', features),
      ignoreDirs: settings.stringList('pkg.ign_dirs', features),
    });

    for (const feature of features) {
      ci.addDefine(`FEATURE_${feature}`);
    }

    ci.includes.push(...this.includePaths(features));
    return ci.merge(this.injected);
  }

  private includePaths(features: string[]): string[] {
    const arch = this.ctx.arch;
    const own = this.basePath;
    const includes = [
      path.join(own, 'include'),
      path.join(own, 'src'),
      path.join(own, 'src', 'arch', arch),
      path.join(own, 'include', this.pkg.baseName, 'arch', arch),
      ...this.pkg.settings.stringList('pkg.include_dirs', features).map((dir) => path.join(own, dir)),
    ];

    const visible = new Map<string, BuildPackage>(this.deps);
    for (const api of this.requiredApis) {
      const provider = this.ctx.apis.provider(api);
      if (provider) visible.set(provider.fullName, provider);
    }
    visible.delete(this.fullName);

    for (const dep of visible.values()) {
      includes.push(
        path.join(dep.basePath, 'include'),
        path.join(dep.basePath, 'include', dep.pkg.baseName, 'arch', arch)
      );
    }
    return includes;
  }

  /**
   * Enable every feature this package declares.
   * @returns true if any of them was not enabled before.
   */
  private loadFeatures(): boolean {
    let found = false;
    for (const feature of this.pkg.settings.stringList('pkg.features', this.features())) {
      if (this.ctx.features.add(feature)) {
        this.ctx.log.debug(`Package ${this.fullName} enabled feature ${feature}`);
        found = true;
      }
    }
    return found;
  }

  /**
   * Pull every declared dependency into the build.
   * @returns true if any dependency was new to the build.
   */
  private loadDeps(): boolean {
    let found = false;
    this.deps.clear();
    for (const name of this.pkg.settings.stringList('pkg.deps', this.features())) {
      const local = this.ctx.repository.require(name, this.fullName);
      const { bpkg, created } = this.ctx.addPackage(local);
      if (created) {
        this.ctx.log.debug(`Package ${this.fullName} added dependency ${bpkg.fullName}`);
        found = true;
      }
      this.deps.set(bpkg.fullName, bpkg);
    }
    return found;
  }

  /**
   * Register provided APIs and check required ones.
   * @returns true if every required API has a provider.
   */
  private satisfyApis(): boolean {
    const features = this.features();
    this.providedApis = this.pkg.settings.stringList('pkg.apis', features);
    for (const api of this.providedApis) {
      this.ctx.apis.add(api, this);
    }

    this.requiredApis = this.pkg.settings.stringList('pkg.req_apis', features);
    return this.unsatisfiedApis().length === 0;
  }
}
