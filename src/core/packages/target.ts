import { ConfigurationError, ErrorCodes } from '../../utils/errors.js';
import type { LocalPackage } from './local-package.js';
import type { PackageLookup, PackageType } from './types.js';

/**
 * A build target: which app, on which BSP, with which profile.
 * Backed by a `target`-typed package whose `target.yml` supplies
 * `target.app`, `target.bsp`, `target.build_profile` and `target.features`.
 */
export class Target {
  constructor(
    readonly pkg: LocalPackage,
    private readonly packages: PackageLookup<LocalPackage>
  ) {}

  get name(): string {
    return this.pkg.name;
  }

  get fullName(): string {
    return this.pkg.fullName;
  }

  get appName(): string {
    return this.pkg.settings.string('target.app') ?? '';
  }

  get bspName(): string {
    return this.pkg.settings.string('target.bsp') ?? '';
  }

  get buildProfile(): string {
    return this.pkg.settings.string('target.build_profile') ?? 'default';
  }

  /** Features enabled for every build of this target. */
  features(): string[] {
    return this.pkg.settings.stringList('target.features');
  }

  app(): LocalPackage | undefined {
    return this.appName ? this.packages.find(this.appName) : undefined;
  }

  bsp(): LocalPackage | undefined {
    return this.bspName ? this.packages.find(this.bspName) : undefined;
  }

  /**
   * Check the target references are coherent.
   * A missing BSP is left for the builder to report; a BSP or app that is
   * named but has the wrong package type is rejected here.
   */
  validate(appRequired: boolean): void {
    if (appRequired && !this.appName) {
      throw this.invalid('target.app is not set');
    }

    const app = this.app();
    if (this.appName && !app) {
      throw this.invalid(`app package not found: ${this.appName}`);
    }
    if (app) this.expectType(app, 'app', 'target.app');

    const bsp = this.bsp();
    if (bsp) this.expectType(bsp, 'bsp', 'target.bsp');
  }

  private expectType(pkg: LocalPackage, type: PackageType, key: string): void {
    if (pkg.type !== type) {
      throw this.invalid(`${key} ${pkg.name} is a ${pkg.type} package, expected ${type}`);
    }
  }

  private invalid(problem: string): ConfigurationError {
    return new ConfigurationError(
      ErrorCodes.TARGET_INVALID,
      `Target ${this.name} is invalid: ${problem}`,
      { target: this.name }
    );
  }
}
