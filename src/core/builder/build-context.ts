/**
 * Shared state of one build invocation: package set, feature set, feature
 * filter, API registry and resolution generation.
 */
import { logger, type Logger } from '../../utils/logger.js';
import { compareStrings } from '../../utils/string.js';
import type { LocalPackage } from '../packages/local-package.js';
import type { PackageRepository } from '../packages/repository.js';
import type { PackageIdentity } from '../packages/types.js';
import { ApiRegistry } from './api-registry.js';
import { BuildPackage } from './build-package.js';
import { FeatureFilter } from './feature-filter.js';
import { FeatureSet } from './feature-set.js';
import { ResolutionState } from './resolution-engine.js';

export class BuildContext {
  /** Build packages keyed by fully qualified name. */
  private readonly packages = new Map<string, BuildPackage>();
  readonly features = new FeatureSet();
  readonly filter = new FeatureFilter();
  readonly apis: ApiRegistry<BuildPackage>;
  readonly state = new ResolutionState();
  /** Target architecture, from the BSP. */
  arch = '';

  constructor(
    readonly repository: PackageRepository,
    readonly log: Logger = logger
  ) {
    this.apis = new ApiRegistry<BuildPackage>(log);
  }

  /**
   * Get or create the build package for `pkg`. A package is wrapped at most
   * once per build.
   */
  addPackage(pkg: LocalPackage): { bpkg: BuildPackage; created: boolean } {
    const existing = this.packages.get(pkg.fullName);
    if (existing) {
      return { bpkg: existing, created: false };
    }
    const bpkg = new BuildPackage(pkg, this);
    this.packages.set(pkg.fullName, bpkg);
    return { bpkg, created: true };
  }

  get(fullName: string): BuildPackage | undefined {
    return this.packages.get(fullName);
  }

  /** Packages in insertion order. */
  list(): BuildPackage[] {
    return [...this.packages.values()];
  }

  /** Packages sorted by name, the order in which they are built. */
  sorted(): BuildPackage[] {
    return this.list().sort((a, b) => compareStrings(a.name, b.name));
  }

  get size(): number {
    return this.packages.size;
  }

  /**
   * Enabled features that the filter lists allow for `pkg`, sorted.
   */
  featuresFor(pkg: PackageIdentity | undefined): string[] {
    return this.features.names().filter((feature) => this.filter.isFeatureValid(pkg, feature));
  }
}
