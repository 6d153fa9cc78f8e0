/**
 * Index of every package in a project, keyed by name.
 */
import * as path from 'node:path';
import type { Config } from '../config/schema.js';
import { ConfigurationError, ErrorCodes } from '../../utils/errors.js';
import { globFiles } from '../../utils/file-system.js';
import { logger as log } from '../../utils/logger.js';
import { suggestName } from '../../utils/pattern-matcher.js';
import { compareStrings } from '../../utils/string.js';
import { LocalPackage } from './local-package.js';
import { Target } from './target.js';
import type { PackageLookup } from './types.js';

export class PackageRepository implements PackageLookup<LocalPackage> {
  private readonly byName = new Map<string, LocalPackage>();

  constructor(
    readonly repoName: string,
    packages: Iterable<LocalPackage>
  ) {
    for (const pkg of packages) {
      const existing = this.byName.get(pkg.name);
      if (existing) {
        throw new ConfigurationError(
          ErrorCodes.DUPLICATE_PACKAGE,
          `Package ${pkg.name} is defined twice: ${existing.basePath} and ${pkg.basePath}`,
          { name: pkg.name, paths: [existing.basePath, pkg.basePath] }
        );
      }
      this.byName.set(pkg.name, pkg);
    }
  }

  /**
   * Discover every package under `projectRoot` using the configured patterns.
   */
  static async load(projectRoot: string, config: Config): Promise<PackageRepository> {
    const manifests = await globFiles(config.packages.include, {
      cwd: projectRoot,
      ignore: config.packages.exclude,
    });
    log.debug(`Found ${manifests.length} package manifests under ${projectRoot}`);

    const packages: LocalPackage[] = [];
    for (const manifest of manifests) {
      packages.push(await LocalPackage.load(path.dirname(manifest), config.project.name));
    }
    return new PackageRepository(config.project.name, packages);
  }

  /**
   * Look up a package by short name (`libs/os`) or full name (`@local/libs/os`).
   */
  find(name: string): LocalPackage | undefined {
    const prefix = `@${this.repoName}/`;
    const shortName = name.startsWith(prefix) ? name.slice(prefix.length) : name;
    return this.byName.get(shortName);
  }

  /**
   * Like find(), but a missing package is a configuration error.
   */
  require(name: string, referencedBy?: string): LocalPackage {
    const pkg = this.find(name);
    if (pkg) return pkg;

    const suggestion = suggestName(name, this.byName.keys());
    const where = referencedBy ? ` (required by ${referencedBy})` : '';
    const hint = suggestion ? `; did you mean ${suggestion}?` : '';
    throw new ConfigurationError(
      ErrorCodes.PACKAGE_NOT_FOUND,
      `Package not found: ${name}${where}${hint}`,
      { name, referencedBy, suggestion }
    );
  }

  /**
   * Load a target by name.
   */
  target(name: string): Target {
    const pkg = this.require(name);
    if (pkg.type !== 'target') {
      throw new ConfigurationError(
        ErrorCodes.TARGET_INVALID,
        `Package ${pkg.name} is a ${pkg.type}, not a target`,
        { name: pkg.name, type: pkg.type }
      );
    }
    return new Target(pkg, this);
  }

  /** All packages, sorted by name. */
  all(): LocalPackage[] {
    return [...this.byName.values()].sort((a, b) => compareStrings(a.name, b.name));
  }
}
