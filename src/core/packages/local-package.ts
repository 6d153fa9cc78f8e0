/**
 * A source package on disk: a directory holding `pkg.yml` and, depending on
 * its type, a secondary manifest (`bsp.yml`, `target.yml`, `compiler.yml`).
 */
import * as path from 'node:path';
import { z } from 'zod';
import { ConfigurationError, ErrorCodes } from '../../utils/errors.js';
import { fileExists } from '../../utils/file-system.js';
import { loadYamlWithSchema, formatZodError } from '../../utils/yaml.js';
import { ManifestSchema, PackageSettings, type Manifest } from './settings.js';
import {
  PackageNameSchema,
  PackageTypeSchema,
  type FilterEntry,
  type PackageIdentity,
  type PackageType,
} from './types.js';

export const PACKAGE_MANIFEST = 'pkg.yml';

/** Secondary manifest read alongside pkg.yml, per package type. */
const SECONDARY_MANIFESTS: Partial<Record<PackageType, string>> = {
  bsp: 'bsp.yml',
  target: 'target.yml',
  compiler: 'compiler.yml',
};

const PackageHeaderSchema = z.object({
  'pkg.name': PackageNameSchema,
  'pkg.type': PackageTypeSchema.default('lib'),
  'pkg.description': z.string().optional(),
});

export interface LocalPackageInit {
  basePath: string;
  repoName: string;
  /** pkg.yml contents (and secondary manifest keys, if any). */
  manifest: Manifest;
  /** Manifest files backing this package; every compile unit depends on them. */
  cfgFilenames?: string[];
  source?: string;
}

export class LocalPackage implements PackageIdentity {
  readonly name: string;
  readonly fullName: string;
  readonly basePath: string;
  readonly type: PackageType;
  readonly description: string | undefined;
  readonly settings: PackageSettings;
  readonly cfgFilenames: readonly string[];

  constructor(init: LocalPackageInit) {
    const source = init.source ?? path.join(init.basePath, PACKAGE_MANIFEST);
    const header = PackageHeaderSchema.safeParse(init.manifest);
    if (!header.success) {
      throw new ConfigurationError(
        ErrorCodes.MANIFEST_INVALID,
        `Invalid package manifest ${source}: ${formatZodError(header.error)}`,
        { source }
      );
    }

    this.name = header.data['pkg.name'];
    this.fullName = `@${init.repoName}/${this.name}`;
    this.basePath = init.basePath;
    this.type = header.data['pkg.type'];
    this.description = header.data['pkg.description'];
    this.settings = new PackageSettings(init.manifest, source);
    this.cfgFilenames = init.cfgFilenames ?? [source];

    // Filter patterns are validated eagerly.
    this.featureBlacklist();
    this.featureWhitelist();
  }

  /**
   * Load the package rooted at `dir`.
   */
  static async load(dir: string, repoName: string): Promise<LocalPackage> {
    const pkgFile = path.join(dir, PACKAGE_MANIFEST);
    const manifest = await loadYamlWithSchema(pkgFile, ManifestSchema);
    const cfgFilenames = [pkgFile];

    const type = PackageTypeSchema.safeParse(manifest['pkg.type'] ?? 'lib');
    const secondaryName = type.success ? SECONDARY_MANIFESTS[type.data] : undefined;
    let combined: Manifest = manifest;
    if (secondaryName) {
      const secondaryFile = path.join(dir, secondaryName);
      if (await fileExists(secondaryFile)) {
        const secondary = await loadYamlWithSchema(secondaryFile, ManifestSchema);
        combined = { ...manifest, ...secondary };
        cfgFilenames.push(secondaryFile);
      }
    }

    return new LocalPackage({
      basePath: dir,
      repoName,
      manifest: combined,
      cfgFilenames,
      source: pkgFile,
    });
  }

  /** Last path component of the package name. */
  get baseName(): string {
    return path.posix.basename(this.name);
  }

  /** `pkg.src_dirs`: explicit source directories, relative to the package. */
  sourceDirectories(): string[] {
    return this.settings.stringList('pkg.src_dirs');
  }

  featureBlacklist(): FilterEntry[] {
    return this.settings.filterEntries('pkg.feature_blacklist');
  }

  featureWhitelist(): FilterEntry[] {
    return this.settings.filterEntries('pkg.feature_whitelist');
  }
}
