import * as path from 'node:path';
import { ConfigurationError, ErrorCodes } from '../../utils/errors.js';
import type { LocalPackage } from './local-package.js';

/**
 * Board support package view over a `bsp`-typed LocalPackage.
 *
 * BSP settings may be feature-gated (e.g. `bsp.linkerscript.BOOT_LOADER`),
 * so they are re-read with `reload()` once the final feature set is known.
 */
export class BspPackage {
  arch = '';
  compilerName = '';
  /** Linker script path relative to the BSP base path, or '' if none. */
  linkerScript = '';

  constructor(readonly pkg: LocalPackage) {
    this.reload([]);
  }

  get name(): string {
    return this.pkg.name;
  }

  get fullName(): string {
    return this.pkg.fullName;
  }

  get basePath(): string {
    return this.pkg.basePath;
  }

  /** Absolute linker script path, or undefined if the BSP declares none. */
  linkerScriptPath(): string | undefined {
    return this.linkerScript ? path.join(this.basePath, this.linkerScript) : undefined;
  }

  reload(features: Iterable<string>): void {
    const featureList = [...features];
    const arch = this.pkg.settings.string('bsp.arch', featureList);
    if (!arch) {
      throw new ConfigurationError(
        ErrorCodes.MANIFEST_INVALID,
        `BSP ${this.fullName} does not specify an architecture (bsp.arch)`,
        { bsp: this.fullName }
      );
    }

    this.arch = arch;
    this.compilerName = this.pkg.settings.string('bsp.compiler', featureList) ?? '';
    this.linkerScript = this.pkg.settings.string('bsp.linkerscript', featureList) ?? '';
  }
}
