import { ConfigurationError, ErrorCodes } from '../../utils/errors.js';
import type { LocalPackage } from '../packages/local-package.js';

/**
 * Toolchain binding read from a compiler package's `compiler.yml`.
 */
export interface CompilerConfig {
  /** C compiler; also drives the link step. */
  cc: string;
  /** Assembler driver (defaults to cc). */
  as: string;
  /** Static archiver. */
  ar: string;
  /** `compiler.flags.base` followed by `compiler.flags.<profile>`. */
  cflags: string[];
  aflags: string[];
  lflags: string[];
}

export function readCompilerConfig(pkg: LocalPackage, buildProfile: string): CompilerConfig {
  const settings = pkg.settings;
  const cc = settings.string('compiler.path.cc');
  if (!cc) {
    throw new ConfigurationError(
      ErrorCodes.MANIFEST_INVALID,
      `Compiler package ${pkg.fullName} does not specify compiler.path.cc`,
      { compiler: pkg.fullName }
    );
  }

  return {
    cc,
    as: settings.string('compiler.path.as') ?? cc,
    ar: settings.string('compiler.path.archive') ?? 'ar',
    cflags: [
      ...settings.stringList('compiler.flags.base'),
      ...settings.stringList(`compiler.flags.${buildProfile}`),
    ],
    aflags: settings.stringList('compiler.as.flags'),
    lflags: settings.stringList('compiler.ld.flags'),
  };
}
