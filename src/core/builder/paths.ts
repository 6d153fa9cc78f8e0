import * as path from 'node:path';
import { ConfigurationError, ErrorCodes } from '../../utils/errors.js';

/**
 * Output locations for one target. Every path is a pure function of the
 * output root, the target name and the package name.
 *
 *   <binRoot>/<target>/<pkg name>/<basename>.a       archive
 *   <binRoot>/<target>/<app name>/<basename>.elf     application
 *   <binRoot>/<target>/<pkg name>/test_<basename>    test executable
 *
 * A name that would resolve outside its parent directory is rejected.
 */
export class BuildPaths {
  constructor(
    private readonly binRoot: string,
    private readonly targetName: string
  ) {}

  get binDir(): string {
    return within(this.binRoot, path.join(this.binRoot, this.targetName));
  }

  pkgBinDir(pkgName: string): string {
    const binDir = this.binDir;
    return within(binDir, path.join(binDir, pkgName));
  }

  archivePath(pkgName: string): string {
    return path.join(this.pkgBinDir(pkgName), `${path.posix.basename(pkgName)}.a`);
  }

  appElfPath(appName: string): string {
    return path.join(this.pkgBinDir(appName), `${path.posix.basename(appName)}.elf`);
  }

  testExePath(pkgName: string): string {
    return path.join(this.pkgBinDir(pkgName), `test_${path.posix.basename(pkgName)}`);
  }
}

/** `candidate` when it lies strictly below `parent`. */
function within(parent: string, candidate: string): string {
  const rel = path.relative(parent, candidate);
  if (rel === '' || rel === '..' || rel.startsWith(`..${path.sep}`) || path.isAbsolute(rel)) {
    throw new ConfigurationError(
      ErrorCodes.OUTPUT_PATH_INVALID,
      `Output path ${candidate} is not inside ${parent}`,
      { parent, path: candidate }
    );
  }
  return candidate;
}
