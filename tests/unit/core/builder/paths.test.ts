import { describe, it, expect } from 'vitest';
import { BuildPaths } from '../../../../src/core/builder/paths.js';
import { ConfigurationError } from '../../../../src/utils/errors.js';

describe('BuildPaths', () => {
  const paths = new BuildPaths('/project/bin', 'targets/blinky_sim');

  it('should place outputs under the target directory', () => {
    expect(paths.binDir).toBe('/project/bin/targets/blinky_sim');
    expect(paths.archivePath('libs/os')).toBe('/project/bin/targets/blinky_sim/libs/os/os.a');
    expect(paths.appElfPath('apps/blinky')).toBe('/project/bin/targets/blinky_sim/apps/blinky/blinky.elf');
    expect(paths.testExePath('libs/os')).toBe('/project/bin/targets/blinky_sim/libs/os/test_os');
  });

  it('should accept segments that merely start with dots', () => {
    expect(paths.pkgBinDir('libs/..os')).toBe('/project/bin/targets/blinky_sim/libs/..os');
  });

  it.each(['..', '.', '', 'targets/../..'])('should reject the target name "%s"', (name) => {
    const bad = new BuildPaths('/project/bin', name);

    expect(() => bad.binDir).toThrow(ConfigurationError);
    expect(() => bad.binDir).toThrow(/is not inside \/project\/bin$/);
  });

  it('should reject package names that leave the target directory', () => {
    expect(() => paths.pkgBinDir('..')).toThrow(
      'Output path /project/bin/targets is not inside /project/bin/targets/blinky_sim'
    );
    expect(() => paths.archivePath('libs/../../other')).toThrow(/is not inside/);
    expect(() => paths.appElfPath('../../../etc')).toThrow(/is not inside/);
  });
});
