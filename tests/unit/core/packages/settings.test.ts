import { describe, it, expect } from 'vitest';
import { PackageSettings } from '../../../../src/core/packages/settings.js';

describe('PackageSettings', () => {
  describe('stringList', () => {
    it('should split whitespace-separated strings', () => {
      const settings = new PackageSettings({ 'pkg.cflags': '-O2  -Wall' }, 'pkg.yml');

      expect(settings.stringList('pkg.cflags')).toEqual(['-O2', '-Wall']);
    });

    it('should append feature-gated values base first, then by feature name', () => {
      const settings = new PackageSettings(
        {
          'pkg.deps': ['libs/os'],
          'pkg.deps.TEST': ['libs/testutil'],
          'pkg.deps.BLE': 'net/ble',
          'pkg.deps.SHELL': ['libs/shell'],
        },
        'pkg.yml'
      );

      expect(settings.stringList('pkg.deps', ['TEST', 'BLE'])).toEqual([
        'libs/os',
        'net/ble',
        'libs/testutil',
      ]);
    });

    it('should return an empty list for a missing or null key', () => {
      const settings = new PackageSettings({ 'pkg.deps': null }, 'pkg.yml');

      expect(settings.stringList('pkg.deps')).toEqual([]);
      expect(settings.stringList('pkg.apis')).toEqual([]);
    });

    it('should reject mappings', () => {
      const settings = new PackageSettings({ 'pkg.deps': { a: 'b' } }, 'pkg.yml');

      expect(() => settings.stringList('pkg.deps')).toThrow(
        'Invalid setting pkg.deps in pkg.yml: expected a list of strings'
      );
    });
  });

  describe('string', () => {
    it('should let the last enabled feature override the base', () => {
      const settings = new PackageSettings(
        {
          'bsp.linkerscript': 'app.ld',
          'bsp.linkerscript.BOOT_LOADER': 'boot.ld',
          'bsp.linkerscript.ALT': 'alt.ld',
        },
        'bsp.yml'
      );

      expect(settings.string('bsp.linkerscript')).toBe('app.ld');
      expect(settings.string('bsp.linkerscript', ['BOOT_LOADER'])).toBe('boot.ld');
      expect(settings.string('bsp.linkerscript', ['BOOT_LOADER', 'ALT'])).toBe('boot.ld');
    });

    it('should stringify numbers', () => {
      const settings = new PackageSettings({ 'pkg.version': 2 }, 'pkg.yml');

      expect(settings.string('pkg.version')).toBe('2');
    });

    it('should reject lists', () => {
      const settings = new PackageSettings({ 'bsp.arch': ['cortex_m4'] }, 'bsp.yml');

      expect(() => settings.string('bsp.arch')).toThrow(/expected a scalar value/);
    });
  });

  describe('filterEntries', () => {
    it('should read a mapping in declaration order', () => {
      const settings = new PackageSettings(
        { 'pkg.feature_blacklist': { '.*': 'SHELL', 'libs/os': 'TEST' } },
        'pkg.yml'
      );

      expect(settings.filterEntries('pkg.feature_blacklist')).toEqual([
        { pattern: '.*', feature: 'SHELL' },
        { pattern: 'libs/os', feature: 'TEST' },
      ]);
    });

    it('should read a list of entries', () => {
      const settings = new PackageSettings(
        { 'pkg.feature_whitelist': [{ pattern: 'net/.*', feature: 'BLE' }] },
        'pkg.yml'
      );

      expect(settings.filterEntries('pkg.feature_whitelist')).toEqual([
        { pattern: 'net/.*', feature: 'BLE' },
      ]);
    });

    it('should reject invalid patterns', () => {
      const settings = new PackageSettings({ 'pkg.feature_blacklist': { 'libs/(': 'X' } }, 'pkg.yml');

      expect(() => settings.filterEntries('pkg.feature_blacklist')).toThrow(/invalid pattern "libs\/\("/);
    });
  });
});
