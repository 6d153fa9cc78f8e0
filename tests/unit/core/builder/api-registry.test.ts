import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ApiRegistry } from '../../../../src/core/builder/api-registry.js';
import { Logger } from '../../../../src/utils/logger.js';

describe('ApiRegistry', () => {
  const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
  const first = { fullName: '@local/net/ble' };
  const second = { fullName: '@local/net/wifi' };

  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should register the first provider', () => {
    const registry = new ApiRegistry(new Logger());

    expect(registry.add('net', first)).toBe(true);
    expect(registry.provider('net')).toBe(first);
    expect(registry.provider('console')).toBeUndefined();
  });

  it('should keep the first provider on a collision and warn', () => {
    const registry = new ApiRegistry(new Logger());
    registry.add('net', first);

    expect(registry.add('net', second)).toBe(false);
    expect(registry.provider('net')).toBe(first);
    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(warnSpy.mock.calls[0][0]).toContain('API conflict: net (@local/net/ble <-> @local/net/wifi)');
  });

  it('should warn once per conflicting provider across repeated registrations', () => {
    const registry = new ApiRegistry(new Logger());
    const third = { fullName: '@local/net/eth' };
    registry.add('net', first);

    registry.add('net', second);
    registry.add('net', second);
    registry.add('net', third);
    registry.add('net', second);

    expect(registry.provider('net')).toBe(first);
    expect(warnSpy).toHaveBeenCalledTimes(2);
    expect(warnSpy.mock.calls[1][0]).toContain('API conflict: net (@local/net/ble <-> @local/net/eth)');
  });

  it('should not warn when the same provider registers again', () => {
    const registry = new ApiRegistry(new Logger());
    registry.add('net', first);

    expect(registry.add('net', first)).toBe(false);
    expect(warnSpy).not.toHaveBeenCalled();
  });

  it('should list entries sorted by API name', () => {
    const registry = new ApiRegistry(new Logger());
    registry.add('net', first);
    registry.add('console', second);

    expect(registry.entries()).toEqual([
      { api: 'console', provider: second },
      { api: 'net', provider: first },
    ]);
  });
});
