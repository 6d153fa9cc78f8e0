import { describe, it, expect } from 'vitest';
import {
  ResolutionEngine,
  ResolutionState,
  type Resolvable,
  type ResolveOutcome,
} from '../../../../src/core/builder/resolution-engine.js';
import { Logger } from '../../../../src/utils/logger.js';

const settled: ResolveOutcome = { newDeps: false, newFeatures: false };

class ScriptedPackage implements Resolvable {
  calls = 0;

  constructor(
    readonly fullName: string,
    private readonly trace: string[],
    private readonly script: Array<() => ResolveOutcome> = []
  ) {}

  resolve(): ResolveOutcome {
    this.trace.push(this.fullName);
    const step = this.script[this.calls++];
    return step ? step() : settled;
  }
}

describe('ResolutionState', () => {
  it('should bump the generation on invalidation', () => {
    const state = new ResolutionState();
    state.invalidateAll();
    state.invalidateAll();

    expect(state.generation).toBe(2);
  });
});

describe('ResolutionEngine', () => {
  it('should stop after one pass when nothing is discovered', () => {
    const trace: string[] = [];
    const packages = [new ScriptedPackage('a', trace), new ScriptedPackage('b', trace)];

    const stats = new ResolutionEngine(() => packages, new ResolutionState(), new Logger()).run();

    expect(stats).toEqual({ passes: 1, restarts: 0 });
    expect(trace).toEqual(['a', 'b']);
  });

  it('should run another pass over packages added during a pass', () => {
    const trace: string[] = [];
    const packages: ScriptedPackage[] = [];
    packages.push(
      new ScriptedPackage('a', trace, [
        () => {
          packages.push(new ScriptedPackage('b', trace));
          return { newDeps: true, newFeatures: false };
        },
      ])
    );

    const stats = new ResolutionEngine(() => packages, new ResolutionState(), new Logger()).run();

    expect(stats).toEqual({ passes: 2, restarts: 0 });
    expect(trace).toEqual(['a', 'a', 'b']);
  });

  it('should invalidate everything and restart on a new feature', () => {
    const trace: string[] = [];
    const state = new ResolutionState();
    const packages = [
      new ScriptedPackage('a', trace, [() => ({ newDeps: false, newFeatures: true })]),
      new ScriptedPackage('b', trace),
    ];

    const stats = new ResolutionEngine(() => packages, state, new Logger()).run();

    expect(stats).toEqual({ passes: 2, restarts: 1 });
    expect(trace).toEqual(['a', 'a', 'b']);
    expect(state.generation).toBe(1);
  });

  it('should abort when a package throws', () => {
    const packages = [
      new ScriptedPackage('a', [], [
        () => {
          throw new Error('Package not found: libs/nope');
        },
      ]),
    ];

    expect(() => new ResolutionEngine(() => packages, new ResolutionState(), new Logger()).run()).toThrow(
      'Package not found: libs/nope'
    );
  });
});
