/**
 * Fixpoint resolution of dependencies, features and APIs.
 */
import { logger, type Logger } from '../../utils/logger.js';

/** What a single resolve call discovered. */
export interface ResolveOutcome {
  /** The package pulled packages into the build that were not there before. */
  newDeps: boolean;
  /** The package enabled a feature that was not enabled before. */
  newFeatures: boolean;
}

/**
 * A package that can resolve itself against the current build state.
 * Throwing aborts the whole resolution.
 */
export interface Resolvable {
  readonly fullName: string;
  resolve(): ResolveOutcome;
}

/**
 * Generation counter behind every package's `depsResolved` and
 * `apisSatisfied` flags: a package's flag holds only while it was set in the
 * current generation, so invalidating every package is one increment.
 */
export class ResolutionState {
  private current = 0;

  get generation(): number {
    return this.current;
  }

  invalidateAll(): void {
    this.current++;
  }
}

export interface ResolutionStats {
  /** Full or partial passes over the package set. */
  passes: number;
  /** Passes cut short because a new feature was discovered. */
  restarts: number;
}

export class ResolutionEngine {
  constructor(
    /** Current package set; re-read at the start of every pass. */
    private readonly packages: () => Iterable<Resolvable>,
    private readonly state: ResolutionState,
    private readonly log: Logger = logger
  ) {}

  /**
   * Resolve until a full pass discovers neither a package nor a feature.
   *
   * A new feature can change any package's requirements, so it invalidates
   * every package and restarts the pass at once. New dependencies only
   * schedule one more pass.
   */
  run(): ResolutionStats {
    const stats: ResolutionStats = { passes: 0, restarts: 0 };

    for (;;) {
      stats.passes++;
      let reprocess = false;

      for (const bpkg of [...this.packages()]) {
        const { newDeps, newFeatures } = bpkg.resolve();

        if (newFeatures) {
          this.log.debug(`New feature discovered by ${bpkg.fullName}; re-resolving all packages`);
          this.state.invalidateAll();
          stats.restarts++;
          reprocess = true;
          break;
        }
        if (newDeps) {
          reprocess = true;
        }
      }

      if (!reprocess) break;
    }

    this.log.debug(`Resolution converged after ${stats.passes} passes (${stats.restarts} restarts)`);
    return stats;
  }
}
