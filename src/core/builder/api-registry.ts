import { logger, type Logger } from '../../utils/logger.js';
import { compareStrings } from '../../utils/string.js';

interface ApiOwner {
  readonly fullName: string;
}

/**
 * API name to owning package. The first registrant is authoritative; a later
 * registration by a different package is rejected, with one warning per
 * (API, package) pair.
 */
export class ApiRegistry<T extends ApiOwner = ApiOwner> {
  private readonly owners = new Map<string, T>();
  private readonly reported = new Set<string>();

  constructor(private readonly log: Logger = logger) {}

  /**
   * Register `owner` as the provider of `api`.
   * @returns true if this is a new API.
   */
  add(api: string, owner: T): boolean {
    const current = this.owners.get(api);
    if (current === undefined) {
      this.owners.set(api, owner);
      return true;
    }

    const conflict = `${api}\0${owner.fullName}`;
    if (current !== owner && !this.reported.has(conflict)) {
      this.reported.add(conflict);
      this.log.warn(`API conflict: ${api} (${current.fullName} <-> ${owner.fullName})`);
    }
    return false;
  }

  provider(api: string): T | undefined {
    return this.owners.get(api);
  }

  /** All registered APIs with their providers, sorted by API name. */
  entries(): Array<{ api: string; provider: T }> {
    return [...this.owners.entries()]
      .sort(([a], [b]) => compareStrings(a, b))
      .map(([api, provider]) => ({ api, provider }));
  }
}
