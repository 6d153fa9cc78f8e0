/**
 * Feature blacklist/whitelist matching.
 */
import { patternMatches } from '../../utils/pattern-matcher.js';
import type { FilterEntry, PackageIdentity } from '../packages/types.js';

/**
 * First-match scan: true if some entry's pattern matches the package's full
 * name and its feature equals `feature`. A missing package matches as the
 * empty name.
 */
export function matchFeature(
  list: readonly FilterEntry[],
  pkg: PackageIdentity | undefined,
  feature: string
): boolean {
  const fullName = pkg?.fullName ?? '';
  return list.some((entry) => entry.feature === feature && patternMatches(entry.pattern, fullName));
}

/** A package that contributes filter entries to the build. */
export interface FilterSource {
  featureBlacklist(): FilterEntry[];
  featureWhitelist(): FilterEntry[];
}

/**
 * Concatenated filter lists of the BSP, app and target, in that order.
 *
 * A blacklist match disables a feature for a package unless a whitelist
 * entry also matches; the whitelist wins regardless of where either entry
 * sits in the lists.
 */
export class FeatureFilter {
  private readonly blacklist: FilterEntry[] = [];
  private readonly whitelist: FilterEntry[] = [];

  addSource(source: FilterSource): void {
    this.blacklist.push(...source.featureBlacklist());
    this.whitelist.push(...source.featureWhitelist());
  }

  isFeatureValid(pkg: PackageIdentity | undefined, feature: string): boolean {
    if (!matchFeature(this.blacklist, pkg, feature)) {
      return true;
    }
    return matchFeature(this.whitelist, pkg, feature);
  }

  entries(): { blacklist: FilterEntry[]; whitelist: FilterEntry[] } {
    return { blacklist: [...this.blacklist], whitelist: [...this.whitelist] };
  }
}
