/**
 * Build-scoped feature set. One instance is shared by every package of a
 * build; features are only ever added.
 */
export class FeatureSet {
  private readonly features = new Map<string, boolean>();

  /**
   * Enable a feature. Returns true if it was not enabled before.
   */
  add(name: string): boolean {
    if (this.features.get(name)) return false;
    this.features.set(name, true);
    return true;
  }

  has(name: string): boolean {
    return this.features.get(name) === true;
  }

  /** Enabled feature names, sorted. */
  names(): string[] {
    return [...this.features.keys()].filter((name) => this.has(name)).sort();
  }

  get size(): number {
    return this.names().length;
  }
}
