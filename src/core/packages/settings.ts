/**
 * Flat, dotted manifest settings with feature-gated keys.
 *
 * A key such as `pkg.deps` may be refined per feature by suffixing the
 * feature name: `pkg.deps.TEST` applies only while TEST is enabled for the
 * package. Lists concatenate base-first, then gated values in alphabetical
 * feature order. Scalars take the last gated value, else the base.
 */
import { z } from 'zod';
import { ConfigurationError, ErrorCodes } from '../../utils/errors.js';
import { validatePattern } from '../../utils/pattern-matcher.js';
import type { FilterEntry } from './types.js';

const ScalarSchema = z.union([z.string(), z.number(), z.boolean()]);

const FilterItemSchema = z.object({
  pattern: z.string().min(1),
  feature: z.string().min(1),
});

export const SettingValueSchema = z.union([
  ScalarSchema,
  z.null(),
  z.array(z.union([ScalarSchema, FilterItemSchema])),
  z.record(z.string(), ScalarSchema),
]);

/** A whole manifest file: dotted key to value. */
export const ManifestSchema = z.record(z.string(), SettingValueSchema);

export type SettingValue = z.infer<typeof SettingValueSchema>;
export type Manifest = z.infer<typeof ManifestSchema>;

export class PackageSettings {
  private readonly values: Map<string, SettingValue>;

  constructor(
    manifest: Manifest,
    /** Where the settings came from, for error messages. */
    readonly source: string
  ) {
    this.values = new Map(Object.entries(manifest));
  }

  /**
   * Scalar setting as a string. The last enabled feature override wins.
   */
  string(key: string, features: Iterable<string> = []): string | undefined {
    let result: string | undefined;
    for (const gatedKey of this.keysFor(key, features)) {
      const value = this.values.get(gatedKey);
      if (value === undefined || value === null) continue;
      if (typeof value === 'object') {
        throw this.invalid(gatedKey, 'expected a scalar value');
      }
      result = String(value);
    }
    return result;
  }

  /**
   * List setting. A YAML string is split on whitespace.
   */
  stringList(key: string, features: Iterable<string> = []): string[] {
    const result: string[] = [];
    for (const gatedKey of this.keysFor(key, features)) {
      const value = this.values.get(gatedKey);
      if (value === undefined || value === null) continue;

      if (typeof value === 'string') {
        result.push(...value.split(/\s+/).filter((s) => s.length > 0));
      } else if (typeof value === 'number' || typeof value === 'boolean') {
        result.push(String(value));
      } else if (Array.isArray(value)) {
        for (const item of value) {
          if (typeof item === 'object') {
            throw this.invalid(gatedKey, 'expected a list of strings');
          }
          result.push(String(item));
        }
      } else {
        throw this.invalid(gatedKey, 'expected a list of strings');
      }
    }
    return result;
  }

  /**
   * Feature filter list, in declaration order. Accepts either a mapping
   * `pattern: FEATURE` or a list of `{ pattern, feature }` objects.
   */
  filterEntries(key: string): FilterEntry[] {
    const value = this.values.get(key);
    if (value === undefined || value === null) return [];

    const entries: FilterEntry[] = [];
    if (Array.isArray(value)) {
      for (const item of value) {
        if (typeof item !== 'object') {
          throw this.invalid(key, 'expected { pattern, feature } entries');
        }
        entries.push({ pattern: item.pattern, feature: item.feature });
      }
    } else if (typeof value === 'object') {
      for (const [pattern, feature] of Object.entries(value)) {
        entries.push({ pattern, feature: String(feature) });
      }
    } else {
      throw this.invalid(key, 'expected a mapping of pattern to feature');
    }

    for (const entry of entries) {
      const problem = validatePattern(entry.pattern);
      if (problem) {
        throw this.invalid(key, `invalid pattern "${entry.pattern}": ${problem}`);
      }
    }
    return entries;
  }

  private keysFor(key: string, features: Iterable<string>): string[] {
    return [key, ...[...features].sort().map((f) => `${key}.${f}`)];
  }

  private invalid(key: string, problem: string): ConfigurationError {
    return new ConfigurationError(
      ErrorCodes.MANIFEST_INVALID,
      `Invalid setting ${key} in ${this.source}: ${problem}`,
      { key, source: this.source }
    );
  }
}
