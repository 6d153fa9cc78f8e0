/**
 * Types shared by the package manifest layer and the builder.
 */
import { z } from 'zod';

export const PackageTypeSchema = z.enum(['app', 'lib', 'bsp', 'target', 'compiler', 'unittest']);

export type PackageType = z.infer<typeof PackageTypeSchema>;

/**
 * Package name: `/`-separated segments, e.g. `libs/os`. Names become output
 * paths, so absolute names and `.`, `..` or empty segments are rejected.
 */
export const PackageNameSchema = z
  .string()
  .min(1)
  .regex(/^[^@\s][^\s\\]*$/, 'must not start with @ or contain spaces or backslashes')
  .refine(
    (name) => name.split('/').every((segment) => segment !== '' && segment !== '.' && segment !== '..'),
    'must be a relative path without empty, "." or ".." segments'
  );

/**
 * A (package-name pattern, feature) pair. A list of these forms a feature
 * blacklist or whitelist; patterns are unanchored regular expressions
 * matched against a package's fully qualified name.
 */
export interface FilterEntry {
  pattern: string;
  feature: string;
}

/**
 * Anything with a stable identity the builder can key on.
 */
export interface PackageIdentity {
  /** Short name, e.g. `libs/os`. */
  readonly name: string;
  /** Fully qualified name, e.g. `@local/libs/os`. */
  readonly fullName: string;
  readonly basePath: string;
}

/**
 * Name-based package lookup. Accepts a short or a fully qualified name.
 */
export interface PackageLookup<P extends PackageIdentity = PackageIdentity> {
  find(name: string): P | undefined;
}
