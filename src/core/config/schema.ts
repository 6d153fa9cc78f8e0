/**
 * Project configuration schema (.kiln/config.yaml).
 */
import { z } from 'zod';

/**
 * Helper to create an optional field with schema defaults.
 * In Zod 4, .default({}) doesn't work for objects with inner defaults.
 * This helper makes the field optional and applies schema defaults when undefined.
 * Note: Both undefined and null are treated as "missing" and converted to {}.
 */
function withDefaults<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

/** Project identity. */
export const ProjectSettingsSchema = z.object({
  /** Repository component of fully qualified package names (`@<name>/<pkg>`). */
  name: z.string().regex(/^[A-Za-z0-9_.-]+$/).default('local'),
});

/** Output locations. */
export const BuildSettingsSchema = z.object({
  /** Output root, relative to the project root. Targets build into `<bin_dir>/<target>`. */
  bin_dir: z.string().min(1).default('bin'),
});

/** Package discovery patterns. */
export const PackageScanSchema = z.object({
  include: z.array(z.string()).default(['**/pkg.yml']),
  exclude: z.array(z.string()).default(['**/node_modules/**', 'bin/**', '**/.git/**']),
});

/** External compile/archive/link command settings. */
export const ToolchainSettingsSchema = z.object({
  /** Per-command timeout; 0 disables it. */
  timeout_ms: z.number().int().min(0).default(300_000),
});

/** Test executable settings. */
export const TestSettingsSchema = z.object({
  timeout_ms: z.number().int().min(0).default(60_000),
});

export const VerbositySchema = z.enum(['silent', 'quiet', 'default', 'verbose']);

export const OutputSettingsSchema = z.object({
  verbosity: VerbositySchema.default('default'),
});

/** Complete config.yaml schema. */
export const ConfigSchema = z.object({
  version: z.string().default('1.0'),
  project: withDefaults(ProjectSettingsSchema),
  build: withDefaults(BuildSettingsSchema),
  packages: withDefaults(PackageScanSchema),
  toolchain: withDefaults(ToolchainSettingsSchema),
  test: withDefaults(TestSettingsSchema),
  output: withDefaults(OutputSettingsSchema),
});

// Type exports (inferred from schemas)
export type ProjectSettings = z.infer<typeof ProjectSettingsSchema>;
export type BuildSettings = z.infer<typeof BuildSettingsSchema>;
export type PackageScan = z.infer<typeof PackageScanSchema>;
export type ToolchainSettings = z.infer<typeof ToolchainSettingsSchema>;
export type TestSettings = z.infer<typeof TestSettingsSchema>;
export type OutputSettings = z.infer<typeof OutputSettingsSchema>;
export type Config = z.infer<typeof ConfigSchema>;
