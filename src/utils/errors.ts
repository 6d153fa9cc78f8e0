/**
 * Error types and codes for kiln.
 * Every error raised by the build pipeline extends KilnError; the build
 * failure kinds form a tagged union on `kind`.
 */

/**
 * Base error class for all kiln errors.
 */
export class KilnError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'KilnError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Missing or unresolvable configuration: BSP, compiler, packages, manifests.
 */
export class ConfigurationError extends KilnError {
  readonly kind = 'configuration' as const;

  constructor(code: string, message: string, details?: Record<string, unknown>, cause?: unknown) {
    super(code, message, details, cause);
    this.name = 'ConfigurationError';
  }
}

/** A package/API pair left unsatisfied after resolution. */
export interface UnsatisfiedApi {
  package: string;
  api: string;
}

/**
 * Required APIs that no package in the build provides.
 * Lists every offending pair, not just the first.
 */
export class UnsatisfiedApiError extends KilnError {
  readonly kind = 'unsatisfied-api' as const;

  constructor(public readonly unsatisfied: UnsatisfiedApi[]) {
    super(
      ErrorCodes.UNSATISFIED_API,
      `Unsatisfied APIs detected:\n${unsatisfied
        .map((u) => `    * ${u.package} requires api ${u.api}`)
        .join('\n')}`,
      { unsatisfied }
    );
    this.name = 'UnsatisfiedApiError';
  }
}

/**
 * Filesystem operation failed. Wraps the OS error.
 */
export class FilesystemError extends KilnError {
  readonly kind = 'filesystem' as const;

  constructor(message: string, path: string, cause: unknown) {
    super(ErrorCodes.FS_ERROR, `${message}: ${path}${describeCause(cause)}`, { path }, cause);
    this.name = 'FilesystemError';
  }
}

/**
 * Compilation or archiving failed inside the toolchain.
 */
export class CompileError extends KilnError {
  readonly kind = 'compile' as const;

  constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
    super(ErrorCodes.COMPILE_FAILED, message, details, cause);
    this.name = 'CompileError';
  }
}

/**
 * Linking failed inside the toolchain.
 */
export class LinkError extends KilnError {
  readonly kind = 'link' as const;

  constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
    super(ErrorCodes.LINK_FAILED, message, details, cause);
    this.name = 'LinkError';
  }
}

/**
 * A test executable exited non-zero or timed out.
 */
export class TestFailure extends KilnError {
  readonly kind = 'test' as const;

  constructor(
    public readonly packageName: string,
    public readonly output: string
  ) {
    super(ErrorCodes.TEST_FAILED, `Test failure (${packageName}):\n${output}`, {
      package: packageName,
    });
    this.name = 'TestFailure';
  }
}

/** Any error that aborts a build. */
export type BuildFailure =
  | ConfigurationError
  | UnsatisfiedApiError
  | FilesystemError
  | CompileError
  | LinkError
  | TestFailure;

export type BuildFailureKind = BuildFailure['kind'];

export function isBuildFailure(error: unknown): error is BuildFailure {
  return (
    error instanceof ConfigurationError ||
    error instanceof UnsatisfiedApiError ||
    error instanceof FilesystemError ||
    error instanceof CompileError ||
    error instanceof LinkError ||
    error instanceof TestFailure
  );
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? ` (${cause.message})` : '';
}

export const ErrorCodes = {
  // Configuration
  BSP_NOT_SPECIFIED: 'BSP_NOT_SPECIFIED',
  BSP_NOT_FOUND: 'BSP_NOT_FOUND',
  COMPILER_NOT_SPECIFIED: 'COMPILER_NOT_SPECIFIED',
  COMPILER_NOT_FOUND: 'COMPILER_NOT_FOUND',
  PACKAGE_NOT_FOUND: 'PACKAGE_NOT_FOUND',
  DUPLICATE_PACKAGE: 'DUPLICATE_PACKAGE',
  TARGET_INVALID: 'TARGET_INVALID',
  SRC_DIR_MISSING: 'SRC_DIR_MISSING',
  MANIFEST_INVALID: 'MANIFEST_INVALID',
  CONFIG_LOAD_ERROR: 'CONFIG_LOAD_ERROR',
  BUILDER_FAILED: 'BUILDER_FAILED',
  OUTPUT_PATH_INVALID: 'OUTPUT_PATH_INVALID',

  // Resolution
  UNSATISFIED_API: 'UNSATISFIED_API',

  // Filesystem
  FS_ERROR: 'FS_ERROR',

  // Toolchain
  COMPILE_FAILED: 'COMPILE_FAILED',
  LINK_FAILED: 'LINK_FAILED',

  // Test execution
  TEST_FAILED: 'TEST_FAILED',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
