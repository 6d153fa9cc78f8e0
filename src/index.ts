/**
 * kiln - build orchestrator for embedded C firmware.
 * Main library exports barrel file.
 */

// Configuration
export * from './core/config/index.js';

// Packages
export * from './core/packages/index.js';

// Builder
export * from './core/builder/index.js';

// Toolchain
export * from './core/toolchain/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
