/**
 * Builder barrel.
 */
export * from './compiler-info.js';
export * from './feature-set.js';
export * from './feature-filter.js';
export * from './api-registry.js';
export * from './resolution-engine.js';
export * from './build-context.js';
export * from './build-package.js';
export * from './paths.js';
export * from './builder.js';
