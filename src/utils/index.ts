/**
 * Utility exports barrel file.
 */
export * from './errors.js';
export * from './logger.js';
export * from './file-system.js';
export * from './yaml.js';
export * from './process.js';
export * from './pattern-matcher.js';
export * from './string.js';
