export * from './types.js';
export * from './compiler-config.js';
export * from './gcc-toolchain.js';
