export * from './types.js';
export * from './settings.js';
export * from './local-package.js';
export * from './bsp-package.js';
export * from './target.js';
export * from './repository.js';
