export * from './keys.js';
export * from './provider.js';
export * from './memory-cache.js';
