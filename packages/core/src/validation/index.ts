export * from './tool-arguments.js';
export * from './slug.js';
export * from './redirect-uri.js';
