/**
 * @pierre/core
 *
 * Core package exports: config loader, database layer, SPI interfaces,
 * token vault and store, tool catalogue, cache layer, audit buffer.
 */

// Database layer
export * from './db/index.js';

// Schema types
export * from './schema/index.js';

// SPI interfaces
export * from './spi/index.js';

// Configuration loader
export * from './config/index.js';

// Secrets at rest
export * from './crypto/index.js';
export * from './tokens/token-store.js';

// Tool catalogue and validation
export * from './tools/catalog.js';
export * from './validation/index.js';

// Cache layer
export * from './cache/index.js';

// Audit buffer
export * from './audit/buffer.js';

// Password policy
export * from './auth/password-policy.js';

// Utilities
export * from './utils/errors.js';
export * from './utils/logger.js';
