export * from './token-vault.js';
export * from './master-key.js';
