export * from './audit.js';
export * from './client.js';
export * from './config.js';
export * from './ddns.js';
export * from './errors.js';
export * from './http.js';
export type * from './prompt.js';
export * from './types.js';
export * from './validation.js';
export * from './credentials/accounts.js';
export * from './credentials/file-store.js';
export * from './credentials/keychain.js';
export * from './credentials/resolver.js';
