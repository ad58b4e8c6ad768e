/**
 * Configuration System
 *
 * Loads, validates and resolves the multi-client configuration document.
 */

export { load, parse } from './loader';
export { validate, collectViolations } from './validator';
export { resolve, resolveFolders, listClients } from './resolver';
export { create } from './store';
export type { StoreConfig, StoreInstance } from './store';

// Re-export types
export * from './types';
