export { build, write, fileName, sha256Text, countServices } from './writer';

// Re-export types
export * from './types';
