export { match, explain, findTag, findDefaultRule, serviceValue, isDirectiveLine } from './matcher';

// Re-export types
export * from './types';
