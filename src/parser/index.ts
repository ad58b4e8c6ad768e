export { create, splitBlocks, isCountryLine, assignAddressParts } from './parser';
export type { ParserInstance } from './parser';
export { cleanLine, normalizeCase, splitOnCommas } from './text';
export { extractPostcode, isProbablyUkPostcode, normalizeUkPostcode } from './postcode';

// Re-export types
export * from './types';
