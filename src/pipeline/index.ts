/**
 * Pipeline
 *
 * Entry point for batch processing. Use Pipeline.create() once per process
 * and share the instance, so batches for a client queue behind each other.
 */

export { create, validateRecord } from './runner';
export type { PipelineInstance } from './runner';

// Re-export types
export * from './types';
