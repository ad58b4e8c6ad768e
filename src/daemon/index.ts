/**
 * Daemon
 *
 * Folder watching, sequential batch lanes and failure quarantine.
 */

export { create, isCandidateFile, sourceForFile } from './watcher';
export type { ClientState, Isolation, WatcherConfig, WatcherInstance } from './watcher';
export * as FailureHandler from './failures';
export * as Lane from './queue';
