/**
 * Chat Ingest
 *
 * Routing, allowlist and inbox for orders that arrive as chat messages, plus
 * the Telegram transport.
 */

export { route, isAllowlisted } from './router';
export { create as createAllowlistStore, AllowlistSchema } from './allowlist';
export type { AllowlistStoreInstance } from './allowlist';
export { create as createInbox } from './inbox';
export type { InboxInstance } from './inbox';
export { create as createBot, createApi, TelegramApiError } from './telegram';
export type { BotConfig, BotInstance, TelegramApi, TelegramUpdate } from './telegram';

// Re-export types
export * from './types';
