/**
 * Allowlist Store
 *
 * Chat IDs permitted to submit orders, and each chat's default client, kept
 * in a JSON file. A missing file is created empty, which admits nobody.
 */

import * as path from 'node:path';
import { z } from 'zod';
import * as Storage from '../util/storage';
import * as Logging from '../logging';
import { errorMessage } from '../errors';
import type { Allowlist } from './types';

export const AllowlistSchema = z.object({
    allowed_chat_ids: z.array(z.coerce.number().int()).default([]),
    default_client_by_chat: z.record(z.string()).default({}),
});

export interface AllowlistStoreInstance {
    load(): Promise<Allowlist>;
    save(allowlist: Allowlist): Promise<void>;
    setDefaultClient(chatId: number, clientId: string): Promise<Allowlist>;
}

const EMPTY_ALLOWLIST_HINT = 'Add numeric chat IDs to allowed_chat_ids to permit ingestion.';

const emptyAllowlist = (): Allowlist => ({ allowed_chat_ids: [], default_client_by_chat: {} });

export const create = (config: { path: string }): AllowlistStoreInstance => {
    const logger = Logging.getLogger();
    const storage = Storage.create({ log: logger.debug.bind(logger) });
    let chain: Promise<unknown> = Promise.resolve();

    // Reads and writes go through one queue so a save never interleaves a load
    const serialized = <T>(task: () => Promise<T>): Promise<T> => {
        const result = chain.then(task);
        chain = result.catch(() => undefined);
        return result;
    };

    const write = async (allowlist: Allowlist, extra: Record<string, string> = {}): Promise<void> => {
        await storage.createDirectory(path.dirname(config.path));
        await storage.writeFileAtomic(config.path, `${JSON.stringify({ ...allowlist, ...extra }, null, 2)}\n`);
    };

    const read = async (): Promise<Allowlist> => {
        if (!await storage.exists(config.path)) {
            await write(emptyAllowlist(), { instructions: EMPTY_ALLOWLIST_HINT });
            logger.info('Created empty allowlist at %s', config.path);
            return emptyAllowlist();
        }
        try {
            return AllowlistSchema.parse(JSON.parse(await storage.readFile(config.path, 'utf-8')));
        } catch (error) {
            // Leave the file for the operator to fix; admit nobody meanwhile
            logger.error('Allowlist %s is unreadable, rejecting all chats: %s', config.path, errorMessage(error));
            return emptyAllowlist();
        }
    };

    return {
        load: () => serialized(read),
        save: allowlist => serialized(() => write(allowlist)),
        setDefaultClient: (chatId, clientId) => serialized(async () => {
            const current = await read();
            const updated: Allowlist = {
                ...current,
                default_client_by_chat: { ...current.default_client_by_chat, [String(chatId)]: clientId },
            };
            await write(updated);
            return updated;
        }),
    };
};
