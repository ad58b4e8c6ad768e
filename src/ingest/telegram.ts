/**
 * Telegram Ingest
 *
 * Long-polls the Telegram Bot API for messages, routes allowlisted text
 * orders into client watch folders and answers a handful of commands.
 * Only text is accepted; photos and documents get a one-line refusal.
 */

import { z } from 'zod';
import * as Logging from '../logging';
import { CLIENT_ID_PATTERN, TELEGRAM_API_BASE, TELEGRAM_POLL_TIMEOUT_SECONDS } from '../constants';
import { errorMessage } from '../errors';
import type { StoreInstance } from '../config/store';
import type { AllowlistStoreInstance } from './allowlist';
import * as Inbox from './inbox';
import { isAllowlisted, route } from './router';

const RETRY_DELAY_MS = 5000;

const MessageSchema = z.object({
    message_id: z.number(),
    chat: z.object({ id: z.number() }),
    text: z.string().optional(),
});

const UpdateSchema = z.object({
    update_id: z.number(),
    message: MessageSchema.optional(),
});

const ResponseSchema = z.object({
    ok: z.boolean(),
    result: z.unknown().optional(),
    description: z.string().optional(),
});

export type TelegramUpdate = z.infer<typeof UpdateSchema>;

export interface TelegramApi {
    getUpdates(offset: number, timeoutSeconds: number, signal?: AbortSignal): Promise<TelegramUpdate[]>;
    sendMessage(chatId: number, text: string): Promise<void>;
}

export class TelegramApiError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'TelegramApiError';
    }
}

export const createApi = (token: string, baseUrl: string = TELEGRAM_API_BASE): TelegramApi => {
    const call = async (method: string, body: Record<string, unknown>, signal?: AbortSignal): Promise<unknown> => {
        const response = await fetch(`${baseUrl}/bot${token}/${method}`, {
            method: 'POST',
            headers: { 'Content-Type': 'application/json' },
            body: JSON.stringify(body),
            signal,
        });
        const payload = ResponseSchema.parse(await response.json());
        if (!response.ok || !payload.ok) {
            // The token is part of the URL, so it never appears here
            throw new TelegramApiError(`${method} failed: HTTP ${response.status} ${payload.description ?? ''}`.trim());
        }
        return payload.result;
    };

    return {
        getUpdates: async (offset, timeoutSeconds, signal) => {
            const result = await call('getUpdates', { offset, timeout: timeoutSeconds, allowed_updates: ['message'] }, signal);
            return z.array(UpdateSchema).parse(result ?? []);
        },
        sendMessage: async (chatId, text) => {
            await call('sendMessage', { chat_id: chatId, text });
        },
    };
};

export interface BotConfig {
    api: TelegramApi;
    allowlist: AllowlistStoreInstance;
    store: StoreInstance;
    fallbackClientId: string;
    inbox?: Inbox.InboxInstance;
    pollTimeoutSeconds?: number;
}

export interface BotInstance {
    handleUpdate(update: TelegramUpdate): Promise<void>;
    start(): Promise<void>;
    stop(): Promise<void>;
}

const HELP_TEXT = 'LabelOps ingest bot. Send text-only orders. Optional first line: client_01.';

const parseCommand = (text: string): { name: string; args: string[] } | null => {
    if (!text.startsWith('/')) return null;
    const [head, ...args] = text.trim().split(/\s+/);
    // `/status@SomeBot` in group chats
    const name = head.slice(1).split('@')[0].toLowerCase();
    return { name, args };
};

export const create = (config: BotConfig): BotInstance => {
    const logger = Logging.getLogger();
    const inbox = config.inbox ?? Inbox.create();
    const pollTimeoutSeconds = config.pollTimeoutSeconds ?? TELEGRAM_POLL_TIMEOUT_SECONDS;

    let controller: AbortController | null = null;
    let loop: Promise<void> | null = null;

    const reply = async (chatId: number, text: string): Promise<void> => {
        try {
            await config.api.sendMessage(chatId, text);
        } catch (error) {
            logger.warn('Reply to chat_id=%d failed: %s', chatId, errorMessage(error));
        }
    };

    const handleCommand = async (chatId: number, name: string, args: string[]): Promise<void> => {
        switch (name) {
            case 'start':
            case 'help':
                await reply(chatId, HELP_TEXT);
                return;
            case 'status': {
                const allowlist = await config.allowlist.load();
                const clients = config.store.listClients();
                await reply(chatId, `Bot running. Allowlisted chats: ${allowlist.allowed_chat_ids.length}. `
                    + `Clients: ${clients.length > 0 ? clients.join(', ') : 'None found'}.`);
                return;
            }
            case 'chatid':
                await reply(chatId, String(chatId));
                return;
            case 'clients': {
                const clients = config.store.listClients();
                await reply(chatId, clients.length > 0 ? clients.join('\n') : 'No clients configured.');
                return;
            }
            case 'setclient': {
                const clientId = args[0]?.trim().toLowerCase();
                if (!clientId) {
                    await reply(chatId, 'Usage: /setclient client_01');
                    return;
                }
                if (!CLIENT_ID_PATTERN.test(clientId)) {
                    await reply(chatId, 'Invalid client ID. Use client_01 format.');
                    return;
                }
                if (!config.store.listClients().includes(clientId)) {
                    await reply(chatId, `Unknown client ${clientId}.`);
                    return;
                }
                await config.allowlist.setDefaultClient(chatId, clientId);
                await reply(chatId, `Default client set to ${clientId}.`);
                return;
            }
            default:
                await reply(chatId, 'Unknown command. Try /help.');
        }
    };

    const handleUpdate = async (update: TelegramUpdate): Promise<void> => {
        const message = update.message;
        if (!message) return;
        const chatId = message.chat.id;

        const allowlist = await config.allowlist.load();
        if (!isAllowlisted(allowlist, chatId)) {
            logger.info('Ignored message from chat_id=%d (not allowlisted)', chatId);
            return;
        }

        const command = message.text ? parseCommand(message.text) : null;
        if (command) {
            await handleCommand(chatId, command.name, command.args);
            return;
        }

        const routed = route({ chatId, text: message.text }, allowlist, config.fallbackClientId);
        if (!routed.ok) {
            if (routed.reason === 'non_text') {
                await reply(chatId, 'Text only, paste addresses as text.');
            }
            return;
        }

        if (!config.store.listClients().includes(routed.clientId)) {
            logger.warn('Message from chat_id=%d names unknown client %s; not saved', chatId, routed.clientId);
            await reply(chatId, `Unknown client ${routed.clientId}; message not saved.`);
            return;
        }

        const settings = config.store.resolve(routed.clientId);
        const fileName = await inbox.write(settings.folders.in_txt, chatId, routed.content);
        await reply(chatId, `Saved for ${routed.clientId}: ${fileName}`);
    };

    const sleep = (ms: number, signal: AbortSignal): Promise<void> => new Promise(resolve => {
        const timer = setTimeout(resolve, ms);
        signal.addEventListener('abort', () => {
            clearTimeout(timer);
            resolve();
        }, { once: true });
    });

    // Telegram forgets updates only once a later getUpdates names a higher offset
    const confirm = async (offset: number): Promise<void> => {
        try {
            await config.api.getUpdates(offset, 0);
        } catch (error) {
            logger.warn('Could not confirm Telegram updates before offset %d: %s', offset, errorMessage(error));
        }
    };

    const run = async (signal: AbortSignal): Promise<void> => {
        let offset = 0;
        let confirmed = 0;
        while (!signal.aborted) {
            let updates: TelegramUpdate[];
            try {
                updates = await config.api.getUpdates(offset, pollTimeoutSeconds, signal);
                confirmed = offset;
            } catch (error) {
                if (signal.aborted) break;
                logger.error('Telegram polling failed, retrying in %ds: %s', RETRY_DELAY_MS / 1000, errorMessage(error));
                await sleep(RETRY_DELAY_MS, signal);
                continue;
            }
            for (const update of updates) {
                offset = update.update_id + 1;
                try {
                    await handleUpdate(update);
                } catch (error) {
                    logger.error('Telegram update %d failed: %s', update.update_id, Logging.redact(errorMessage(error)));
                }
            }
        }
        if (offset > confirmed) {
            await confirm(offset);
        }
    };

    const start = async (): Promise<void> => {
        if (loop) return;
        await config.allowlist.load();
        controller = new AbortController();
        loop = run(controller.signal);
        logger.info('Telegram ingest started');
    };

    const stop = async (): Promise<void> => {
        controller?.abort();
        if (loop) {
            await loop;
        }
        loop = null;
        controller = null;
        logger.info('Telegram ingest stopped');
    };

    return { handleUpdate, start, stop };
};
