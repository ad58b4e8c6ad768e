/**
 * Ingest Router
 *
 * Decides which client a chat message belongs to. A first non-empty line that
 * is a client ID (`client_07`) picks the client and is dropped from the
 * content; otherwise the chat's default client applies, then the fallback.
 * Rejections have no side effects.
 */

import { CLIENT_ID_PATTERN } from '../constants';
import type { Allowlist, IncomingMessage, RouteResult } from './types';

const CLIENT_LINE = new RegExp(CLIENT_ID_PATTERN.source, 'i');

export const isAllowlisted = (allowlist: Allowlist, chatId: number): boolean =>
    allowlist.allowed_chat_ids.includes(chatId);

export const route = (message: IncomingMessage, allowlist: Allowlist, fallbackClientId: string): RouteResult => {
    if (!isAllowlisted(allowlist, message.chatId)) {
        return { ok: false, reason: 'not_allowlisted' };
    }
    if (typeof message.text !== 'string') {
        return { ok: false, reason: 'non_text' };
    }
    const rawText = message.text.trim();
    if (!rawText) {
        return { ok: false, reason: 'empty' };
    }

    const lines = rawText.split(/\r?\n/);
    const firstIndex = lines.findIndex(line => line.trim().length > 0);
    const firstLine = lines[firstIndex].trim();
    const explicit = CLIENT_LINE.test(firstLine) ? firstLine.toLowerCase() : null;

    const content = explicit
        ? lines.filter((_, index) => index !== firstIndex).join('\n').trim()
        : rawText;

    return {
        ok: true,
        clientId: explicit ?? allowlist.default_client_by_chat[String(message.chatId)] ?? fallbackClientId,
        // A message that is only a client line keeps its text
        content: content || rawText,
        explicitClient: explicit !== null,
    };
};
