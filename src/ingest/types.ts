/**
 * Chat Ingest Types
 */

export interface IncomingMessage {
    chatId: number;
    /** Absent for photos, documents, voice notes and other non-text payloads. */
    text?: string | null;
}

export interface Allowlist {
    allowed_chat_ids: number[];
    default_client_by_chat: Record<string, string>;
}

export type RouteRejection = 'not_allowlisted' | 'non_text' | 'empty';

export type RouteResult =
    | { ok: true; clientId: string; content: string; explicitClient: boolean }
    | { ok: false; reason: RouteRejection };
