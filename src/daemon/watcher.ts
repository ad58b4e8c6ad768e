/**
 * Daemon Watcher
 *
 * Polls each client's in_txt folder and hands files to a work lane once they
 * have stopped changing. A file counts as complete when its size and mtime
 * are the same on two consecutive polls. Lanes run one batch at a time: with
 * the shared lane every client waits its turn, with per-client lanes only
 * files for the same client do.
 *
 * Settings are resolved when a file is taken off the lane, so a config reload
 * applies to every batch that has not started yet.
 */

import * as path from 'node:path';
import * as Storage from '../util/storage';
import * as Logging from '../logging';
import {
    DEFAULT_CONFIG_CHECK_INTERVAL_MS,
    DEFAULT_POLL_INTERVAL_MS,
    TELEGRAM_FILE_PREFIX,
    WATCH_EXTENSION,
} from '../constants';
import { errorMessage, UnknownClientError } from '../errors';
import type { StoreInstance } from '../config/store';
import type { ClientFolders } from '../config/types';
import type { RiskLevel } from '../ai/types';
import type { BatchSource } from '../manifest/types';
import type { PipelineInstance } from '../pipeline';
import * as FailureHandler from './failures';
import type { FailureStage } from './failures';
import * as Lane from './queue';

export type ClientState = 'idle' | 'detected' | 'processing' | 'quarantined';
export type Isolation = 'shared' | 'per-client';

export interface WatcherConfig {
    store: StoreInstance;
    pipeline: PipelineInstance;
    /** Client IDs to watch, or 'all' for every configured client. */
    clients: string[] | 'all';
    useAi: boolean;
    maxRisk: RiskLevel;
    maxAiCalls: number;
    recursive?: boolean;
    pollIntervalMs?: number;
    configCheckIntervalMs?: number;
    isolation?: Isolation;
    failures?: FailureHandler.FailureHandlerInstance;
    onTransition?: (clientId: string, from: ClientState, to: ClientState) => void;
}

export interface WatcherInstance {
    start(): Promise<void>;
    stop(): Promise<void>;
    /** One scan of every watched folder. */
    poll(): Promise<void>;
    /** Resolves once every lane is empty and nothing is processing. */
    idle(): Promise<void>;
    state(clientId: string): ClientState;
}

interface WorkItem {
    clientId: string;
    filePath: string;
    folders: ClientFolders;
}

interface Observation {
    size: number;
    mtimeMs: number;
}

export const sourceForFile = (filePath: string): BatchSource =>
    path.basename(filePath).startsWith(TELEGRAM_FILE_PREFIX) ? 'telegram' : 'watch';

export const isCandidateFile = (filePath: string): boolean => {
    const name = path.basename(filePath);
    if (name.startsWith('.') || name.endsWith('~')) return false;
    if (/\.(tmp|part)$/i.test(name)) return false;
    return name.toLowerCase().endsWith(WATCH_EXTENSION);
};

export const create = (config: WatcherConfig): WatcherInstance => {
    const logger = Logging.getLogger();
    const storage = Storage.create({ log: logger.debug.bind(logger) });
    const failures = config.failures ?? FailureHandler.create();
    const pollIntervalMs = config.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    const configCheckIntervalMs = config.configCheckIntervalMs ?? DEFAULT_CONFIG_CHECK_INTERVAL_MS;
    const isolation = config.isolation ?? 'shared';
    const pattern = config.recursive ? `**/*${WATCH_EXTENSION}` : `*${WATCH_EXTENSION}`;

    const states = new Map<string, ClientState>();
    const pendingByClient = new Map<string, number>();
    const lanes = new Map<string, Lane.LaneInstance<WorkItem>>();
    // Files seen once and waiting for a second identical observation
    const candidates = new Map<string, Observation>();
    // Files already queued or in flight
    const queued = new Set<string>();
    // Files handled but still present (a failed move); skipped until they change
    const handled = new Map<string, number>();

    let timer: NodeJS.Timeout | null = null;
    let stopped = true;
    let closed = false;
    let lastConfigCheck = 0;
    let polling: Promise<void> | null = null;

    const state = (clientId: string): ClientState => states.get(clientId) ?? 'idle';

    const transition = (clientId: string, to: ClientState): void => {
        const from = state(clientId);
        if (from === to) return;
        states.set(clientId, to);
        logger.debug('Client %s: %s -> %s', clientId, from, to);
        config.onTransition?.(clientId, from, to);
    };

    const watchedClients = (): string[] =>
        config.clients === 'all' ? config.store.listClients() : config.clients;

    const handleItem = async (item: WorkItem): Promise<void> => {
        const { clientId, filePath } = item;
        const fileName = path.basename(filePath);
        let folders = item.folders;
        let stage: FailureStage = 'read';
        transition(clientId, 'processing');

        try {
            const rawText = await storage.readFile(filePath, 'utf-8');
            stage = 'resolve';
            const settings = config.store.resolve(clientId);
            folders = settings.folders;
            stage = 'pipeline';
            const result = await config.pipeline.run({
                clientId,
                settings,
                rawText,
                inputFiles: [filePath],
                useAi: config.useAi,
                maxRisk: config.maxRisk,
                maxAiCalls: config.maxAiCalls,
                source: sourceForFile(filePath),
                dryRun: false,
            });
            stage = 'archive';
            const archived = await storage.moveToDirectory(filePath, folders.archive);
            logger.info('Processed %s for %s: %d record(s), archived to %s', fileName, clientId, result.record_count, archived);
        } catch (error) {
            transition(clientId, 'quarantined');
            logger.error('Batch for %s failed at %s: %s', fileName, stage, Logging.redact(errorMessage(error)));
            try {
                await failures.quarantine(filePath, folders.failures, { error, clientId, stage });
            } catch (quarantineError) {
                logger.error('Could not quarantine %s: %s', fileName, errorMessage(quarantineError));
            }
        } finally {
            queued.delete(filePath);
            const stat = await storage.stat(filePath);
            if (stat) {
                handled.set(filePath, stat.mtimeMs);
            }
            const pending = (pendingByClient.get(clientId) ?? 1) - 1;
            pendingByClient.set(clientId, pending);
            transition(clientId, pending > 0 ? 'detected' : 'idle');
        }
    };

    const laneFor = (clientId: string): Lane.LaneInstance<WorkItem> => {
        const key = isolation === 'per-client' ? clientId : 'shared';
        let lane = lanes.get(key);
        if (!lane) {
            lane = Lane.create<WorkItem>(key, handleItem);
            lanes.set(key, lane);
        }
        return lane;
    };

    const enqueue = (item: WorkItem): void => {
        const lane = laneFor(item.clientId);
        if (closed) return;
        // Bookkeeping first: push may start the handler synchronously
        queued.add(item.filePath);
        pendingByClient.set(item.clientId, (pendingByClient.get(item.clientId) ?? 0) + 1);
        if (state(item.clientId) === 'idle') {
            transition(item.clientId, 'detected');
        }
        logger.info('Queued %s for %s', path.basename(item.filePath), item.clientId);
        lane.push(item);
    };

    const scanClient = async (clientId: string): Promise<Array<WorkItem & Observation>> => {
        let folders: ClientFolders;
        try {
            folders = config.store.resolve(clientId).folders;
        } catch (error) {
            if (error instanceof UnknownClientError) {
                logger.warn('Client %s is no longer configured; not watching it', clientId);
                return [];
            }
            throw error;
        }

        await storage.createDirectory(folders.in_txt);
        const files = (await storage.listFiles(folders.in_txt, [pattern])).filter(isCandidateFile);
        const present = new Set(files);
        for (const known of handled.keys()) {
            if (known.startsWith(folders.in_txt + path.sep) && !present.has(known)) handled.delete(known);
        }

        const ready: Array<WorkItem & Observation> = [];
        for (const filePath of files) {
            if (queued.has(filePath)) continue;
            const stat = await storage.stat(filePath);
            if (!stat) {
                candidates.delete(filePath);
                continue;
            }
            if (handled.get(filePath) === stat.mtimeMs) continue;
            handled.delete(filePath);

            const previous = candidates.get(filePath);
            if (previous && previous.size === stat.size && previous.mtimeMs === stat.mtimeMs) {
                candidates.delete(filePath);
                ready.push({ clientId, filePath, folders, size: stat.size, mtimeMs: stat.mtimeMs });
            } else {
                candidates.set(filePath, { size: stat.size, mtimeMs: stat.mtimeMs });
            }
        }
        return ready;
    };

    const scan = async (): Promise<void> => {
        const ready: Array<WorkItem & Observation> = [];
        for (const clientId of watchedClients()) {
            ready.push(...await scanClient(clientId));
        }
        // Arrival order: oldest modification first, then name
        ready.sort((a, b) => a.mtimeMs - b.mtimeMs || a.filePath.localeCompare(b.filePath));
        for (const { clientId, filePath, folders } of ready) {
            enqueue({ clientId, filePath, folders });
        }
    };

    const poll = async (): Promise<void> => {
        // Never run two scans at once
        while (polling) {
            await polling;
        }
        polling = scan().finally(() => {
            polling = null;
        });
        await polling;
    };

    const tick = async (): Promise<void> => {
        try {
            if (Date.now() - lastConfigCheck >= configCheckIntervalMs) {
                lastConfigCheck = Date.now();
                await config.store.reloadIfChanged();
            }
            await poll();
        } catch (error) {
            logger.error('Watch poll failed: %s', errorMessage(error));
        } finally {
            if (!stopped) {
                timer = setTimeout(() => {
                    void tick();
                }, pollIntervalMs);
            }
        }
    };

    const start = async (): Promise<void> => {
        if (!stopped) return;
        stopped = false;
        lastConfigCheck = Date.now();
        logger.info('Watching %d client(s) every %dms (%s lane%s)',
            watchedClients().length, pollIntervalMs, isolation, isolation === 'shared' ? '' : 's');
        await tick();
    };

    const stop = async (): Promise<void> => {
        stopped = true;
        closed = true;
        if (timer) {
            clearTimeout(timer);
            timer = null;
        }
        if (polling) {
            await polling;
        }
        await Promise.all(Array.from(lanes.values(), lane => lane.close()));
        logger.info('Watcher stopped');
    };

    const idle = async (): Promise<void> => {
        await Promise.all(Array.from(lanes.values(), lane => lane.drain()));
    };

    return { start, stop, poll, idle, state };
};
