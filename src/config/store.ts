/**
 * Config Store
 *
 * Owns the current ClientConfigSet for the process. Reloads swap the whole
 * snapshot; callers holding an older snapshot keep using it undisturbed.
 */

import * as Storage from '../util/storage';
import * as Logging from '../logging';
import { errorMessage } from '../errors';
import { load } from './loader';
import { validate } from './validator';
import { resolve, listClients } from './resolver';
import type { ClientConfigSet, EffectiveSettings } from './types';

export interface StoreConfig {
    path: string;
    clientsRoot: string;
    templatePath?: string | null;
}

export interface StoreInstance {
    current(): ClientConfigSet;
    reload(): Promise<ClientConfigSet>;
    reloadIfChanged(): Promise<boolean>;
    resolve(clientId: string, snapshot?: ClientConfigSet): EffectiveSettings;
    listClients(): string[];
}

export const create = async (config: StoreConfig): Promise<StoreInstance> => {
    const logger = Logging.getLogger();
    const storage = Storage.create({ log: logger.debug.bind(logger) });

    let version = 0;
    let lastMtime: number | null = null;

    const readSnapshot = async (): Promise<ClientConfigSet> => {
        const stat = await storage.stat(config.path);
        const document = await load(config.path);
        const snapshot = validate(document, { version: version + 1, source: config.path });
        version = snapshot.version;
        lastMtime = stat?.mtimeMs ?? null;
        return snapshot;
    };

    // Startup failures propagate: the process must not run on an invalid config
    let snapshot = await readSnapshot();
    logger.info('Loaded config %s (%d clients)', config.path, Object.keys(snapshot.clients).length);

    const reload = async (): Promise<ClientConfigSet> => {
        snapshot = await readSnapshot();
        logger.info('Reloaded config %s as version %d', config.path, snapshot.version);
        return snapshot;
    };

    const reloadIfChanged = async (): Promise<boolean> => {
        const stat = await storage.stat(config.path);
        if (!stat || stat.mtimeMs === lastMtime) {
            return false;
        }
        try {
            await reload();
            return true;
        } catch (error) {
            // Keep serving the previous snapshot until the file is fixed
            lastMtime = stat.mtimeMs;
            logger.error('Config reload failed, keeping version %d: %s', snapshot.version, errorMessage(error));
            return false;
        }
    };

    return {
        current: () => snapshot,
        reload,
        reloadIfChanged,
        resolve: (clientId, pinned) => resolve(pinned ?? snapshot, clientId, {
            clientsRoot: config.clientsRoot,
            templatePath: config.templatePath,
        }),
        listClients: () => listClients(snapshot),
    };
};
