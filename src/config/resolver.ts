import * as path from 'node:path';
import { CLIENT_FOLDER_DEFAULTS } from '../constants';
import { UnknownClientError } from '../errors';
import type {
    ClientConfigSet,
    ClientFolders,
    EffectiveSettings,
    FolderOverrides,
    ResolveOptions,
} from './types';

// Windows drive paths are absolute even when the daemon runs elsewhere
const isAbsolutePath = (value: string): boolean =>
    path.isAbsolute(value) || /^[A-Za-z]:[\\/]/.test(value);

const resolveFolder = (base: string, value: string | undefined, fallback: string): string => {
    if (!value) return path.join(base, fallback);
    if (isAbsolutePath(value)) return value;
    return path.join(base, value);
};

export const resolveFolders = (
    clientsRoot: string,
    clientId: string,
    overrides: FolderOverrides | null | undefined
): ClientFolders => {
    const base = path.join(clientsRoot, clientId);
    const folders = overrides ?? {};
    return {
        in_txt: resolveFolder(base, folders.in_txt, CLIENT_FOLDER_DEFAULTS.in_txt),
        ready_xlsx: resolveFolder(base, folders.ready_xlsx, CLIENT_FOLDER_DEFAULTS.ready_xlsx),
        archive: resolveFolder(base, folders.archive, CLIENT_FOLDER_DEFAULTS.archive),
        tracking_out: resolveFolder(base, folders.tracking_out, CLIENT_FOLDER_DEFAULTS.tracking_out),
        failures: resolveFolder(base, folders.failures, CLIENT_FOLDER_DEFAULTS.failures),
    };
};

export const listClients = (configs: ClientConfigSet): string[] =>
    Object.keys(configs.clients).sort();

/**
 * Produces the settings a batch runs with. The returned object is a copy; the
 * snapshot itself is never handed out for mutation.
 */
export const resolve = (
    configs: ClientConfigSet,
    clientId: string,
    options: ResolveOptions
): EffectiveSettings => {
    const client = configs.clients[clientId];
    if (!client) {
        throw new UnknownClientError(clientId);
    }

    const templatePath = client.template_path
        ? (isAbsolutePath(client.template_path)
            ? client.template_path
            : path.join(options.clientsRoot, clientId, client.template_path))
        : (options.templatePath ?? null);

    return {
        client_id: clientId,
        display_name: client.display_name,
        defaults: { ...client.defaults },
        services: client.services.map(service => ({ ...service, trigger: { ...service.trigger } })),
        template_mapping: { ...client.template_mapping },
        template_path: templatePath,
        folders: resolveFolders(options.clientsRoot, clientId, client.folders),
    };
};
