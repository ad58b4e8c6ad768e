import * as yaml from 'js-yaml';
import * as Storage from '../util/storage';
import * as Logging from '../logging';
import { ConfigNotFoundError, ConfigParseError, errorMessage } from '../errors';
import { DEFAULT_CHARACTER_ENCODING } from '../constants';
import type { ConfigDocument } from './types';

const isMapping = (value: unknown): value is ConfigDocument =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Reads the YAML client document. The result is structurally unchecked; pass it
 * through `validate` before use.
 */
export const load = async (configPath: string): Promise<ConfigDocument> => {
    const logger = Logging.getLogger();
    const storage = Storage.create({ log: logger.debug.bind(logger) });

    if (!await storage.exists(configPath)) {
        throw new ConfigNotFoundError(configPath);
    }

    const text = await storage.readFile(configPath, DEFAULT_CHARACTER_ENCODING);
    return parse(text, configPath);
};

export const parse = (text: string, source: string = '<inline>'): ConfigDocument => {
    let data: unknown;
    try {
        data = yaml.load(text);
    } catch (error) {
        throw new ConfigParseError(`Malformed config document ${source}: ${errorMessage(error)}`);
    }

    if (data === undefined || data === null) {
        return {};
    }
    if (!isMapping(data)) {
        throw new ConfigParseError(`Config root in ${source} must be a mapping of client IDs to settings`);
    }
    return data;
};
