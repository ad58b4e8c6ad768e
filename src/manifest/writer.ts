import * as path from 'node:path';
import * as Storage from '../util/storage';
import * as Logging from '../logging';
import { MANIFEST_VERSION } from '../constants';
import { errorMessage, ManifestWriteError } from '../errors';
import type { Manifest, ManifestInput } from './types';

const storage = Storage.create({});

export const sha256Text = (text: string): string => storage.hashText(text);

/** Counts records per service value. */
export const countServices = (services: Iterable<string>): Record<string, number> => {
    const counts: Record<string, number> = {};
    for (const service of services) {
        const key = service || 'unknown';
        counts[key] = (counts[key] ?? 0) + 1;
    }
    return counts;
};

const safeFileComponent = (value: string): string =>
    value.trim().replace(/\s+/g, '_').replace(/[^A-Za-z0-9_.-]/g, '_') || 'client';

export const build = (input: ManifestInput): Manifest => ({
    manifest_version: MANIFEST_VERSION,
    batch_id: input.batchId,
    timestamp: (input.timestamp ?? new Date()).toISOString(),
    client_id: input.clientId,
    source: input.source,
    input_files: input.inputFiles.map(file => path.basename(file)),
    input_text_sha256: sha256Text(input.rawText),
    output_xlsx: input.outputXlsx,
    tracking_csv: input.trackingCsv,
    record_count: input.recordCount,
    parse_warning_count: input.parseWarningCount,
    validation_failure_count: input.validationFailureCount,
    defaults_used: { ...input.defaultsUsed },
    services_used: { ...input.servicesUsed },
    ai_corrections: { ...input.aiSummary },
});

/** `<client>_<YYYY-MM-DD>_<batch id>.manifest.json`, dated in UTC. */
export const fileName = (manifest: Manifest): string =>
    `${safeFileComponent(manifest.client_id)}_${manifest.timestamp.slice(0, 10)}_${manifest.batch_id}.manifest.json`;

export const write = async (manifest: Manifest, directory: string): Promise<string> => {
    const logger = Logging.getLogger();
    const target = path.join(directory, fileName(manifest));
    try {
        await storage.createDirectory(directory);
        await storage.writeFileAtomic(target, `${JSON.stringify(manifest, null, 2)}\n`);
    } catch (error) {
        throw new ManifestWriteError(`Failed to write manifest ${target}: ${errorMessage(error)}`, { cause: error });
    }
    logger.info('Wrote manifest %s', target);
    return target;
};
