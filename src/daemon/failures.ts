/**
 * Failure Handler
 *
 * Moves an input that could not be processed into the client's failures
 * folder and writes a `<name>.error.txt` beside it. Nothing here deletes
 * anything; operators clear the folder by hand.
 */

import * as path from 'node:path';
import * as Storage from '../util/storage';
import * as Logging from '../logging';
import { ERROR_ARTIFACT_SUFFIX } from '../constants';

export type FailureStage = 'read' | 'resolve' | 'pipeline' | 'archive';

export interface FailureDetails {
    error: unknown;
    clientId: string;
    stage: FailureStage;
    time?: Date;
}

export interface QuarantineResult {
    quarantinedPath: string;
    errorPath: string;
}

export interface FailureHandlerInstance {
    quarantine(filePath: string, failuresDir: string, details: FailureDetails): Promise<QuarantineResult>;
}

export const errorArtifactPath = (quarantinedPath: string): string => {
    const ext = path.extname(quarantinedPath);
    return path.join(path.dirname(quarantinedPath), `${path.basename(quarantinedPath, ext)}${ERROR_ARTIFACT_SUFFIX}`);
};

export const describeFailure = (fileName: string, details: FailureDetails): string => {
    const { error } = details;
    const kind = error instanceof Error ? error.name : 'Error';
    const message = error instanceof Error ? error.message : String(error);
    const lines = [
        `file: ${fileName}`,
        `client: ${details.clientId}`,
        `stage: ${details.stage}`,
        `time: ${(details.time ?? new Date()).toISOString()}`,
        `error: ${kind}: ${message}`,
    ];
    if (error instanceof Error && error.stack) {
        lines.push('', error.stack);
    }
    return `${lines.join('\n')}\n`;
};

export const create = (): FailureHandlerInstance => {
    const logger = Logging.getLogger();
    const storage = Storage.create({ log: logger.debug.bind(logger) });

    const quarantine = async (filePath: string, failuresDir: string, details: FailureDetails): Promise<QuarantineResult> => {
        let quarantinedPath = path.join(failuresDir, path.basename(filePath));
        if (await storage.exists(filePath)) {
            quarantinedPath = await storage.moveToDirectory(filePath, failuresDir);
        } else {
            // The input vanished; still leave the diagnostics where it would have gone
            await storage.createDirectory(failuresDir);
            logger.warn('Input %s disappeared before it could be quarantined', filePath);
        }

        const errorPath = errorArtifactPath(quarantinedPath);
        await storage.writeFileAtomic(errorPath, describeFailure(path.basename(filePath), details));
        logger.warn('Quarantined %s to %s (%s stage)', path.basename(filePath), quarantinedPath, details.stage);
        return { quarantinedPath, errorPath };
    };

    return { quarantine };
};
