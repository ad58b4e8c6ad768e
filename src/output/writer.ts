/**
 * Output Writer
 *
 * Produces the courier XLSX and the tracking CSV for a batch. Both files are
 * written to a temporary sibling and renamed into place, so a half-written
 * file never appears in a client folder.
 */

import * as path from 'node:path';
import dayjs from 'dayjs';
import * as XLSX from 'xlsx';
import * as Storage from '../util/storage';
import * as Logging from '../logging';
import { errorMessage, OutputWriteError } from '../errors';
import type { ClientFolders, TemplateMapping } from '../config/types';
import type { AddressRecord } from '../parser/types';
import { appendRecords, blankWorkbook, firstSheet, toBuffer, usedColumnCount } from './spreadsheet';
import { trackingCsv } from './tracking';
import type { OutputConfig, OutputPaths, TrackedRecord } from './types';

export interface OutputInstance {
    baseName(clientId: string, batchId: string, date: Date): string;
    planPaths(folders: ClientFolders, baseName: string): OutputPaths;
    write(
        records: readonly AddressRecord[],
        mapping: TemplateMapping,
        templatePath: string | null,
        readyDir: string,
        baseName: string
    ): Promise<string>;
    writeTracking(entries: readonly TrackedRecord[], trackingDir: string, baseName: string): Promise<string>;
}

export const create = (config: OutputConfig = {}): OutputInstance => {
    const logger = Logging.getLogger();
    const storage = Storage.create({ log: config.log ?? logger.debug.bind(logger) });

    const baseName = (clientId: string, batchId: string, date: Date): string =>
        `${clientId}_${dayjs(date).format('YYYYMMDD_HHmmss')}_${batchId.slice(0, 8)}`;

    const planPaths = (folders: ClientFolders, name: string): OutputPaths => ({
        xlsx: path.join(folders.ready_xlsx, `${name}.xlsx`),
        csv: path.join(folders.tracking_out, `${name}_tracking.csv`),
    });

    const loadWorkbook = async (templatePath: string | null): Promise<XLSX.WorkBook> => {
        if (!templatePath) {
            return blankWorkbook();
        }
        if (!await storage.exists(templatePath)) {
            throw new OutputWriteError(`Courier template not found: ${templatePath}`);
        }
        try {
            return XLSX.read(await storage.readBuffer(templatePath), { type: 'buffer' });
        } catch (error) {
            throw new OutputWriteError(`Could not read courier template ${templatePath}: ${errorMessage(error)}`, { cause: error });
        }
    };

    const write = async (
        records: readonly AddressRecord[],
        mapping: TemplateMapping,
        templatePath: string | null,
        readyDir: string,
        name: string
    ): Promise<string> => {
        const workbook = await loadWorkbook(templatePath);
        const target = path.join(readyDir, `${name}.xlsx`);
        try {
            const sheet = firstSheet(workbook);
            const widest = Math.max(...Object.values(mapping).filter((column): column is number => typeof column === 'number'));
            if (templatePath && usedColumnCount(sheet) < widest) {
                logger.warn('Template %s has %d columns but the mapping uses %d', templatePath, usedColumnCount(sheet), widest);
            }
            const startRow = appendRecords(sheet, records, mapping);
            await storage.createDirectory(readyDir);
            await storage.writeFileAtomic(target, toBuffer(workbook));
            logger.info('Wrote %d row(s) from row %d to %s', records.length, startRow + 1, target);
            return target;
        } catch (error) {
            throw new OutputWriteError(`Failed to write ${target}: ${errorMessage(error)}`, { cause: error });
        }
    };

    const writeTracking = async (
        entries: readonly TrackedRecord[],
        trackingDir: string,
        name: string
    ): Promise<string> => {
        const target = path.join(trackingDir, `${name}_tracking.csv`);
        try {
            await storage.createDirectory(trackingDir);
            await storage.writeFileAtomic(target, trackingCsv(entries));
            logger.info('Wrote tracking CSV %s', target);
            return target;
        } catch (error) {
            throw new OutputWriteError(`Failed to write ${target}: ${errorMessage(error)}`, { cause: error });
        }
    };

    return { baseName, planPaths, write, writeTracking };
};
