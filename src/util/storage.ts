import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as crypto from 'node:crypto';
import dayjs from 'dayjs';
import { glob } from 'glob';

export interface FileStat {
    size: number;
    mtimeMs: number;
}

export interface Utility {
    exists: (filePath: string) => Promise<boolean>;
    createDirectory: (dirPath: string) => Promise<void>;
    readFile: (filePath: string, encoding: BufferEncoding) => Promise<string>;
    readBuffer: (filePath: string) => Promise<Buffer>;
    writeFile: (filePath: string, data: string | Buffer, encoding: BufferEncoding) => Promise<void>;
    writeFileAtomic: (filePath: string, data: string | Buffer) => Promise<void>;
    deleteFile: (filePath: string) => Promise<void>;
    stat: (filePath: string) => Promise<FileStat | null>;
    moveFile: (source: string, destination: string) => Promise<void>;
    moveToDirectory: (source: string, directory: string) => Promise<string>;
    listFiles: (directory: string, patterns: string[]) => Promise<string[]>;
    hashText: (text: string) => string;
}

const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
    error instanceof Error && 'code' in error;

export const create = (params: { log?: (message: string, ...args: unknown[]) => void }): Utility => {
    const log = params.log || (() => { });

    const exists = async (filePath: string): Promise<boolean> => {
        try {
            await fs.stat(filePath);
            return true;
        } catch {
            return false;
        }
    };

    const createDirectory = async (dirPath: string): Promise<void> => {
        await fs.mkdir(dirPath, { recursive: true });
    };

    const readFile = async (filePath: string, encoding: BufferEncoding): Promise<string> => {
        return fs.readFile(filePath, { encoding });
    };

    const readBuffer = async (filePath: string): Promise<Buffer> => {
        return fs.readFile(filePath);
    };

    const writeFile = async (filePath: string, data: string | Buffer, encoding: BufferEncoding): Promise<void> => {
        await fs.writeFile(filePath, data, { encoding });
    };

    /**
     * Writes to a temporary sibling and renames it into place, so readers never
     * see a partial file. The temporary file is removed when anything fails.
     */
    const writeFileAtomic = async (filePath: string, data: string | Buffer): Promise<void> => {
        const tempPath = path.join(
            path.dirname(filePath),
            `.${path.basename(filePath)}.${process.pid}.${crypto.randomBytes(4).toString('hex')}.tmp`
        );
        try {
            await fs.writeFile(tempPath, data);
            await fs.rename(tempPath, filePath);
        } catch (error) {
            await fs.rm(tempPath, { force: true });
            throw error;
        }
        log('Wrote %s', filePath);
    };

    const deleteFile = async (filePath: string): Promise<void> => {
        await fs.rm(filePath, { force: true });
    };

    const stat = async (filePath: string): Promise<FileStat | null> => {
        try {
            const stats = await fs.stat(filePath);
            return { size: stats.size, mtimeMs: stats.mtimeMs };
        } catch (error) {
            if (isErrnoException(error) && error.code === 'ENOENT') {
                return null;
            }
            throw error;
        }
    };

    const moveFile = async (source: string, destination: string): Promise<void> => {
        try {
            await fs.rename(source, destination);
        } catch (error) {
            if (!isErrnoException(error) || error.code !== 'EXDEV') {
                throw error;
            }
            await fs.copyFile(source, destination);
            await fs.rm(source);
        }
        log('Moved %s to %s', source, destination);
    };

    // Keeps the original name unless it is taken; then a timestamp and counter are added
    const uniqueDestination = async (directory: string, fileName: string): Promise<string> => {
        const candidate = path.join(directory, fileName);
        if (!await exists(candidate)) {
            return candidate;
        }
        const ext = path.extname(fileName);
        const stem = path.basename(fileName, ext);
        const stamp = dayjs().format('YYYYMMDD_HHmmss');
        for (let counter = 0; ; counter++) {
            const suffix = counter === 0 ? stamp : `${stamp}_${counter}`;
            const next = path.join(directory, `${stem}_${suffix}${ext}`);
            if (!await exists(next)) {
                return next;
            }
        }
    };

    const moveToDirectory = async (source: string, directory: string): Promise<string> => {
        await createDirectory(directory);
        const destination = await uniqueDestination(directory, path.basename(source));
        await moveFile(source, destination);
        return destination;
    };

    const listFiles = async (directory: string, patterns: string[]): Promise<string[]> => {
        return glob(patterns, { cwd: directory, nodir: true, absolute: true, dot: false });
    };

    const hashText = (text: string): string => {
        return crypto.createHash('sha256').update(text, 'utf8').digest('hex');
    };

    return {
        exists,
        createDirectory,
        readFile,
        readBuffer,
        writeFile,
        writeFileAtomic,
        deleteFile,
        stat,
        moveFile,
        moveToDirectory,
        listFiles,
        hashText,
    };
};
