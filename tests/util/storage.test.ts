import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import * as Storage from '../../src/util/storage';

describe('Storage', () => {
    let tempDir: string;
    const storage = Storage.create({});

    beforeEach(async () => {
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'labelops-storage-test-'));
    });

    afterEach(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('reports whether paths exist', async () => {
        const filePath = path.join(tempDir, 'a.txt');
        await fs.writeFile(filePath, 'x');

        expect(await storage.exists(filePath)).toBe(true);
        expect(await storage.exists(path.join(tempDir, 'missing.txt'))).toBe(false);
        expect(await storage.stat(path.join(tempDir, 'missing.txt'))).toBeNull();
        expect((await storage.stat(filePath))?.size).toBe(1);
    });

    it('writes atomically and leaves no temporary file behind', async () => {
        const filePath = path.join(tempDir, 'out.csv');

        await storage.writeFileAtomic(filePath, 'a,b\n');

        expect(await fs.readFile(filePath, 'utf-8')).toBe('a,b\n');
        expect(await fs.readdir(tempDir)).toEqual(['out.csv']);
    });

    it('cleans up when an atomic write cannot complete', async () => {
        const target = path.join(tempDir, 'target');
        await fs.mkdir(path.join(target, 'occupied'), { recursive: true });

        await expect(storage.writeFileAtomic(target, 'data')).rejects.toThrow();
        expect(await fs.readdir(tempDir)).toEqual(['target']);
    });

    it('moves files into a folder without overwriting', async () => {
        const archive = path.join(tempDir, 'ARCHIVE');
        const first = path.join(tempDir, 'orders.txt');
        await fs.writeFile(first, 'one');
        const firstDestination = await storage.moveToDirectory(first, archive);

        await fs.writeFile(first, 'two');
        const secondDestination = await storage.moveToDirectory(first, archive);

        expect(firstDestination).toBe(path.join(archive, 'orders.txt'));
        expect(path.basename(secondDestination)).toMatch(/^orders_\d{8}_\d{6}\.txt$/);
        expect(await fs.readFile(firstDestination, 'utf-8')).toBe('one');
        expect(await fs.readFile(secondDestination, 'utf-8')).toBe('two');
        expect(await storage.exists(first)).toBe(false);
    });

    it('lists matching files as absolute paths, skipping dot files', async () => {
        await fs.writeFile(path.join(tempDir, 'a.txt'), '');
        await fs.writeFile(path.join(tempDir, '.b.txt'), '');
        await fs.writeFile(path.join(tempDir, 'c.csv'), '');

        expect(await storage.listFiles(tempDir, ['*.txt'])).toEqual([path.join(tempDir, 'a.txt')]);
    });

    it('hashes text as hex SHA-256', () => {
        expect(storage.hashText('')).toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
    });
});
