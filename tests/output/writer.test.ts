import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import * as XLSX from 'xlsx';
import * as Output from '../../src/output';
import { OutputWriteError } from '../../src/errors';
import type { TemplateMapping } from '../../src/config/types';
import { addressRecord } from '../helpers';

vi.mock('../../src/logging', () => ({
    getLogger: () => ({
        info: vi.fn(),
        debug: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
    }),
}));

const MAPPING: TemplateMapping = {
    full_name: 1,
    address_line_1: 2,
    address_line_2: 3,
    town_city: 4,
    county: 5,
    postcode: 6,
    country: 7,
    service: 8,
    weight_kg: 9,
    reference: 10,
};

const cell = (sheet: XLSX.WorkSheet, address: string): unknown => sheet[address]?.v;

describe('Output writer', () => {
    let tempDir: string;

    beforeEach(async () => {
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'labelops-output-test-'));
    });

    afterEach(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    const readSheet = async (filePath: string): Promise<XLSX.WorkSheet> =>
        Output.firstSheet(XLSX.read(await fs.readFile(filePath), { type: 'buffer' }));

    it('names outputs after client, time and batch', () => {
        const output = Output.create();
        const name = output.baseName('client_01', '1234567890abcdef', new Date(2024, 0, 2, 3, 4, 5));

        expect(name).toBe('client_01_20240102_030405_12345678');
        expect(output.planPaths({
            in_txt: '/c/IN_TXT',
            ready_xlsx: '/c/READY_XLSX',
            archive: '/c/ARCHIVE',
            tracking_out: '/c/TRACKING_OUT',
            failures: '/c/FAILURES',
        }, name)).toEqual({
            xlsx: path.join('/c/READY_XLSX', `${name}.xlsx`),
            csv: path.join('/c/TRACKING_OUT', `${name}_tracking.csv`),
        });
    });

    it('writes one row per record into a blank workbook', async () => {
        const output = Output.create();
        const readyDir = path.join(tempDir, 'READY_XLSX');
        const records = [
            addressRecord({ reference: 'ORD-1', postcode: 'ab53 8hy' }),
            addressRecord({ full_name: 'Martin Wilkie', weight_kg: 2.5, country: 'united kingdom' }),
        ];

        const written = await output.write(records, MAPPING, null, readyDir, 'batch');
        const sheet = await readSheet(written);

        expect(written).toBe(path.join(readyDir, 'batch.xlsx'));
        expect(cell(sheet, 'A1')).toBe('Grace O\'Neil');
        expect(cell(sheet, 'F1')).toBe('AB53 8HY');
        expect(cell(sheet, 'H1')).toBe('T24');
        expect(cell(sheet, 'I1')).toBe(1);
        expect(cell(sheet, 'J1')).toBe('ORD-1');
        expect(cell(sheet, 'A2')).toBe('Martin Wilkie');
        expect(cell(sheet, 'G2')).toBe('UNITED KINGDOM');
        expect(cell(sheet, 'I2')).toBe(2.5);
    });

    it('appends below existing template rows and keeps them', async () => {
        const templatePath = path.join(tempDir, 'template.xlsx');
        const template = XLSX.utils.book_new();
        XLSX.utils.book_append_sheet(template, XLSX.utils.aoa_to_sheet([
            ['Name', 'Address 1', 'Address 2', 'Town', 'County', 'Postcode', 'Country', 'Service', 'Weight', 'Reference'],
        ]), 'Import');
        await fs.writeFile(templatePath, XLSX.write(template, { type: 'buffer', bookType: 'xlsx' }));

        const written = await Output.create().write([addressRecord()], MAPPING, templatePath, tempDir, 'batch');
        const workbook = XLSX.read(await fs.readFile(written), { type: 'buffer' });
        const sheet = Output.firstSheet(workbook);

        expect(workbook.SheetNames).toEqual(['Import']);
        expect(cell(sheet, 'A1')).toBe('Name');
        expect(cell(sheet, 'A2')).toBe('Grace O\'Neil');
        expect(cell(sheet, 'D2')).toBe('Stonehaven');
    });

    it('fails when the configured template is missing', async () => {
        const missing = path.join(tempDir, 'missing.xlsx');

        await expect(Output.create().write([addressRecord()], MAPPING, missing, tempDir, 'batch'))
            .rejects.toThrow(new OutputWriteError(`Courier template not found: ${missing}`));
    });

    it('writes the tracking CSV with a header row', async () => {
        const trackingDir = path.join(tempDir, 'TRACKING_OUT');
        const written = await Output.create().writeTracking([
            { record: addressRecord({ reference: 'ORD-1', notes: 'Tag matched: T48' }), ai_flag: '' },
            { record: addressRecord({ full_name: 'Martin Wilkie', postcode: 'CF64 4BU' }), ai_flag: 'applied' },
        ], trackingDir, 'batch');

        expect(written).toBe(path.join(trackingDir, 'batch_tracking.csv'));
        const lines = (await fs.readFile(written, 'utf-8')).trimEnd().split('\n');
        expect(lines).toEqual([
            'full_name,postcode,service,weight_kg,reference,notes,ai_flag',
            'Grace O\'Neil,AB53 8HY,T24,1,ORD-1,Tag matched: T48,',
            'Martin Wilkie,CF64 4BU,T24,1,,,applied',
        ]);
    });
});

describe('Spreadsheet rows', () => {
    it('finds the first row whose mapped columns are empty', () => {
        const sheet = XLSX.utils.aoa_to_sheet([['taken', 'x'], ['', 'only in B'], ['taken']]);

        expect(Output.findFirstEmptyRow(sheet, [1])).toBe(1);
        expect(Output.findFirstEmptyRow(sheet, [1, 2])).toBe(3);
    });
});
