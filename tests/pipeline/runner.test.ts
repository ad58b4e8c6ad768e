import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as crypto from 'crypto';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import * as Pipeline from '../../src/pipeline';
import { AIUnavailableError, EmptyBatchError, OutputWriteError } from '../../src/errors';
import type { CorrectorInstance, Suggestion } from '../../src/ai';
import type { EffectiveSettings } from '../../src/config/types';
import type { AddressRecord } from '../../src/parser/types';
import type { BatchInput } from '../../src/pipeline';
import { addressRecord, settingsFor, TWO_RECIPIENTS } from '../helpers';

vi.mock('../../src/logging', async (importOriginal) => ({
    ...await importOriginal<typeof import('../../src/logging')>(),
    getLogger: () => ({
        info: vi.fn(),
        debug: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
    }),
}));

const GRACE_WITHOUT_POSTCODE = 'Grace O\'Neil, Flat 2, 10 High Street, Stonehaven, Aberdeenshire, UK';
const MARTIN = TWO_RECIPIENTS.split('\n')[2];

const OFF: CorrectorInstance = { enabled: false, suggest: async () => [] };

const fakeCorrector = (suggest: (record: AddressRecord) => Promise<Suggestion[]>): CorrectorInstance => ({
    enabled: true,
    suggest: vi.fn(suggest),
});

const exists = async (filePath: string): Promise<boolean> => {
    try {
        await fs.stat(filePath);
        return true;
    } catch {
        return false;
    }
};

describe('Pipeline runner', () => {
    let tempDir: string;
    let logDir: string;
    let settings: EffectiveSettings;

    const batch = (overrides: Partial<BatchInput> = {}): BatchInput => ({
        clientId: 'client_01',
        settings,
        rawText: TWO_RECIPIENTS,
        inputFiles: [path.join(tempDir, 'orders.txt')],
        useAi: false,
        maxRisk: 'low',
        maxAiCalls: 50,
        source: 'cli',
        dryRun: false,
        ...overrides,
    });

    beforeEach(async () => {
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'labelops-pipeline-test-'));
        logDir = path.join(tempDir, 'logs');
        settings = settingsFor(tempDir);
    });

    afterEach(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('writes the spreadsheet, tracking CSV and manifest for a batch', async () => {
        const result = await Pipeline.create({ logDir, corrector: OFF }).run(batch());

        expect(result.record_count).toBe(2);
        expect(result.parsed_count).toBe(2);
        expect(result.services_used).toEqual({ T24: 2 });
        expect(path.dirname(result.output_xlsx)).toBe(settings.folders.ready_xlsx);
        expect(path.dirname(result.tracking_csv)).toBe(settings.folders.tracking_out);
        expect(await exists(result.output_xlsx)).toBe(true);
        expect(await exists(result.tracking_csv)).toBe(true);

        expect(result.manifest_path).not.toBeNull();
        const manifestText = await fs.readFile(result.manifest_path ?? '', 'utf-8');
        const manifest = JSON.parse(manifestText);
        expect(manifest.record_count).toBe(2);
        expect(manifest.batch_id).toBe(result.batch_id);
        expect(manifest.input_files).toEqual(['orders.txt']);
        expect(manifest.input_text_sha256).toBe(crypto.createHash('sha256').update(TWO_RECIPIENTS, 'utf8').digest('hex'));
        expect(manifest.source).toBe('cli');
    });

    it('keeps address values out of the manifest', async () => {
        const result = await Pipeline.create({ logDir, corrector: OFF }).run(batch());
        const manifestText = await fs.readFile(result.manifest_path ?? '', 'utf-8');

        for (const value of ['Grace', 'Martin', 'Stonehaven', 'AB53 8HY', 'CF64 4BU', 'Riverside']) {
            expect(manifestText).not.toContain(value);
        }
    });

    it('uses the matched service and notes the tag', async () => {
        const rawText = `[T48]\n${GRACE_WITHOUT_POSTCODE}, AB53 8HY\n\n${MARTIN}`;
        const result = await Pipeline.create({ logDir, corrector: OFF }).run(batch({ rawText }));

        expect(result.services_used).toEqual({ T48: 1, T24: 1 });
        const lines = (await fs.readFile(result.tracking_csv, 'utf-8')).trimEnd().split('\n');
        expect(lines[1]).toBe('Grace O\'Neil,AB53 8HY,T48,1,,Tag matched: T48,');
        expect(lines[2]).toBe('Martin Wilkie,CF64 4BU,T24,1,,,');
    });

    it('skips malformed blocks and writes the rest', async () => {
        const result = await Pipeline.create({ logDir, corrector: OFF }).run(batch({ rawText: `Just a name\n\n${TWO_RECIPIENTS}` }));

        expect(result.parse_warnings).toEqual([
            { block_index: 0, line_count: 1, reason: 'Single line block with no address fields' },
        ]);
        expect(result.record_count).toBe(2);
    });

    it('excludes records missing required fields', async () => {
        const result = await Pipeline.create({ logDir, corrector: OFF })
            .run(batch({ rawText: `${GRACE_WITHOUT_POSTCODE}\n\n${MARTIN}` }));

        expect(result.validation_failures).toEqual([{ record_index: 0, missing_fields: ['postcode'] }]);
        expect(result.parsed_count).toBe(2);
        expect(result.record_count).toBe(1);
    });

    it('fails an empty batch without writing anything', async () => {
        await expect(Pipeline.create({ logDir, corrector: OFF }).run(batch({ rawText: 'Just a name' })))
            .rejects.toBeInstanceOf(EmptyBatchError);
        expect(await exists(settings.folders.ready_xlsx)).toBe(false);
        expect(await exists(logDir)).toBe(false);
    });

    it('reports the same outcome in a dry run without writing files', async () => {
        const pipeline = Pipeline.create({ logDir, corrector: OFF });
        const rawText = `Just a name\n\n${GRACE_WITHOUT_POSTCODE}\n\n${MARTIN}`;

        const dry = await pipeline.run(batch({ rawText, dryRun: true }));
        expect(await exists(settings.folders.ready_xlsx)).toBe(false);
        expect(await exists(settings.folders.tracking_out)).toBe(false);
        expect(await exists(logDir)).toBe(false);

        const real = await pipeline.run(batch({ rawText }));

        expect(dry.dry_run).toBe(true);
        expect(dry.manifest_path).toBeNull();
        expect(dry.record_count).toBe(real.record_count);
        expect(dry.parsed_count).toBe(real.parsed_count);
        expect(dry.parse_warnings).toEqual(real.parse_warnings);
        expect(dry.validation_failures).toEqual(real.validation_failures);
        expect(dry.services_used).toEqual(real.services_used);
        expect(dry.ai_summary).toEqual(real.ai_summary);
        expect(path.dirname(dry.output_xlsx)).toBe(path.dirname(real.output_xlsx));
    });

    it('keeps the outputs when the manifest cannot be written', async () => {
        const blocker = path.join(tempDir, 'blocker');
        await fs.writeFile(blocker, 'not a directory');

        const result = await Pipeline.create({ logDir: blocker, corrector: OFF }).run(batch());

        expect(result.manifest_path).toBeNull();
        expect(result.manifest_error).toMatch(/^Failed to write manifest /);
        expect(await exists(result.output_xlsx)).toBe(true);
    });

    it('removes the spreadsheet when the tracking CSV fails', async () => {
        const blocker = path.join(tempDir, 'blocker');
        await fs.writeFile(blocker, 'not a directory');
        const broken: EffectiveSettings = { ...settings, folders: { ...settings.folders, tracking_out: path.join(blocker, 'TRACKING_OUT') } };

        await expect(Pipeline.create({ logDir, corrector: OFF }).run(batch({ settings: broken })))
            .rejects.toBeInstanceOf(OutputWriteError);
        expect(await fs.readdir(settings.folders.ready_xlsx)).toEqual([]);
    });

    describe('address corrections', () => {
        const postcodeFix: Suggestion = {
            field: 'postcode',
            original: '',
            proposed_value: 'ab538hy',
            confidence: 0.95,
            risk: 'low',
            reason: 'known street',
        };
        const countyFix: Suggestion = {
            field: 'county',
            original: 'Aberdeenshire',
            proposed_value: 'Kincardineshire',
            confidence: 0.6,
            risk: 'medium',
            reason: 'historic county',
        };

        it('applies low-risk fixes and flags the rest for review', async () => {
            const corrector = fakeCorrector(async () => [postcodeFix, countyFix]);
            const result = await Pipeline.create({ logDir, corrector })
                .run(batch({ rawText: `${GRACE_WITHOUT_POSTCODE}\n\n${MARTIN}`, useAi: true }));

            expect(corrector.suggest).toHaveBeenCalledTimes(1);
            expect(result.record_count).toBe(2);
            expect(result.ai_summary).toEqual({
                enabled: true,
                max_risk: 'low',
                calls: 1,
                applied: 1,
                flagged: 1,
                unavailable: 0,
                skipped_over_budget: 0,
            });
            expect(result.flagged_suggestions).toEqual([{ ...countyFix, record_index: 0 }]);

            const lines = (await fs.readFile(result.tracking_csv, 'utf-8')).trimEnd().split('\n');
            expect(lines[1]).toBe('Grace O\'Neil,AB53 8HY,T24,1,,,review');
        });

        it('marks records whose fixes were all applied', async () => {
            const corrector = fakeCorrector(async () => [postcodeFix]);
            const result = await Pipeline.create({ logDir, corrector })
                .run(batch({ rawText: GRACE_WITHOUT_POSTCODE, useAi: true }));

            const lines = (await fs.readFile(result.tracking_csv, 'utf-8')).trimEnd().split('\n');
            expect(lines[1]).toBe('Grace O\'Neil,AB53 8HY,T24,1,,,applied');
        });

        it('does not call the model when corrections are off', async () => {
            const corrector = fakeCorrector(async () => [postcodeFix]);
            const result = await Pipeline.create({ logDir, corrector })
                .run(batch({ rawText: `${GRACE_WITHOUT_POSTCODE}\n\n${MARTIN}` }));

            expect(corrector.suggest).not.toHaveBeenCalled();
            expect(result.ai_summary.enabled).toBe(false);
            expect(result.record_count).toBe(1);
        });

        it('stops calling the model once the batch budget is spent', async () => {
            const corrector = fakeCorrector(async () => [postcodeFix]);
            const rawText = `${GRACE_WITHOUT_POSTCODE}\n\n${GRACE_WITHOUT_POSTCODE}\n\n${MARTIN}`;
            const result = await Pipeline.create({ logDir, corrector }).run(batch({ rawText, useAi: true, maxAiCalls: 1 }));

            expect(corrector.suggest).toHaveBeenCalledTimes(1);
            expect(result.ai_summary.calls).toBe(1);
            expect(result.ai_summary.skipped_over_budget).toBe(1);
            expect(result.validation_failures).toEqual([{ record_index: 1, missing_fields: ['postcode'] }]);
            expect(result.record_count).toBe(2);
        });

        it('continues without corrections when the model is unavailable', async () => {
            const corrector = fakeCorrector(async () => {
                throw new AIUnavailableError('offline');
            });
            const result = await Pipeline.create({ logDir, corrector })
                .run(batch({ rawText: `${GRACE_WITHOUT_POSTCODE}\n\n${MARTIN}`, useAi: true }));

            expect(result.ai_summary.unavailable).toBe(1);
            expect(result.validation_failures).toEqual([{ record_index: 0, missing_fields: ['postcode'] }]);
            expect(result.record_count).toBe(1);
        });

        it('propagates unexpected corrector failures', async () => {
            const corrector = fakeCorrector(async () => {
                throw new TypeError('bug');
            });

            await expect(Pipeline.create({ logDir, corrector })
                .run(batch({ rawText: GRACE_WITHOUT_POSTCODE, useAi: true }))).rejects.toThrow('bug');
        });
    });

    it('runs batches for one client one at a time', async () => {
        let release: () => void = () => undefined;
        const gate = new Promise<void>(resolve => {
            release = resolve;
        });
        const corrector = fakeCorrector(async () => {
            await gate;
            return [];
        });
        const pipeline = Pipeline.create({ logDir, corrector });
        const finished: string[] = [];

        const first = pipeline.run(batch({ rawText: `${GRACE_WITHOUT_POSTCODE}\n\n${MARTIN}`, useAi: true }))
            .then(() => finished.push('first'));
        const second = pipeline.run(batch()).then(() => finished.push('second'));
        const other = pipeline.run(batch({ clientId: 'client_02', settings: { ...settings, client_id: 'client_02' } }))
            .then(() => finished.push('other'));

        await other;
        expect(finished).toEqual(['other']);

        release();
        await Promise.all([first, second]);
        expect(finished).toEqual(['other', 'first', 'second']);
    });

    it('lists the required fields a record is missing', () => {
        expect(Pipeline.validateRecord(addressRecord())).toEqual([]);
        expect(Pipeline.validateRecord(addressRecord({ town_city: ' ', weight_kg: 0 }))).toEqual(['town_city', 'weight_kg']);
    });
});
