import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';

const { mockCreate, logger } = vi.hoisted(() => ({
    mockCreate: vi.fn(),
    logger: {
        info: vi.fn(),
        debug: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
    },
}));

vi.mock('openai', () => {
    class MockOpenAI {
        static APIConnectionTimeoutError = class extends Error {};
        chat = { completions: { create: mockCreate } };
    }
    return { default: MockOpenAI };
});

vi.mock('../../src/logging', async (importOriginal) => ({
    ...await importOriginal<typeof import('../../src/logging')>(),
    getLogger: () => logger,
}));

import * as Pipeline from '../../src/pipeline';
import * as OpenAICorrector from '../../src/ai/openai';
import { settingsFor } from '../helpers';

describe('Correction failures in the batch log', () => {
    let tempDir: string;

    beforeEach(async () => {
        vi.clearAllMocks();
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'labelops-correction-log-test-'));
    });

    afterEach(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('logs a malformed model reply without any address text', async () => {
        mockCreate.mockResolvedValue({
            choices: [{ message: { content: '{"suggestions":[{"field":"address_line_1","suggested":Flat 2 Grace O Neil Stonehaven}]}' } }],
        });
        const corrector = OpenAICorrector.create({ apiKey: 'test-secret' });

        const result = await Pipeline.create({ logDir: path.join(tempDir, 'logs'), corrector }).run({
            clientId: 'client_01',
            settings: settingsFor(tempDir),
            rawText: 'Grace O\'Neil, Flat 2, 10 High Street, Stonehaven, Aberdeenshire, UK',
            inputFiles: [],
            useAi: true,
            maxRisk: 'low',
            maxAiCalls: 5,
            source: 'cli',
            dryRun: true,
        });

        expect(result.ai_summary.unavailable).toBe(1);
        expect(logger.warn).toHaveBeenCalledWith(
            'Correction skipped for record %d: %s',
            0,
            'Model output was not usable: SyntaxError in a 87 character reply',
        );
        const logged = JSON.stringify([...logger.warn.mock.calls, ...logger.info.mock.calls, ...logger.error.mock.calls]);
        for (const value of ['Flat 2', 'Grace', 'Stonehaven', 'High Street']) {
            expect(logged).not.toContain(value);
        }
    });
});
