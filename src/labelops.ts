import 'dotenv/config';
import * as fs from 'node:fs/promises';
import * as Arguments from '@/arguments';
import * as AI from '@/ai';
import * as Config from '@/config';
import * as Daemon from '@/daemon';
import * as Ingest from '@/ingest';
import * as Pipeline from '@/pipeline';
import { enableFileLogging, getLogger, setLogLevel } from '@/logging';
import {
    ENV_OPENAI_API_KEY,
    ENV_OPENAI_MODEL,
    ENV_REDACT_NAMES,
    ENV_TELEGRAM_TOKEN,
    PROGRAM_NAME,
    VERSION,
} from '@/constants';
import { ConfigError, ConfigValidationError, errorMessage, UnknownClientError } from '@/errors';
import type { BatchResult } from '@/pipeline';

const applyLogLevel = (options: Arguments.CommonOptions): void => {
    if (options.verbose) {
        setLogLevel('verbose');
    }
    if (options.debug) {
        setLogLevel('debug');
    }
};

const createCorrector = (options: Arguments.AiOptions): AI.CorrectorInstance => AI.create({
    enabled: options.useAi,
    apiKey: process.env[ENV_OPENAI_API_KEY],
    model: process.env[ENV_OPENAI_MODEL],
    redactNames: process.env[ENV_REDACT_NAMES] === '1',
});

const openStore = (options: Arguments.CommonOptions): Promise<Config.StoreInstance> => Config.create({
    path: options.configPath,
    clientsRoot: options.clientsRoot,
    templatePath: options.templatePath,
});

const readStdin = async (): Promise<string> => {
    const chunks: Buffer[] = [];
    for await (const chunk of process.stdin) {
        chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
    return Buffer.concat(chunks).toString('utf-8');
};

const waitForShutdown = (): Promise<NodeJS.Signals> => new Promise(resolve => {
    process.once('SIGINT', () => resolve('SIGINT'));
    process.once('SIGTERM', () => resolve('SIGTERM'));
});

const printSummary = (result: BatchResult): void => {
    const lines = [
        `Batch ${result.batch_id} for ${result.client_id}${result.dry_run ? ' (dry run)' : ''}`,
        `Records written: ${result.record_count} of ${result.parsed_count} parsed`,
        `Parse warnings: ${result.parse_warnings.length}`,
        `Validation failures: ${result.validation_failures.length}`,
        `AI: ${result.ai_summary.enabled ? `${result.ai_summary.calls} call(s), ${result.ai_summary.applied} applied, ${result.ai_summary.flagged} flagged` : 'off'}`,
        `XLSX: ${result.output_xlsx}`,
        `Tracking CSV: ${result.tracking_csv}`,
        `Manifest: ${result.manifest_path ?? (result.manifest_error ? `not written (${result.manifest_error})` : 'none')}`,
    ];
    // eslint-disable-next-line no-console
    console.info(lines.join('\n'));
};

export const runDaemon = async (options: Arguments.DaemonOptions): Promise<number> => {
    applyLogLevel(options);
    const logFile = enableFileLogging(options.logDir);
    const logger = getLogger();
    logger.info('Starting %s daemon: %s (log file %s)', PROGRAM_NAME, VERSION, logFile);

    const store = await openStore(options);
    if (options.clients !== 'all') {
        for (const clientId of options.clients) {
            store.resolve(clientId);
        }
    }

    let bot: Ingest.BotInstance | null = null;
    if (options.useTelegram) {
        const token = process.env[ENV_TELEGRAM_TOKEN];
        if (!token) {
            throw new ConfigError(`${ENV_TELEGRAM_TOKEN} environment variable is required with --use-telegram 1`);
        }
        bot = Ingest.createBot({
            api: Ingest.createApi(token),
            allowlist: Ingest.createAllowlistStore({ path: options.allowlistPath }),
            store,
            fallbackClientId: options.defaultClient,
        });
    }

    const pipeline = Pipeline.create({ logDir: options.logDir, corrector: createCorrector(options) });
    const watcher = Daemon.create({
        store,
        pipeline,
        clients: options.clients,
        useAi: options.useAi,
        maxRisk: options.maxRisk,
        maxAiCalls: options.maxAiCalls,
        recursive: options.recursive,
        pollIntervalMs: options.pollIntervalMs,
        isolation: options.isolation,
    });

    await watcher.start();
    if (bot) {
        await bot.start();
    }

    const signal = await waitForShutdown();
    logger.info('Received %s, finishing the current batch', signal);
    if (bot) {
        await bot.stop();
    }
    await watcher.stop();
    logger.info('Daemon stopped');
    return 0;
};

export const runProcess = async (options: Arguments.ProcessOptions): Promise<number> => {
    applyLogLevel(options);
    enableFileLogging(options.logDir);

    const store = await openStore(options);
    const settings = store.resolve(options.client);
    const rawText = options.file ? await fs.readFile(options.file, 'utf-8') : await readStdin();

    const pipeline = Pipeline.create({ logDir: options.logDir, corrector: createCorrector(options) });
    const result = await pipeline.run({
        clientId: options.client,
        settings,
        rawText,
        inputFiles: options.file ? [options.file] : [],
        useAi: options.useAi,
        maxRisk: options.maxRisk,
        maxAiCalls: options.maxAiCalls,
        source: 'cli',
        dryRun: options.dryRun,
    });

    if (options.json) {
        process.stdout.write(`${JSON.stringify(result, null, 2)}\n`);
    } else {
        printSummary(result);
    }
    return 0;
};

export const runCheckConfig = async (options: Arguments.CommonOptions): Promise<number> => {
    applyLogLevel(options);
    try {
        const snapshot = Config.validate(await Config.load(options.configPath), { source: options.configPath });
        // eslint-disable-next-line no-console
        console.info(`Config OK: ${options.configPath} (${Config.listClients(snapshot).length} client(s))`);
        return 0;
    } catch (error) {
        if (error instanceof ConfigValidationError) {
            // eslint-disable-next-line no-console
            console.error(`Config invalid: ${options.configPath}\n- ${error.violations.join('\n- ')}`);
            return 1;
        }
        throw error;
    }
};

export const runClients = async (options: Arguments.CommonOptions): Promise<number> => {
    applyLogLevel(options);
    const store = await openStore(options);
    for (const clientId of store.listClients()) {
        const settings = store.resolve(clientId);
        // eslint-disable-next-line no-console
        console.info(`${clientId}\t${settings.display_name}\t${settings.folders.in_txt}`);
    }
    return 0;
};

export async function main(argv: string[] = process.argv): Promise<number> {
    let exitCode = 0;
    const program = Arguments.buildProgram({
        daemon: runDaemon,
        process: runProcess,
        checkConfig: runCheckConfig,
        clients: runClients,
    }, code => {
        exitCode = code;
    });

    try {
        await program.parseAsync(argv);
        return exitCode;
    } catch (error) {
        const logger = getLogger();
        if (error instanceof ConfigError || error instanceof UnknownClientError || error instanceof Arguments.ArgumentError) {
            logger.error(error.message);
        } else {
            logger.error('Exiting due to error: %s', errorMessage(error));
            if (error instanceof Error && error.stack) {
                logger.debug(error.stack);
            }
        }
        return 1;
    }
}
