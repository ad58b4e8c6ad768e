import { Command } from 'commander';
import { z } from 'zod';
import {
    CLIENT_ID_PATTERN,
    DEFAULT_ALLOWLIST_PATH,
    DEFAULT_CLIENT_ID,
    DEFAULT_CLIENTS_ROOT,
    DEFAULT_CONFIG_PATH,
    DEFAULT_LOG_DIR,
    DEFAULT_MAX_AI_CALLS,
    DEFAULT_MAX_RISK,
    DEFAULT_POLL_INTERVAL_MS,
    ENV_ALLOWLIST_PATH,
    ENV_CLIENTS_ROOT,
    ENV_CONFIG_PATH,
    ENV_DEFAULT_CLIENT,
    ENV_LOG_DIR,
    ENV_TEMPLATE_PATH,
    PROGRAM_NAME,
    RISK_LEVELS,
    VERSION,
} from '@/constants';
import type { RiskLevel } from '@/ai/types';
import type { Isolation } from '@/daemon';

export class ArgumentError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ArgumentError';
    }
}

export interface CommonOptions {
    configPath: string;
    clientsRoot: string;
    logDir: string;
    templatePath: string | null;
    verbose: boolean;
    debug: boolean;
}

export interface AiOptions {
    useAi: boolean;
    maxRisk: RiskLevel;
    maxAiCalls: number;
}

export interface DaemonOptions extends CommonOptions, AiOptions {
    clients: string[] | 'all';
    useTelegram: boolean;
    recursive: boolean;
    pollIntervalMs: number;
    isolation: Isolation;
    allowlistPath: string;
    defaultClient: string;
}

export interface ProcessOptions extends CommonOptions, AiOptions {
    client: string;
    file: string | null;
    dryRun: boolean;
    json: boolean;
}

export interface CommandHandlers {
    daemon(options: DaemonOptions): Promise<number>;
    process(options: ProcessOptions): Promise<number>;
    checkConfig(options: CommonOptions): Promise<number>;
    clients(options: CommonOptions): Promise<number>;
}

const BinaryFlag = z.enum(['0', '1'], { errorMap: () => ({ message: 'expected 0 or 1' }) })
    .transform(value => value === '1');

const ClientsSchema = z.string().transform((value, ctx): string[] | 'all' => {
    if (value.trim().toLowerCase() === 'all') return 'all';
    const clients = value.split(',').map(item => item.trim().toLowerCase()).filter(Boolean);
    if (clients.length === 0) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'no clients specified' });
        return z.NEVER;
    }
    for (const client of clients) {
        if (!CLIENT_ID_PATTERN.test(client)) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid client ID ${client} (expected client_NN)` });
        }
    }
    return clients;
});

const CommonSchema = z.object({
    config: z.string().optional(),
    clientsRoot: z.string().optional(),
    logDir: z.string().optional(),
    template: z.string().optional(),
    verbose: z.boolean().default(false),
    debug: z.boolean().default(false),
});

const AiSchema = z.object({
    useAi: BinaryFlag.default('0'),
    autoApplyMaxRisk: z.enum(RISK_LEVELS).default(DEFAULT_MAX_RISK),
    maxAiCalls: z.coerce.number().int().min(0).default(DEFAULT_MAX_AI_CALLS),
});

const DaemonSchema = CommonSchema.merge(AiSchema).extend({
    clients: ClientsSchema.default('all'),
    useTelegram: BinaryFlag.default('0'),
    recursive: BinaryFlag.default('0'),
    pollInterval: z.coerce.number().int().min(100).default(DEFAULT_POLL_INTERVAL_MS),
    isolation: z.enum(['shared', 'per-client']).default('shared'),
    allowlist: z.string().optional(),
    defaultClient: z.string().regex(CLIENT_ID_PATTERN, 'expected client_NN').optional(),
});

const ProcessSchema = CommonSchema.merge(AiSchema).extend({
    client: z.string().regex(CLIENT_ID_PATTERN, 'expected client_NN'),
    file: z.string().optional(),
    dryRun: z.boolean().default(false),
    json: z.boolean().default(false),
});

const flagName = (key: string): string =>
    `--${key.replace(/[A-Z]/g, letter => `-${letter.toLowerCase()}`)}`;

const parseWith = <T extends z.ZodTypeAny>(schema: T, raw: unknown): z.output<T> => {
    const result = schema.safeParse(raw);
    if (!result.success) {
        const problems = result.error.issues.map(issue =>
            issue.path.length > 0 ? `${flagName(String(issue.path[0]))}: ${issue.message}` : issue.message);
        throw new ArgumentError(`Invalid options:\n- ${problems.join('\n- ')}`);
    }
    return result.data;
};

const env = (name: string): string | undefined => process.env[name] || undefined;

const toCommon = (raw: z.output<typeof CommonSchema>): CommonOptions => ({
    configPath: raw.config ?? env(ENV_CONFIG_PATH) ?? DEFAULT_CONFIG_PATH,
    clientsRoot: raw.clientsRoot ?? env(ENV_CLIENTS_ROOT) ?? DEFAULT_CLIENTS_ROOT,
    logDir: raw.logDir ?? env(ENV_LOG_DIR) ?? DEFAULT_LOG_DIR,
    templatePath: raw.template ?? env(ENV_TEMPLATE_PATH) ?? null,
    verbose: raw.verbose,
    debug: raw.debug,
});

export const parseDaemonOptions = (raw: unknown): DaemonOptions => {
    const parsed = parseWith(DaemonSchema, raw);
    return {
        ...toCommon(parsed),
        clients: parsed.clients,
        useTelegram: parsed.useTelegram,
        useAi: parsed.useAi,
        maxRisk: parsed.autoApplyMaxRisk,
        maxAiCalls: parsed.maxAiCalls,
        recursive: parsed.recursive,
        pollIntervalMs: parsed.pollInterval,
        isolation: parsed.isolation,
        allowlistPath: parsed.allowlist ?? env(ENV_ALLOWLIST_PATH) ?? DEFAULT_ALLOWLIST_PATH,
        defaultClient: parsed.defaultClient ?? env(ENV_DEFAULT_CLIENT) ?? DEFAULT_CLIENT_ID,
    };
};

export const parseProcessOptions = (raw: unknown): ProcessOptions => {
    const parsed = parseWith(ProcessSchema, raw);
    return {
        ...toCommon(parsed),
        client: parsed.client,
        file: parsed.file ?? null,
        dryRun: parsed.dryRun,
        json: parsed.json,
        useAi: parsed.useAi,
        maxRisk: parsed.autoApplyMaxRisk,
        maxAiCalls: parsed.maxAiCalls,
    };
};

export const parseCommonOptions = (raw: unknown): CommonOptions => toCommon(parseWith(CommonSchema, raw));

const addCommonOptions = (command: Command): Command => command
    .option('--config <path>', `client config YAML (default: $${ENV_CONFIG_PATH} or ${DEFAULT_CONFIG_PATH})`)
    .option('--clients-root <path>', 'root folder holding one folder per client')
    .option('--log-dir <path>', 'folder for the log file and batch manifests')
    .option('--template <path>', 'courier template used when a client names none')
    .option('--verbose', 'enable verbose logging')
    .option('--debug', 'enable debug logging');

const addAiOptions = (command: Command): Command => command
    .option('--use-ai <0|1>', 'ask the model to correct doubtful addresses', '0')
    .option('--auto-apply-max-risk <level>', `highest risk applied without review (${RISK_LEVELS.join('|')})`, DEFAULT_MAX_RISK)
    .option('--max-ai-calls <n>', 'model calls allowed per batch', String(DEFAULT_MAX_AI_CALLS));

/**
 * Builds the command line. Each action validates its options and hands them
 * to the matching handler; the handler's return value becomes the exit code.
 */
export const buildProgram = (handlers: CommandHandlers, onExit: (code: number) => void): Command => {
    const program = new Command();
    program
        .name(PROGRAM_NAME)
        .summary('Turn pasted shipment notes into courier import files')
        .description('LabelOps converts free-text shipment notes into courier XLSX, tracking CSV and audit manifests for multiple clients')
        .version(VERSION);

    addAiOptions(addCommonOptions(program.command('daemon')))
        .description('watch client folders (and optionally Telegram) and process files as they arrive')
        .option('--clients <all|list>', 'comma-separated client IDs to watch', 'all')
        .option('--use-telegram <0|1>', 'accept orders from allowlisted Telegram chats', '0')
        .option('--recursive <0|1>', 'also watch sub-folders of in_txt', '0')
        .option('--poll-interval <ms>', 'folder poll interval in milliseconds', String(DEFAULT_POLL_INTERVAL_MS))
        .option('--isolation <mode>', 'shared: one batch at a time overall; per-client: one per client', 'shared')
        .option('--allowlist <path>', 'Telegram allowlist JSON')
        .option('--default-client <id>', 'client for chats without a default')
        .action(async (raw: unknown) => {
            onExit(await handlers.daemon(parseDaemonOptions(raw)));
        });

    addAiOptions(addCommonOptions(program.command('process')))
        .description('process one batch from a file or standard input')
        .requiredOption('--client <id>', 'client ID, e.g. client_01')
        .option('--file <path>', 'input text file (default: standard input)')
        .option('--dry-run', 'parse and report without writing any file')
        .option('--json', 'print the batch result as JSON')
        .action(async (raw: unknown) => {
            onExit(await handlers.process(parseProcessOptions(raw)));
        });

    addCommonOptions(program.command('check-config'))
        .description('validate the client config and report every problem')
        .action(async (raw: unknown) => {
            onExit(await handlers.checkConfig(parseCommonOptions(raw)));
        });

    addCommonOptions(program.command('clients'))
        .description('list configured clients')
        .action(async (raw: unknown) => {
            onExit(await handlers.clients(parseCommonOptions(raw)));
        });

    return program;
};
