import os from 'node:os';
import path from 'node:path';

export const VERSION = '__VERSION__ (__GIT_BRANCH__/__GIT_COMMIT__ __GIT_COMMIT_DATE__) __SYSTEM_INFO__';
export const PROGRAM_NAME = 'labelops';
export const DEFAULT_CHARACTER_ENCODING = 'utf-8';

// Environment variables. Secrets are only ever read from here.
export const ENV_ROOT = 'LABELOPS_ROOT';
export const ENV_CONFIG_PATH = 'LABELOPS_CONFIG';
export const ENV_CLIENTS_ROOT = 'LABELOPS_CLIENTS_ROOT';
export const ENV_LOG_DIR = 'LABELOPS_LOG_DIR';
export const ENV_TEMPLATE_PATH = 'LABELOPS_TEMPLATE_PATH';
export const ENV_ALLOWLIST_PATH = 'LABELOPS_TELEGRAM_ALLOWLIST';
export const ENV_DEFAULT_CLIENT = 'LABELOPS_DEFAULT_CLIENT';
export const ENV_TELEGRAM_TOKEN = 'TELEGRAM_BOT_TOKEN';
export const ENV_OPENAI_API_KEY = 'OPENAI_API_KEY';
export const ENV_OPENAI_MODEL = 'OPENAI_MODEL';
export const ENV_REDACT_NAMES = 'AI_REDACT_NAMES';

export const DEFAULT_ROOT = process.env[ENV_ROOT] || path.join(os.homedir(), 'LabelOps');
export const DEFAULT_CONFIG_PATH = path.join(DEFAULT_ROOT, 'config', 'clients.yaml');
export const DEFAULT_CLIENTS_ROOT = path.join(DEFAULT_ROOT, 'Clients');
export const DEFAULT_LOG_DIR = path.join(DEFAULT_ROOT, 'Logs');
export const DEFAULT_ALLOWLIST_PATH = path.join(DEFAULT_ROOT, 'config', 'telegram_allowlist.json');
export const DEFAULT_CLIENT_ID = 'client_01';

export const CLIENT_ID_PATTERN = /^client_\d{2}$/;

export const REQUIRED_MAPPING_FIELDS = [
    'full_name',
    'address_line_1',
    'address_line_2',
    'town_city',
    'county',
    'postcode',
    'country',
    'service',
    'weight_kg',
] as const;

export const OPTIONAL_MAPPING_FIELDS = ['reference', 'phone', 'email'] as const;

// Fields that must carry a value for a record to be exported
export const REQUIRED_RECORD_FIELDS = [
    'full_name',
    'address_line_1',
    'town_city',
    'postcode',
    'country',
    'service',
    'weight_kg',
] as const;

export const CLIENT_FOLDER_DEFAULTS = {
    in_txt: 'IN_TXT',
    ready_xlsx: 'READY_XLSX',
    archive: 'ARCHIVE',
    tracking_out: 'TRACKING_OUT',
    failures: 'FAILURES',
} as const;

export const DEFAULT_COUNTRY = 'UNITED KINGDOM';

export const RISK_LEVELS = ['low', 'medium', 'high'] as const;
export const DEFAULT_MAX_RISK = 'low';
export const DEFAULT_MAX_AI_CALLS = 50;
export const DEFAULT_AI_MODEL = 'gpt-4o-mini';
export const AI_TIMEOUT_MS = 30000;

export const BATCH_SOURCES = ['telegram', 'watch', 'gui', 'cli'] as const;
export const MANIFEST_VERSION = '1.0';

// Logging
export const LOG_FILE_NAME = `${PROGRAM_NAME}.log`;
export const LOG_MAX_SIZE_BYTES = 5 * 1024 * 1024;
export const LOG_MAX_FILES = 5;

// Daemon
export const DEFAULT_POLL_INTERVAL_MS = 2000;
export const DEFAULT_CONFIG_CHECK_INTERVAL_MS = 10000;
export const WATCH_EXTENSION = '.txt';
export const ERROR_ARTIFACT_SUFFIX = '.error.txt';
export const TELEGRAM_FILE_PREFIX = 'telegram_';
export const INBOX_STAGING_DIR = '.tmp';

// Telegram Bot API
export const TELEGRAM_API_BASE = 'https://api.telegram.org';
export const TELEGRAM_POLL_TIMEOUT_SECONDS = 30;
