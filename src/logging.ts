import path from 'node:path';
import fs from 'node:fs';
import winston from 'winston';
import { LOG_FILE_NAME, LOG_MAX_FILES, LOG_MAX_SIZE_BYTES, PROGRAM_NAME } from './constants';

const POSTCODE_PATTERN = /\b[A-Z]{1,2}\d[A-Z\d]?\s*\d[A-Z]{2}\b/gi;
const LONG_DIGITS_PATTERN = /\b\d{5,}\b/g;
const REDACT_MAX_LENGTH = 200;

let currentLevel = 'info';
let fileLogPath: string | null = null;

const fileFormat = () => winston.format.combine(
    winston.format.timestamp({ format: () => new Date().toISOString() }),
    winston.format.splat(),
    winston.format.json(),
);

type LogTransport = winston.transports.ConsoleTransportInstance | winston.transports.FileTransportInstance;

const createTransports = (level: string): LogTransport[] => {
    const consoleTransport = new winston.transports.Console({
        format: level === 'info'
            ? winston.format.combine(
                winston.format.splat(),
                winston.format.printf(({ message }) => `${message}`),
            )
            : winston.format.combine(
                winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
                winston.format.splat(),
                winston.format.printf(({ timestamp, level, message, ...meta }) => {
                    const { service: _service, ...rest } = meta;
                    const extra = Object.keys(rest).length ? ` ${JSON.stringify(rest)}` : '';
                    return `${timestamp} ${level}: ${message}${extra}`;
                }),
            ),
    });

    const transports: LogTransport[] = [consoleTransport];
    if (fileLogPath) {
        transports.push(new winston.transports.File({
            filename: fileLogPath,
            maxsize: LOG_MAX_SIZE_BYTES,
            maxFiles: LOG_MAX_FILES,
            tailable: true,
            format: fileFormat(),
        }));
    }
    return transports;
};

const createLogger = (level: string = 'info'): winston.Logger => {
    return winston.createLogger({
        level,
        defaultMeta: { service: PROGRAM_NAME },
        transports: createTransports(level),
    });
};

let logger = createLogger(currentLevel);

export const setLogLevel = (level: string): void => {
    currentLevel = level;
    logger = createLogger(level);
};

/**
 * Adds an append-only log file under `logDir` that rotates at 5 MB and keeps
 * five generations.
 */
export const enableFileLogging = (logDir: string): string => {
    fs.mkdirSync(logDir, { recursive: true });
    fileLogPath = path.join(logDir, LOG_FILE_NAME);
    logger = createLogger(currentLevel);
    return fileLogPath;
};

export const getLogger = (): winston.Logger => logger;

/**
 * Masks postcodes and long digit runs and truncates, for free text that has
 * to appear in a log line.
 */
export const redact = (value: string | null | undefined): string => {
    if (!value) return '';
    const sanitized = value
        .replace(POSTCODE_PATTERN, 'POSTCODE')
        .replace(LONG_DIGITS_PATTERN, 'NUM');
    return sanitized.length > REDACT_MAX_LENGTH
        ? `${sanitized.slice(0, REDACT_MAX_LENGTH)}…`
        : sanitized;
};
