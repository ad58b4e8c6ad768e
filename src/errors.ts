/**
 * Error Taxonomy
 *
 * Configuration errors are fatal at startup. Everything else is scoped to a
 * single request, batch or file and never stops the daemon.
 */

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

export class ConfigNotFoundError extends ConfigError {
    constructor(public readonly path: string) {
        super(`Config file not found: ${path}`);
        this.name = 'ConfigNotFoundError';
    }
}

export class ConfigParseError extends ConfigError {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigParseError';
    }
}

export class ConfigValidationError extends ConfigError {
    constructor(public readonly violations: string[]) {
        super(`Config validation failed with ${violations.length} problem(s):\n- ${violations.join('\n- ')}`);
        this.name = 'ConfigValidationError';
    }
}

export class UnknownClientError extends Error {
    constructor(public readonly clientId: string) {
        super(`Client ID not found: ${clientId}`);
        this.name = 'UnknownClientError';
    }
}

export class EmptyBatchError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'EmptyBatchError';
    }
}

export class OutputWriteError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'OutputWriteError';
    }
}

export class ManifestWriteError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ManifestWriteError';
    }
}

export class AIUnavailableError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'AIUnavailableError';
    }
}

export class AITimeoutError extends AIUnavailableError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'AITimeoutError';
    }
}

export const errorMessage = (error: unknown): string =>
    error instanceof Error ? error.message : String(error);
