import { LintLogger } from './logger';

/**
 * Base error class for rules-lint with recovery hints
 */
export class LintError extends Error {
    constructor(message: string, public recoveryHint?: string) {
        super(message);
        this.name = 'LintError';
    }

    toString(): string {
        if (this.recoveryHint) {
            return `${this.message}\nHint: ${this.recoveryHint}`;
        }
        return this.message;
    }
}

/**
 * Config file could not be parsed or failed validation
 */
export class ConfigError extends LintError {
    constructor(message: string, public configPath?: string) {
        super(
            message,
            configPath
                ? `Fix or remove ${configPath}.`
                : 'Check the command-line options.'
        );
        this.name = 'ConfigError';
    }
}

/**
 * Raised when a rule file cannot be read and the policy is 'abort'
 */
export class ReadAbortError extends LintError {
    constructor(public filePath: string, public reason: string) {
        super(
            `${filePath} could not be read: ${reason}`,
            "Use --on-read-error report to record unreadable files and continue."
        );
        this.name = 'ReadAbortError';
    }
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
    return err instanceof Error && 'code' in err;
}

/**
 * Log error with recovery hint
 */
export function logError(logger: LintLogger, error: Error): void {
    logger.error(`[ERROR] ${error.message}`);
    if (error instanceof LintError && error.recoveryHint) {
        logger.error(`Hint: ${error.recoveryHint}`);
    }
}
