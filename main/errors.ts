export type IOOperation = 'read-input' | 'write-output';

/**
 * Raised when the input folder cannot be read or a report cannot be written.
 * This is the only failure that aborts a run.
 */
export class ReportIOError extends Error {
    readonly path: string;
    readonly operation: IOOperation;

    constructor(operation: IOOperation, path: string, cause: unknown) {
        const detail = cause instanceof Error ? cause.message : String(cause);
        const verb = operation === 'read-input' ? 'read input folder' : 'write report';
        super(`Cannot ${verb} "${path}": ${detail}`, { cause });
        this.name = 'ReportIOError';
        this.path = path;
        this.operation = operation;
    }
}

/**
 * Raised when configuration cannot be loaded or fails validation.
 */
export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}
