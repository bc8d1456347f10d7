export type PackagerErrorCode =
    | 'MissingDescriptor'
    | 'IncompleteMetadata'
    | 'UnsupportedPlatform'
    | 'ToolNotFound'
    | 'BuildFailed'
    | 'ArtifactNotFound'
    | 'PackagingFailed'
    | 'ResultVerificationFailed';

export interface PackagerErrorOptions {
    /** Exit code of the external tool that failed, when it got far enough to report one. */
    exitCode?: number;
    hint?: string;
    cause?: unknown;
}

/**
 * Terminal failure of one packaging stage. Nothing is retried; the entry point
 * prints the message and exits with status 1.
 */
export class PackagerError extends Error {
    readonly code: PackagerErrorCode;
    readonly exitCode?: number;
    readonly hint?: string;

    constructor(code: PackagerErrorCode, message: string, options: PackagerErrorOptions = {}) {
        super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
        this.name = 'PackagerError';
        this.code = code;
        this.exitCode = options.exitCode;
        this.hint = options.hint;
    }
}

export function isPackagerError(error: unknown): error is PackagerError {
    return error instanceof PackagerError;
}
