export type LedgerErrorCode =
    | 'duplicate_request'
    | 'request_not_found'
    | 'store_failure';

export class LedgerError extends Error {
    constructor(
        public readonly code: LedgerErrorCode,
        message: string,
        options?: { cause?: unknown },
    ) {
        super(message, options);
        this.name = 'LedgerError';
    }
}

export class InvalidBucketPathError extends Error {
    constructor(public readonly path: string) {
        super(`invalid bucket path: ${path}`);
        this.name = 'InvalidBucketPathError';
    }
}

export class CredentialCacheError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'CredentialCacheError';
    }
}

export class NotifierUnavailableError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'NotifierUnavailableError';
    }
}

export class OperationTimeoutError extends Error {
    constructor(
        public readonly operation: string,
        public readonly timeoutMs: number,
    ) {
        super(`${operation} timed out after ${timeoutMs}ms`);
        this.name = 'OperationTimeoutError';
    }
}

export class OperationAbortedError extends Error {
    constructor(public readonly operation: string) {
        super(`${operation} aborted`);
        this.name = 'OperationAbortedError';
    }
}

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

export function describeError(error: unknown): string {
    if (error instanceof Error) {
        return `${error.name}: ${error.message}`;
    }

    return String(error);
}
