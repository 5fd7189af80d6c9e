export interface CustomError extends Error {
    originalError?: unknown;
}

/**
 * A chain query that did not settle within its time budget.
 */
export class ChainTimeoutError extends Error implements CustomError {
    public readonly name = 'ChainTimeoutError';

    constructor(
        public readonly operation: string,
        public readonly timeoutMs: number
    ) {
        super(`Chain query "${operation}" timed out after ${timeoutMs}ms`);
    }
}

/**
 * The chain endpoint could not be reached or rejected the query.
 */
export class ChainConnectionError extends Error implements CustomError {
    public readonly name = 'ChainConnectionError';
    public originalError?: unknown;

    constructor(message: string, originalError?: unknown) {
        super(message);
        this.originalError = originalError;
    }
}

/**
 * Malformed request input; surfaced to API callers as a 400.
 */
export class ValidationError extends Error implements CustomError {
    public readonly name = 'ValidationError';

    constructor(
        message: string,
        public readonly field?: string
    ) {
        super(message);
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
