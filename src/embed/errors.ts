export type ExpansionErrorKind = 'FileNotFound' | 'ReadFailed' | 'RecursionLimitExceeded';

/**
 * Raised when a document or one of the files it embeds cannot be expanded.
 * The whole expansion is abandoned; no partial output is returned.
 */
export class ExpansionError extends Error {
    constructor(
        readonly kind: ExpansionErrorKind,
        readonly filePath: string,
        message: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'ExpansionError';
    }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && 'code' in error;
}
