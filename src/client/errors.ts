/**
 * Raised for failures at the feed service boundary: login, HTTP and payload errors.
 * `status` is set when the server answered with a non-success HTTP status.
 */
export class FeedClientError extends Error {
    constructor(message: string, readonly status?: number, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'FeedClientError';
    }
}
