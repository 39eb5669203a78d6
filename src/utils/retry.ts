import { HttpError, RETRYABLE_ERROR_CODES } from './http-client.js';

export interface BackoffOptions {
    initialMs: number;
    maxMs: number;
    /** Source of jitter in [0, 1); injectable for deterministic tests */
    random?: () => number;
}

/**
 * Exponential backoff with up to 50% jitter, capped at `maxMs`.
 * `attempt` is zero-based.
 */
export function calculateBackoff(attempt: number, options: BackoffOptions): number {
    const random = options.random ?? Math.random;
    const exponential = options.initialMs * Math.pow(2, attempt);
    const jitter = random() * exponential * 0.5;
    return Math.min(options.maxMs, exponential + jitter);
}

/**
 * Transient = worth retrying: rate limits, 5xx, timeouts, dropped sockets.
 */
export function isTransientError(error: unknown): boolean {
    if (error instanceof HttpError) return error.retryable;

    if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
        return RETRYABLE_ERROR_CODES.has(error.code);
    }

    return false;
}

/**
 * Server-requested delay, when the error carries one.
 */
export function retryAfterOf(error: unknown): number | null {
    return error instanceof HttpError ? error.retryAfterMs : null;
}
