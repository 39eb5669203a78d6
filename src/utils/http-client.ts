import { getLogger } from './logger.js';

/**
 * Error classification for HTTP responses.
 */
const RETRYABLE_STATUS_CODES = new Set([408, 429, 500, 502, 503, 504]);
export const RETRYABLE_ERROR_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'EAI_AGAIN', 'UND_ERR_SOCKET', 'UND_ERR_CONNECT_TIMEOUT']);

/**
 * Token bucket rate limiter.
 * Allows `tokensPerSecond` requests per second with burst capacity.
 */
class TokenBucket {
    private tokens: number;
    private lastRefill: number;

    constructor(
        private readonly tokensPerSecond: number,
        private readonly maxTokens: number
    ) {
        this.tokens = maxTokens;
        this.lastRefill = Date.now();
    }

    async acquire(): Promise<void> {
        this.refill();

        if (this.tokens >= 1) {
            this.tokens -= 1;
            return;
        }

        // Wait until a token is available
        const waitMs = ((1 - this.tokens) / this.tokensPerSecond) * 1000;
        await sleep(waitMs);
        this.refill();
        this.tokens -= 1;
    }

    private refill(): void {
        const now = Date.now();
        const elapsed = (now - this.lastRefill) / 1000;
        this.tokens = Math.min(this.maxTokens, this.tokens + elapsed * this.tokensPerSecond);
        this.lastRefill = now;
    }
}

export interface RateLimit {
    tokensPerSecond: number;
    maxBurst: number;
}

/**
 * Per-source rate limit configurations.
 */
const DEFAULT_RATE_LIMITS: Record<string, RateLimit> = {
    openalex: { tokensPerSecond: 10, maxBurst: 10 },  // 10/s with polite pool
    default: { tokensPerSecond: 5, maxBurst: 5 },
};

export interface HttpClientOptions {
    timeout?: number;
    version?: string;
    email?: string;
    rateLimits?: Record<string, RateLimit>;
}

/**
 * HTTP request options.
 */
export interface HttpRequestOptions {
    headers?: Record<string, string>;
    timeout?: number;
    source?: string;  // For per-source rate limiting
    signal?: AbortSignal;
}

/**
 * HTTP response wrapper.
 */
export interface HttpResponse {
    status: number;
    headers: Record<string, string>;
    /** Parsed JSON for JSON responses, raw text otherwise; callers narrow it */
    data: unknown;
    ok: boolean;
}

/**
 * HTTP error with classification.
 * `status` is 0 for network-level failures and timeouts.
 */
export class HttpError extends Error {
    constructor(
        message: string,
        public readonly status: number,
        public readonly retryable: boolean,
        public readonly response?: unknown,
        public readonly retryAfterMs: number | null = null
    ) {
        super(message);
        this.name = 'HttpError';
    }
}

/**
 * HTTP client with per-source rate limiting, timeouts and error classification.
 * It does not retry; callers decide what is worth another attempt.
 */
export class HttpClient {
    private buckets = new Map<string, TokenBucket>();
    private readonly defaultTimeout: number;
    private readonly userAgent: string;
    private readonly rateLimits: Record<string, RateLimit>;

    constructor(options?: HttpClientOptions) {
        this.defaultTimeout = options?.timeout ?? 30000;
        const version = options?.version ?? '0.1.0';
        const email = options?.email ?? 'paper-ingest@example.com';
        this.userAgent = `paper-ingest/${version} (mailto:${email})`;
        this.rateLimits = { ...DEFAULT_RATE_LIMITS, ...options?.rateLimits };
    }

    /**
     * GET a URL and parse JSON (or text) from the body.
     */
    async get(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse> {
        const {
            headers = {},
            timeout = this.defaultTimeout,
            source = 'default',
            signal,
        } = options;

        // Acquire rate limit token
        await this.getBucket(source).acquire();

        if (signal?.aborted) {
            throw new HttpError(`Request aborted: ${url}`, 0, false);
        }

        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), timeout);
        const onCallerAbort = (): void => controller.abort();
        signal?.addEventListener('abort', onCallerAbort, { once: true });

        // Timeout and caller abort stay armed until the body has been read
        let response: Response;
        let data: unknown;
        try {
            try {
                response = await fetch(url, {
                    method: 'GET',
                    headers: { 'User-Agent': this.userAgent, ...headers },
                    signal: controller.signal,
                });
            } catch (error) {
                throw requestFailure(error, url, timeout, signal);
            }

            // Parse response
            const contentType = response.headers.get('content-type') ?? '';
            try {
                data = contentType.includes('application/json')
                    ? await response.json()
                    : await response.text();
            } catch (error) {
                if (isAbortError(error)) throw requestFailure(error, url, timeout, signal);
                throw error;
            }
        } finally {
            clearTimeout(timeoutId);
            signal?.removeEventListener('abort', onCallerAbort);
        }

        // Build headers map
        const responseHeaders: Record<string, string> = {};
        response.headers.forEach((value, key) => {
            responseHeaders[key] = value;
        });

        if (!response.ok) {
            const retryable = RETRYABLE_STATUS_CODES.has(response.status);
            const retryAfterMs = parseRetryAfter(response.headers.get('retry-after'));
            getLogger().debug({ status: response.status, retryable, url }, 'HTTP error response');
            throw new HttpError(
                `HTTP ${response.status}: ${response.statusText}`,
                response.status,
                retryable,
                data,
                retryAfterMs
            );
        }

        return { status: response.status, headers: responseHeaders, data, ok: true };
    }

    private getBucket(source: string): TokenBucket {
        let bucket = this.buckets.get(source);
        if (!bucket) {
            const config = this.rateLimits[source] ?? this.rateLimits['default'] ?? { tokensPerSecond: 5, maxBurst: 5 };
            bucket = new TokenBucket(config.tokensPerSecond, config.maxBurst);
            this.buckets.set(source, bucket);
        }
        return bucket;
    }
}

function isAbortError(error: unknown): boolean {
    return error instanceof Error && error.name === 'AbortError';
}

/**
 * Classify a failed fetch or body read. A caller abort is final; a timeout
 * and known socket errors are worth another attempt.
 */
function requestFailure(error: unknown, url: string, timeout: number, signal?: AbortSignal): HttpError {
    if (isAbortError(error)) {
        const byCaller = signal?.aborted ?? false;
        return new HttpError(
            byCaller ? `Request aborted: ${url}` : `Request timeout after ${timeout}ms: ${url}`,
            0,
            !byCaller
        );
    }

    const errorCode = networkErrorCode(error);
    return new HttpError(
        `Network error: ${error instanceof Error ? error.message : String(error)}`,
        0,
        errorCode !== null && RETRYABLE_ERROR_CODES.has(errorCode)
    );
}

function networkErrorCode(error: unknown): string | null {
    // undici wraps socket errors: TypeError('fetch failed', { cause: { code } })
    const candidates = [error, error instanceof Error ? error.cause : undefined];
    for (const candidate of candidates) {
        if (typeof candidate === 'object' && candidate !== null && 'code' in candidate && typeof candidate.code === 'string') {
            return candidate.code;
        }
    }
    return null;
}

/**
 * Parse a `Retry-After` header (seconds or HTTP date) into milliseconds.
 */
export function parseRetryAfter(header: string | null): number | null {
    if (!header) return null;

    // Try parsing as seconds
    const seconds = parseInt(header, 10);
    if (!isNaN(seconds)) return seconds * 1000;

    // Try parsing as HTTP date
    const date = new Date(header);
    if (!isNaN(date.getTime())) {
        return Math.max(0, date.getTime() - Date.now());
    }

    return null;
}

/**
 * Sleep for the specified number of milliseconds.
 * Resolves early once `signal` fires.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
        if (signal?.aborted) {
            resolve();
            return;
        }
        const onAbort = (): void => {
            clearTimeout(timer);
            resolve();
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}

/**
 * Singleton HTTP client instance.
 */
let clientInstance: HttpClient | null = null;

/**
 * Get the shared HTTP client instance.
 */
export function getHttpClient(options?: HttpClientOptions): HttpClient {
    if (!clientInstance) {
        clientInstance = new HttpClient(options);
    }
    return clientInstance;
}

/**
 * Create a new HTTP client (for testing or custom configuration).
 */
export function createHttpClient(options?: HttpClientOptions): HttpClient {
    return new HttpClient(options);
}
