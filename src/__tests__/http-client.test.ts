import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { HttpClient, HttpError, createHttpClient, parseRetryAfter, sleep } from '../utils/http-client.js';
import { calculateBackoff, isTransientError, retryAfterOf } from '../utils/retry.js';

function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { 'content-type': 'application/json', ...headers },
    });
}

function abortError(): Error {
    return Object.assign(new Error('This operation was aborted'), { name: 'AbortError' });
}

/**
 * Headers arrive, then the body never finishes until the request is aborted.
 */
function stalledBody(init?: RequestInit) {
    const body = new Promise<never>((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => reject(abortError()));
    });
    return {
        ok: true,
        status: 200,
        headers: new Headers({ 'content-type': 'application/json' }),
        json: () => body,
        text: () => body,
    };
}

describe('HttpClient', () => {
    let client: HttpClient;

    beforeEach(() => {
        client = new HttpClient({ timeout: 5000 });
        vi.restoreAllMocks();
    });

    afterEach(() => {
        vi.unstubAllGlobals();
    });

    describe('responses', () => {
        it('should parse JSON bodies and expose headers', async () => {
            vi.stubGlobal('fetch', vi.fn().mockImplementation(async () => jsonResponse({ data: 'ok' }, 200, { 'x-test': 'yes' })));

            const response = await client.get('https://api.example.com/1');

            expect(response.status).toBe(200);
            expect(response.ok).toBe(true);
            expect(response.data).toEqual({ data: 'ok' });
            expect(response.headers['x-test']).toBe('yes');
        });

        it('should return text for non-JSON bodies', async () => {
            vi.stubGlobal('fetch', vi.fn().mockImplementation(async () => new Response('plain body', { status: 200 })));

            const response = await client.get('https://api.example.com/1');
            expect(response.data).toBe('plain body');
        });

        it('should send a User-Agent with the contact email', async () => {
            const mockFetch = vi.fn().mockImplementation(async () => jsonResponse({}));
            vi.stubGlobal('fetch', mockFetch);

            await createHttpClient({ email: 'test@example.com' }).get('https://api.example.com/1');

            expect(mockFetch.mock.calls[0]?.[1]).toMatchObject({
                method: 'GET',
                headers: { 'User-Agent': 'paper-ingest/0.1.0 (mailto:test@example.com)' },
            });
        });
    });

    describe('HttpError', () => {
        it('should create error with status and retryable flag', () => {
            const error = new HttpError('Not Found', 404, false);
            expect(error.message).toBe('Not Found');
            expect(error.status).toBe(404);
            expect(error.retryable).toBe(false);
            expect(error.retryAfterMs).toBeNull();
            expect(error.name).toBe('HttpError');
        });

        it('should include response data', () => {
            const responseData = { error: 'bad request' };
            const error = new HttpError('Bad Request', 400, false, responseData);
            expect(error.response).toEqual(responseData);
        });

        it('should mark 503 as retryable and carry Retry-After', async () => {
            vi.stubGlobal('fetch', vi.fn().mockImplementation(async () =>
                jsonResponse({ error: 'busy' }, 503, { 'retry-after': '2' })));

            await expect(client.get('https://api.example.com/1')).rejects.toMatchObject({
                status: 503,
                retryable: true,
                retryAfterMs: 2000,
                response: { error: 'busy' },
            });
        });

        it('should mark 404 as not retryable', async () => {
            vi.stubGlobal('fetch', vi.fn().mockImplementation(async () => jsonResponse({}, 404)));

            await expect(client.get('https://api.example.com/1')).rejects.toMatchObject({
                status: 404,
                retryable: false,
            });
        });

        it('should mark dropped connections as retryable', async () => {
            vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new TypeError('fetch failed', { cause: { code: 'ECONNRESET' } })));

            await expect(client.get('https://api.example.com/1')).rejects.toMatchObject({
                message: 'Network error: fetch failed',
                status: 0,
                retryable: true,
            });
        });

        it('should not retry unknown network failures', async () => {
            vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new TypeError('fetch failed', { cause: { code: 'ENOTFOUND' } })));

            await expect(client.get('https://api.example.com/1')).rejects.toMatchObject({ status: 0, retryable: false });
        });
    });

    describe('timeouts and aborts', () => {
        it('should turn a timeout into a retryable error', async () => {
            vi.stubGlobal('fetch', vi.fn((_url: string, init?: RequestInit) => new Promise<Response>((_resolve, reject) => {
                init?.signal?.addEventListener('abort', () => reject(abortError()));
            })));

            await expect(createHttpClient({ timeout: 50 }).get('https://api.example.com/slow')).rejects.toMatchObject({
                message: 'Request timeout after 50ms: https://api.example.com/slow',
                status: 0,
                retryable: true,
            });
        });

        it('should time out a body that stops arriving', async () => {
            vi.stubGlobal('fetch', vi.fn(async (_url: string, init?: RequestInit) => stalledBody(init)));

            await expect(createHttpClient({ timeout: 50 }).get('https://api.example.com/stalled')).rejects.toMatchObject({
                message: 'Request timeout after 50ms: https://api.example.com/stalled',
                status: 0,
                retryable: true,
            });
        });

        it('should stop reading a body when the caller aborts', async () => {
            const controller = new AbortController();
            vi.stubGlobal('fetch', vi.fn(async (_url: string, init?: RequestInit) => {
                setTimeout(() => controller.abort(), 10);
                return stalledBody(init);
            }));

            await expect(client.get('https://api.example.com/1', { signal: controller.signal })).rejects.toMatchObject({
                message: 'Request aborted: https://api.example.com/1',
                retryable: false,
            });
        });

        it('should not send a request for an aborted caller', async () => {
            const mockFetch = vi.fn();
            vi.stubGlobal('fetch', mockFetch);
            const controller = new AbortController();
            controller.abort();

            await expect(client.get('https://api.example.com/1', { signal: controller.signal })).rejects.toMatchObject({
                message: 'Request aborted: https://api.example.com/1',
                retryable: false,
            });
            expect(mockFetch).not.toHaveBeenCalled();
        });
    });

    describe('rate limiting', () => {
        it('should throttle requests based on source rate limits', async () => {
            // A fresh Response per call: a body can only be read once
            const mockFetch = vi.fn().mockImplementation(async () => jsonResponse({ data: 'ok' }));
            vi.stubGlobal('fetch', mockFetch);

            const limited = createHttpClient({ rateLimits: { slow: { tokensPerSecond: 2, maxBurst: 1 } } });
            const start = Date.now();

            // Burst of one: the second and third requests wait for a token
            await Promise.all([
                limited.get('https://api.example.com/1', { source: 'slow' }),
                limited.get('https://api.example.com/2', { source: 'slow' }),
                limited.get('https://api.example.com/3', { source: 'slow' }),
            ]);

            const elapsed = Date.now() - start;

            expect(elapsed).toBeGreaterThanOrEqual(450);
            expect(mockFetch).toHaveBeenCalledTimes(3);
        });
    });
});

describe('sleep', () => {
    it('should resolve early when its signal fires', async () => {
        const controller = new AbortController();
        const start = Date.now();
        setTimeout(() => controller.abort(), 10);

        await sleep(10_000, controller.signal);

        expect(Date.now() - start).toBeLessThan(5000);
    });

    it('should resolve at once for an aborted signal', async () => {
        const controller = new AbortController();
        controller.abort();

        await expect(sleep(10_000, controller.signal)).resolves.toBeUndefined();
    });
});

describe('parseRetryAfter', () => {
    it('should read delay seconds', () => {
        expect(parseRetryAfter('5')).toBe(5000);
    });

    it('should read an HTTP date in the past as zero', () => {
        expect(parseRetryAfter('Wed, 21 Oct 2015 07:28:00 GMT')).toBe(0);
    });

    it('should ignore missing or unreadable values', () => {
        expect(parseRetryAfter(null)).toBeNull();
        expect(parseRetryAfter('soon')).toBeNull();
    });
});

describe('retry helpers', () => {
    it('should grow backoff exponentially', () => {
        const options = { initialMs: 1000, maxMs: 30000, random: () => 0 };
        expect(calculateBackoff(0, options)).toBe(1000);
        expect(calculateBackoff(2, options)).toBe(4000);
        expect(calculateBackoff(10, options)).toBe(30000);
    });

    it('should add up to 50% jitter', () => {
        expect(calculateBackoff(1, { initialMs: 1000, maxMs: 30000, random: () => 0.5 })).toBe(2500);
    });

    it('should classify transient errors', () => {
        expect(isTransientError(new HttpError('HTTP 429', 429, true))).toBe(true);
        expect(isTransientError(new HttpError('HTTP 400', 400, false))).toBe(false);
        expect(isTransientError(Object.assign(new Error('timed out'), { code: 'ETIMEDOUT' }))).toBe(true);
        expect(isTransientError(new Error('boom'))).toBe(false);
        expect(isTransientError('boom')).toBe(false);
    });

    it('should expose the server-requested delay', () => {
        expect(retryAfterOf(new HttpError('HTTP 429', 429, true, undefined, 3000))).toBe(3000);
        expect(retryAfterOf(new Error('boom'))).toBeNull();
    });
});
